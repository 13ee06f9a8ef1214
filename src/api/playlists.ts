import type { FastifyInstance } from 'fastify';
import type { Db } from '../db/index.js';

export interface PlaylistRouteOptions {
  db: Db;
}

interface PlaylistParams {
  id: string;
}

export async function playlistRoutes(fastify: FastifyInstance, options: PlaylistRouteOptions) {
  const { db } = options;

  // GET /api/playlists - List playlists with their track counts
  fastify.get('/playlists', async () => {
    const playlists = await db
      .selectFrom('playlists')
      .select((eb) => [
        'playlists.id',
        'playlists.external_id',
        'playlists.title',
        'playlists.updated_at',
        eb
          .selectFrom('playlist_tracks')
          .select((sub) => sub.fn.countAll().as('count'))
          .whereRef('playlist_tracks.playlist_id', '=', 'playlists.id')
          .as('track_count'),
      ])
      .orderBy('playlists.title', 'asc')
      .orderBy('playlists.id', 'asc')
      .execute();

    return {
      playlists: playlists.map((playlist) => ({
        ...playlist,
        track_count: Number(playlist.track_count ?? 0),
      })),
    };
  });

  // GET /api/playlists/:id - Playlist with its tracks in position order
  fastify.get<{ Params: PlaylistParams }>('/playlists/:id', async (request, reply) => {
    const playlist = await db
      .selectFrom('playlists')
      .select(['id', 'external_id', 'title', 'created_at', 'updated_at'])
      .where('id', '=', request.params.id)
      .executeTakeFirst();

    if (!playlist) {
      return reply.code(404).send({ error: 'Playlist not found' });
    }

    const tracks = await db
      .selectFrom('playlist_tracks')
      .innerJoin('tracks', 'tracks.id', 'playlist_tracks.track_id')
      .innerJoin('albums', 'albums.id', 'tracks.album_id')
      .select([
        'tracks.id',
        'tracks.external_id',
        'tracks.name',
        'albums.id as album_id',
        'albums.name as album_name',
        'playlist_tracks.position',
      ])
      .where('playlist_tracks.playlist_id', '=', playlist.id)
      .orderBy('playlist_tracks.position', 'asc')
      .orderBy('tracks.id', 'asc')
      .execute();

    return { ...playlist, tracks };
  });
}
