import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { Db } from '../db/index.js';

export interface ArtistRouteOptions {
  db: Db;
}

const artistQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  limit: z.coerce.number().int().min(1).default(50),
  search: z.string().trim().min(1).optional(),
  saved: z.enum(['true', 'false']).optional(),
});

export async function artistsRoutes(fastify: FastifyInstance, options: ArtistRouteOptions) {
  const { db } = options;

  // GET /api/artists - List artists with track counts
  fastify.get('/artists', async (request, reply) => {
    const parsed = artistQuerySchema.safeParse(request.query);
    if (!parsed.success) {
      return reply.code(400).send({
        error: 'Invalid query',
        message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    }
    const { page, search, saved } = parsed.data;
    const limit = Math.min(parsed.data.limit, 100);
    const offset = (page - 1) * limit;

    let query = db.selectFrom('artists');
    if (search) {
      query = query.where((eb) => eb(eb.fn<string>('lower', ['artists.name']), 'like', `%${search.toLowerCase()}%`));
    }
    if (saved) {
      query = query.where('artists.user_saved', '=', saved === 'true' ? 1 : 0);
    }

    const artists = await query
      .select((eb) => [
        'artists.id',
        'artists.external_id',
        'artists.name',
        'artists.user_saved',
        eb
          .selectFrom('artist_tracks')
          .select((sub) => sub.fn.countAll().as('count'))
          .whereRef('artist_tracks.artist_id', '=', 'artists.id')
          .as('track_count'),
      ])
      .orderBy('artists.name', 'asc')
      .orderBy('artists.id', 'asc')
      .limit(limit)
      .offset(offset)
      .execute();

    const total = await query.select((eb) => eb.fn.countAll().as('count')).executeTakeFirst();

    return {
      artists: artists.map((artist) => ({
        id: artist.id,
        external_id: artist.external_id,
        name: artist.name,
        user_saved: Number(artist.user_saved) === 1,
        track_count: Number(artist.track_count ?? 0),
      })),
      pagination: {
        page,
        limit,
        total: Number(total?.count ?? 0),
      },
    };
  });
}
