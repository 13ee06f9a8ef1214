import type { Logger } from '../../utils/logger.js';
import { SyncCancelledError } from '../../utils/errors.js';
import { processBatch, timestamp } from '../../utils/index.js';
import { toCatalogError } from '../catalog/errors.js';
import type { CatalogReader, PlaylistSnapshot, RemoteSnapshot } from '../catalog/types.js';
import { MIRROR_PLAYLIST_TITLE } from '../store/index.js';

export interface FetchSnapshotOptions {
  concurrency: number;
  signal?: AbortSignal;
  log?: Logger;
}

/**
 * Read the whole remote library. Playlist track lists are fetched in parallel;
 * any failed read rejects the snapshot so nothing is reconciled against a
 * partial view. A playlist without an id is kept with no tracks and reported
 * by the reconciler. The mirror playlist's tracks are not read; the reconciler
 * ignores them.
 */
export async function fetchSnapshot(catalog: CatalogReader, options: FetchSnapshotOptions): Promise<RemoteSnapshot> {
  const { concurrency, signal, log } = options;

  const guard = <T>(operation: string, request: () => Promise<T>) => async (): Promise<T> => {
    if (signal?.aborted) {
      throw new SyncCancelledError();
    }
    try {
      return await request();
    } catch (error) {
      throw error instanceof SyncCancelledError ? error : toCatalogError(operation, error);
    }
  };

  const playlists = await guard('fetchPlaylists', () => catalog.fetchPlaylists())();
  log?.debug({ playlists: playlists.length }, 'Fetched playlist index');

  const entries = await processBatch(playlists, concurrency, async (playlist): Promise<PlaylistSnapshot> => {
    if (!playlist.id || playlist.title === MIRROR_PLAYLIST_TITLE) {
      return { playlist, tracks: [] };
    }
    const playlistId = playlist.id;
    const tracks = await guard('fetchPlaylistTracks', () => catalog.fetchPlaylistTracks(playlistId))();
    return { playlist, tracks };
  });

  const albums = await guard('fetchAlbums', () => catalog.fetchAlbums())();
  const artists = await guard('fetchArtists', () => catalog.fetchArtists())();

  log?.info(
    {
      playlists: entries.length,
      playlistTracks: entries.reduce((sum, entry) => sum + entry.tracks.length, 0),
      albums: albums.length,
      artists: artists.length,
    },
    'Fetched remote snapshot'
  );

  return { playlists: entries, albums, artists, fetchedAt: timestamp() };
}
