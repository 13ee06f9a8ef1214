import type { FastifyInstance } from 'fastify';
import type { EntityStore } from '../services/store/index.js';

export interface LibraryRouteOptions {
  store: EntityStore;
}

export async function libraryRoutes(fastify: FastifyInstance, options: LibraryRouteOptions) {
  const { store } = options;

  // GET /api/library/stats - Row counts across the library
  fastify.get('/library/stats', async () => {
    const counts = await store.counts();
    const mirror = await store.findMirrorPlaylist(store.db);

    return {
      ...counts,
      mirror: mirror
        ? {
            id: mirror.id,
            external_id: mirror.external_id,
            track_count: await store.countLinks(store.db, mirror.id),
          }
        : null,
    };
  });
}
