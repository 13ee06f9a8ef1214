import type { FastifyInstance } from 'fastify';
import type { Db } from '../db/index.js';
import type { EntityStore } from '../services/store/index.js';
import type { RunHistory, SyncOrchestrator } from '../services/sync/index.js';
import { artistsRoutes } from './artists.js';
import { libraryRoutes } from './library.js';
import { playlistRoutes } from './playlists.js';
import { syncRoutes } from './sync.js';

export interface ApiDeps {
  db: Db;
  store: EntityStore;
  history: RunHistory;
  orchestrator: SyncOrchestrator;
}

export async function registerRoutes(fastify: FastifyInstance, deps: ApiDeps) {
  // Health check
  fastify.get('/api/health', async () => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  await fastify.register(syncRoutes, { prefix: '/api', orchestrator: deps.orchestrator, history: deps.history });
  await fastify.register(libraryRoutes, { prefix: '/api', store: deps.store });
  await fastify.register(playlistRoutes, { prefix: '/api', db: deps.db });
  await fastify.register(artistsRoutes, { prefix: '/api', db: deps.db });
}
