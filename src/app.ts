import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { LevelWithSilent } from 'pino';
import { registerRoutes, type ApiDeps } from './api/index.js';
import { SyncError } from './utils/errors.js';
import { loggerOptions } from './utils/logger.js';

export interface BuildServerOptions {
  logLevel?: LevelWithSilent;
}

export async function buildServer(deps: ApiDeps, options: BuildServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: loggerOptions(options.logLevel ?? 'info'),
  });

  await server.register(cors, {
    origin: true,
  });

  server.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, 'Request failed');
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    void reply.code(statusCode).send({
      error: error instanceof SyncError ? error.name : 'Internal Server Error',
      message: error.message,
    });
  });

  await registerRoutes(server, deps);
  return server;
}
