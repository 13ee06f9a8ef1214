import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { SyncInProgressError } from '../utils/errors.js';
import type { RunHistory, SyncOrchestrator } from '../services/sync/index.js';

export interface SyncRouteOptions {
  orchestrator: SyncOrchestrator;
  history: RunHistory;
}

const syncBodySchema = z
  .object({
    mirror: z.boolean().optional(),
  })
  .strict();

const statusQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10),
});

export async function syncRoutes(fastify: FastifyInstance, options: SyncRouteOptions) {
  const { orchestrator, history } = options;

  // POST /api/sync - Start a sync run; answers before the run finishes
  fastify.post('/sync', async (request, reply) => {
    const body = syncBodySchema.safeParse(request.body ?? {});
    if (!body.success) {
      return reply.code(400).send({
        error: 'Invalid sync request',
        message: body.error.issues.map((issue) => issue.message).join('; '),
      });
    }

    try {
      const { runId, completion } = orchestrator.start({ mirror: body.data.mirror });
      void completion.catch((error: unknown) => {
        request.log.error({ err: error, runId }, 'Background sync run rejected');
      });
      return reply.code(202).send({ runId, state: 'started' });
    } catch (error) {
      if (error instanceof SyncInProgressError) {
        return reply.code(409).send({
          error: 'Sync already running',
          runId: error.runId,
        });
      }
      throw error;
    }
  });

  // GET /api/sync/status - Active run plus the latest recorded runs
  fastify.get('/sync/status', async (request, reply) => {
    const query = statusQuerySchema.safeParse(request.query);
    if (!query.success) {
      return reply.code(400).send({ error: 'Invalid limit' });
    }

    const runs = await history.list(query.data.limit);
    return {
      active: orchestrator.current(),
      runs,
    };
  });
}
