import type { Selectable } from 'kysely';
import type { SyncRunTable } from '../../db/schema.js';
import type { Executor } from '../store/index.js';
import type { RunResult } from './types.js';

export type SyncRunRow = Selectable<SyncRunTable>;

/** Persists one row per orchestrator run in `sync_runs`. */
export class RunHistory {
  constructor(private readonly db: Executor) {}

  async start(runId: string, mirrorEnabled: boolean, startedAt: string): Promise<void> {
    await this.db
      .insertInto('sync_runs')
      .values({
        id: runId,
        status: 'running',
        mirror_enabled: mirrorEnabled ? 1 : 0,
        started_at: startedAt,
        finished_at: null,
        created: 0,
        updated: 0,
        removed: 0,
        error_count: 0,
        mirror_added: null,
        mirror_already_present: null,
        error_message: null,
      })
      .execute();
  }

  async finish(result: RunResult): Promise<void> {
    await this.db
      .updateTable('sync_runs')
      .set({
        status: result.state,
        finished_at: result.finishedAt,
        created: result.sync?.created ?? 0,
        updated: result.sync?.updated ?? 0,
        removed: result.sync?.removed ?? 0,
        error_count: result.sync?.errors.length ?? 0,
        mirror_added: result.mirror?.added ?? null,
        mirror_already_present: result.mirror?.alreadyPresent ?? null,
        error_message: result.error ?? result.mirrorError,
      })
      .where('id', '=', result.runId)
      .execute();
  }

  /** Most recent runs first. */
  async list(limit = 10): Promise<SyncRunRow[]> {
    return this.db.selectFrom('sync_runs').selectAll().orderBy('started_at', 'desc').limit(limit).execute();
  }

  async latest(): Promise<SyncRunRow | undefined> {
    return this.db.selectFrom('sync_runs').selectAll().orderBy('started_at', 'desc').executeTakeFirst();
  }
}
