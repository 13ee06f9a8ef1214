import type { Logger } from '../../utils/logger.js';
import { SyncInProgressError } from '../../utils/errors.js';
import { errorMessage, generateId, timestamp } from '../../utils/index.js';
import type { CatalogClient } from '../catalog/types.js';
import type { EntityStore } from '../store/index.js';
import type { RunHistory } from './history.js';
import type { MirrorPlaylistBuilder } from './mirror.js';
import type { Reconciler } from './reconciler.js';
import { fetchSnapshot } from './snapshot.js';
import type { MirrorReport, RunOptions, RunResult, RunState, StateListener, SyncReport } from './types.js';

export interface OrchestratorDeps {
  store: EntityStore;
  catalog: CatalogClient;
  reconciler: Reconciler;
  mirror: MirrorPlaylistBuilder;
  history: RunHistory;
  log: Logger;
}

export interface OrchestratorSettings {
  mirrorEnabled: boolean;
  fetchConcurrency: number;
}

export interface StartedRun {
  runId: string;
  completion: Promise<RunResult>;
}

export interface ActiveRun {
  runId: string;
  state: RunState;
  startedAt: string;
}

/**
 * Drives one sync run at a time: fetch a snapshot, reconcile it, then bring
 * the mirror playlist up to date.
 *
 * A failed fetch or reconciliation fails the run. A failed mirror update is
 * recorded on the result but the run still completes.
 */
export class SyncOrchestrator {
  private active: ActiveRun | null = null;
  private listeners = new Set<StateListener>();

  constructor(
    private readonly deps: OrchestratorDeps,
    private readonly settings: OrchestratorSettings
  ) {}

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  current(): ActiveRun | null {
    return this.active ? { ...this.active } : null;
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    return this.start(options).completion;
  }

  /** Begin a run without waiting for it. Throws SyncInProgressError while one is active. */
  start(options: RunOptions = {}): StartedRun {
    if (this.active) {
      throw new SyncInProgressError(this.active.runId);
    }

    const runId = generateId();
    const active: ActiveRun = { runId, state: 'idle', startedAt: timestamp() };
    this.active = active;

    const completion = this.execute(active, options).finally(() => {
      this.active = null;
    });
    return { runId, completion };
  }

  private async execute(active: ActiveRun, options: RunOptions): Promise<RunResult> {
    const { store, catalog, reconciler, mirror, history } = this.deps;
    const mirrorEnabled = options.mirror ?? this.settings.mirrorEnabled;
    const log = this.deps.log.child({ runId: active.runId });

    let sync: SyncReport | null = null;
    let mirrorReport: MirrorReport | null = null;
    let mirrorError: string | null = null;
    let error: string | null = null;

    try {
      await history.start(active.runId, mirrorEnabled, active.startedAt);
      log.info({ mirror: mirrorEnabled }, 'Sync run started');

      this.transition(active, 'fetching', log);
      const snapshot = await fetchSnapshot(catalog, {
        concurrency: this.settings.fetchConcurrency,
        signal: options.signal,
        log,
      });

      this.transition(active, 'reconciling', log);
      sync = await reconciler.reconcile(snapshot, { signal: options.signal });

      if (mirrorEnabled) {
        this.transition(active, 'mirror_updating', log);
        try {
          mirrorReport = await mirror.ensureMirror({ signal: options.signal });
        } catch (mirrorFailure) {
          mirrorError = errorMessage(mirrorFailure);
          log.error({ err: mirrorFailure }, 'Mirror playlist update failed');
        }
      }

      this.transition(active, 'done', log);
    } catch (failure) {
      error = errorMessage(failure);
      log.error({ err: failure, state: active.state }, 'Sync run failed');
      this.transition(active, 'failed', log);
    }

    const result: RunResult = {
      runId: active.runId,
      state: active.state === 'done' ? 'done' : 'failed',
      sync,
      mirror: mirrorReport,
      mirrorError,
      error,
      startedAt: active.startedAt,
      finishedAt: timestamp(),
    };

    try {
      await history.finish(result);
    } catch (historyFailure) {
      log.error({ err: historyFailure }, 'Could not record sync run outcome');
    }

    const counts = await store.counts().catch((countFailure: unknown) => {
      log.warn({ err: countFailure }, 'Could not read store counts');
      return null;
    });
    log.info(
      {
        state: result.state,
        created: sync?.created ?? 0,
        updated: sync?.updated ?? 0,
        removed: sync?.removed ?? 0,
        errors: sync?.errors.length ?? 0,
        mirrorAdded: mirrorReport?.added ?? null,
        counts,
      },
      'Sync run finished'
    );
    return result;
  }

  private transition(active: ActiveRun, state: RunState, log: Logger): void {
    log.debug({ from: active.state, to: state }, 'Sync state transition');
    active.state = state;
    for (const listener of this.listeners) {
      listener(state, active.runId);
    }
  }
}
