import type { Config } from '../../config/index.js';
import type { Db } from '../../db/index.js';
import type { Logger } from '../../utils/logger.js';
import type { CatalogClient } from '../catalog/types.js';
import { EntityStore } from '../store/index.js';
import { RunHistory } from './history.js';
import { MirrorPlaylistBuilder } from './mirror.js';
import { SyncOrchestrator } from './orchestrator.js';
import { Reconciler } from './reconciler.js';

export { RunHistory, type SyncRunRow } from './history.js';
export { MirrorPlaylistBuilder, type EnsureMirrorOptions, type MirrorOptions } from './mirror.js';
export { SyncOrchestrator, type ActiveRun, type OrchestratorDeps, type OrchestratorSettings, type StartedRun } from './orchestrator.js';
export { Reconciler, UNKNOWN_ALBUM, type ReconcileOptions } from './reconciler.js';
export { fetchSnapshot, type FetchSnapshotOptions } from './snapshot.js';
export * from './types.js';

export interface SyncEngine {
  store: EntityStore;
  history: RunHistory;
  orchestrator: SyncOrchestrator;
}

/** Wire the store, reconciler, mirror builder and orchestrator over one database. */
export function createSyncEngine(
  db: Db,
  catalog: CatalogClient,
  settings: Config['sync'],
  log: Logger
): SyncEngine {
  const store = new EntityStore(db, log.child({ component: 'store' }));
  const history = new RunHistory(db);
  const orchestrator = new SyncOrchestrator(
    {
      store,
      catalog,
      reconciler: new Reconciler(store, log.child({ component: 'reconciler' })),
      mirror: new MirrorPlaylistBuilder(store, catalog, log.child({ component: 'mirror' }), {
        batchSize: settings.mirrorBatchSize,
      }),
      history,
      log: log.child({ component: 'orchestrator' }),
    },
    {
      mirrorEnabled: settings.mirrorEnabled,
      fetchConcurrency: settings.fetchConcurrency,
    }
  );
  return { store, history, orchestrator };
}
