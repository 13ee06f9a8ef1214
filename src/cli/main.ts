#!/usr/bin/env node

import ora from 'ora';
import pc from 'picocolors';
import { loadConfig, type Config } from '../config/index.js';
import { closeDatabase, createDatabase, initializeDatabase, type Db } from '../db/index.js';
import { createCatalogClient } from '../services/catalog/index.js';
import { RunHistory, createSyncEngine, type RunState } from '../services/sync/index.js';
import { errorMessage } from '../utils/index.js';
import { createLogger } from '../utils/logger.js';
import { formatRunHistory, formatRunResult } from './format.js';
import { createProgram, type StatusFlags, type SyncFlags } from './program.js';

const STATE_LABELS: Record<RunState, string> = {
  idle: 'Starting sync...',
  fetching: 'Fetching remote library...',
  reconciling: 'Reconciling local library...',
  mirror_updating: 'Updating mirror playlist...',
  done: 'Sync complete',
  failed: 'Sync failed',
};

async function withDatabase<T>(config: Config, fn: (db: Db) => Promise<T>): Promise<T> {
  const db = createDatabase(config.database.url, { poolSize: config.database.poolSize });
  try {
    await initializeDatabase(db);
    return await fn(db);
  } finally {
    await closeDatabase(db);
  }
}

async function syncCommand(options: SyncFlags): Promise<void> {
  const config = loadConfig();
  const log = createLogger(options.verbose ? 'debug' : config.log.level === 'info' ? 'warn' : config.log.level);
  const catalog = createCatalogClient(config.catalog, log.child({ component: 'catalog' }));

  const controller = new AbortController();
  const cancel = () => {
    console.log(pc.yellow('\n  Cancelling after the current step...'));
    controller.abort();
  };
  process.once('SIGINT', cancel);

  try {
    const result = await withDatabase(config, async (db) => {
      const { orchestrator } = createSyncEngine(db, catalog, config.sync, log);
      const spinner = ora({ text: STATE_LABELS.idle, prefixText: ' ', color: 'magenta' }).start();
      orchestrator.onStateChange((state) => {
        if (state === 'done') {
          spinner.succeed(pc.green(STATE_LABELS.done));
        } else if (state === 'failed') {
          spinner.fail(pc.red(STATE_LABELS.failed));
        } else {
          spinner.text = STATE_LABELS[state];
        }
      });
      return orchestrator.run({ mirror: options.mirror, signal: controller.signal });
    });

    console.log();
    for (const line of formatRunResult(result)) {
      console.log(line);
    }
    process.exitCode = result.state === 'done' ? 0 : 1;
  } finally {
    process.removeListener('SIGINT', cancel);
  }
}

async function statusCommand(options: StatusFlags): Promise<void> {
  const config = loadConfig();
  const limit = parseInt(options.limit, 10) || 10;

  await withDatabase(config, async (db) => {
    const runs = await new RunHistory(db).list(limit);
    for (const line of formatRunHistory(runs)) {
      console.log(line);
    }
  });
}

async function migrateCommand(): Promise<void> {
  const config = loadConfig();
  const spinner = ora({ text: 'Creating schema...', prefixText: ' ' }).start();
  await withDatabase(config, async () => {
    spinner.succeed(pc.green('Schema is up to date'));
  });
}

const program = createProgram({ sync: syncCommand, status: statusCommand, migrate: migrateCommand });

program.parseAsync().catch((error: unknown) => {
  console.error(pc.red(`  ✗ ${errorMessage(error)}`));
  process.exitCode = 1;
});
