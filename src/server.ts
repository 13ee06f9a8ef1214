import { config } from './config/index.js';
import { buildServer } from './app.js';
import { closeDatabase, createDatabase, initializeDatabase } from './db/index.js';
import { createCatalogClient } from './services/catalog/index.js';
import { createSyncEngine } from './services/sync/index.js';
import { createLogger } from './utils/logger.js';

async function start() {
  const log = createLogger(config.log.level);
  const db = createDatabase(config.database.url, { poolSize: config.database.poolSize });

  try {
    await initializeDatabase(db);
    log.info('Database initialized');

    const catalog = createCatalogClient(config.catalog, log.child({ component: 'catalog' }));
    const engine = createSyncEngine(db, catalog, config.sync, log);
    const server = await buildServer({ db, ...engine }, { logLevel: config.log.level });

    const address = await server.listen({
      port: config.server.port,
      host: config.server.host,
    });
    log.info({ address }, 'Server listening');

    // Graceful shutdown
    const shutdown = async (signal: string) => {
      log.info({ signal }, 'Shutting down gracefully');
      try {
        await server.close();
        await closeDatabase(db);
      } catch (error) {
        log.error({ err: error }, 'Shutdown failed');
        process.exitCode = 1;
      }
    };
    process.once('SIGTERM', (signal) => void shutdown(signal));
    process.once('SIGINT', (signal) => void shutdown(signal));
  } catch (error) {
    log.fatal({ err: error }, 'Failed to start server');
    await closeDatabase(db);
    process.exitCode = 1;
  }
}

void start();
