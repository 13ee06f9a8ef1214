import { config } from '../config/index.js';
import { createLogger } from '../utils/logger.js';
import { createDatabase, initializeDatabase, closeDatabase } from './index.js';

const log = createLogger(config.log.level);

async function migrate() {
  const db = createDatabase(config.database.url, { poolSize: 1 });
  try {
    log.info('Initializing database schema...');
    await initializeDatabase(db);
    log.info('Database schema initialized successfully');
  } catch (error) {
    log.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await closeDatabase(db);
  }
}

void migrate();
