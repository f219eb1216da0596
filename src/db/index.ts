import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { StoreUnavailableError } from '../lib/errors.js';
import { createChildLogger } from '../lib/logger.js';

const logger = createChildLogger('database');

/** How long a statement waits on another process's lock before failing */
const BUSY_TIMEOUT_MS = 5000;

export function openDatabase(dbPath: string): Database.Database {
  const inMemory = dbPath === ':memory:';

  try {
    if (!inMemory) {
      const dbDir = dirname(dbPath);
      if (!existsSync(dbDir)) {
        mkdirSync(dbDir, { recursive: true });
        logger.info({ path: dbDir }, 'Created database directory');
      }
    }

    const db = new Database(dbPath);
    db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);
    if (!inMemory) {
      db.pragma('journal_mode = WAL');
    }

    logger.info({ path: dbPath }, 'Database connected');
    return db;
  } catch (error) {
    throw new StoreUnavailableError(`Cannot open point-size database at ${dbPath}`, {
      path: dbPath,
      cause: error,
    });
  }
}

export function closeDatabase(db: Database.Database): void {
  if (db.open) {
    db.close();
    logger.info('Database connection closed');
  }
}
