import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { logger } from '../utils/logger.js';

let db: Database.Database | null = null;

const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 100;

export function getDb(): Database.Database {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Execute a database operation with retry logic for SQLITE_BUSY errors
 */
export function withRetry<T>(operation: () => T, retries = MAX_RETRIES): T {
  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      return operation();
    } catch (error) {
      const isBusy = error instanceof Error && error.message.includes('SQLITE_BUSY');
      if (!isBusy || attempt === retries) {
        throw error;
      }
      logger.debug({ attempt, retries }, 'Database busy, retrying...');
      // Synchronous sleep: callers run inside the serialized request path
      const start = Date.now();
      while (Date.now() - start < RETRY_DELAY_MS * attempt) {
        // Busy wait
      }
    }
  }
  throw new Error('Unreachable');
}

/** Open the history database. Pass `:memory:` for a throwaway one. */
export function initDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  db = new Database(dbPath);
  if (dbPath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('busy_timeout = 5000'); // Wait up to 5s for locks

  runMigrations(db);
  logger.info({ path: dbPath }, 'History database initialized');
  return db;
}

function runMigrations(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS dispatches (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      session_id TEXT NOT NULL,
      event TEXT NOT NULL,
      pack TEXT NOT NULL,
      category TEXT,
      sound TEXT,
      status TEXT NOT NULL,
      created_at INTEGER NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_dispatches_created ON dispatches(created_at);
  `);

  logger.debug('Database migrations complete');
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('History database closed');
  }
}
