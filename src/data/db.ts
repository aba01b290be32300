/**
 * SQLite Database initialization and management
 * Uses better-sqlite3 for synchronous operations
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'fs';
import { dirname, isAbsolute, join } from 'path';
import { getEnvConfig } from '@/core/env';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('db');

const IN_MEMORY = ':memory:';

let db: Database.Database | null = null;

function resolveDbPath(dbPath: string): string {
  if (dbPath === IN_MEMORY || isAbsolute(dbPath)) {
    return dbPath;
  }
  return join(process.cwd(), dbPath);
}

/**
 * Open a standalone connection. Callers own the handle and must close it.
 */
export function openDatabase(dbPath: string): Database.Database {
  const resolved = resolveDbPath(dbPath);

  if (resolved === IN_MEMORY) {
    return new Database(IN_MEMORY);
  }

  const dataDir = dirname(resolved);
  if (!existsSync(dataDir)) {
    mkdirSync(dataDir, { recursive: true });
  }

  const isNew = !existsSync(resolved);
  logger.info({ dbPath: resolved, isNew }, 'Opening database');

  const connection = new Database(resolved);
  connection.pragma('journal_mode = WAL');
  return connection;
}

export function initializeDatabase(dbPath: string = getEnvConfig().dbPath): Database.Database {
  if (db) {
    return db;
  }

  db = openDatabase(dbPath);
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
    logger.info('Database connection closed');
  }
}
