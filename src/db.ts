import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import type { Logger } from './logger';

export type Connection = Database.Database;

export interface OpenOptions {
  busyTimeoutMs?: number;
  logger?: Logger;
}

export const MEMORY = ':memory:';

/**
 * Opens a SQLite connection, creating the parent directory of a file
 * database when it is missing.
 */
export function openDatabase(dbPath: string, options: OpenOptions = {}): Connection {
  const { busyTimeoutMs = 5000, logger } = options;

  if (dbPath !== MEMORY) {
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
      logger?.info(`Created data directory at: ${dataDir}`);
    }
  }

  const db = new Database(dbPath);
  if (dbPath !== MEMORY) {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  db.pragma(`busy_timeout = ${busyTimeoutMs}`);

  logger?.info(`Database connected: ${dbPath}`);
  return db;
}
