import type { Connection } from './db';
import { StoreError } from './errors';
import type { WriteHooks } from './hooks';
import type { Logger } from './logger';
import type { StoredRef } from './models';

export interface InsertOrFetchParams<T extends { hash?: string }> {
  db: Connection;
  table: string;
  hooks: WriteHooks<T>;
  logger: Logger;
  target: T;
  findIdByHash: (hash: string) => number | undefined;
  insert: (target: T, hash: string) => number;
}

export function isUniqueViolation(error: unknown, column?: string): boolean {
  if (!(error instanceof Error) || !('code' in error) || error.code !== 'SQLITE_CONSTRAINT_UNIQUE') {
    return false;
  }
  return column === undefined || error.message.includes(column);
}

/**
 * Hash-keyed insert-or-fetch.
 *
 * before_insert listeners populate `target.hash`; the row is inserted only
 * when no row with that hash exists. A unique violation on the hash column
 * means another writer stored the same content first, so the existing row
 * is returned instead.
 */
export function insertOrFetch<T extends { hash?: string }>(params: InsertOrFetchParams<T>): StoredRef {
  const { db, table, hooks, logger, target, findIdByHash, insert } = params;

  const run = db.transaction((): StoredRef => {
    hooks.runBeforeInsert(target, db);

    const hash = target.hash;
    if (hash === undefined || hash === '') {
      throw new StoreError('MISSING_HASH', `Refusing to insert ${table} row without a hash`);
    }

    const existingId = findIdByHash(hash);
    if (existingId !== undefined) {
      logger.debug(`${table} ${hash.slice(0, 12)} already stored as #${existingId}`);
      return { id: existingId, hash, created: false };
    }

    let id: number;
    try {
      id = insert(target, hash);
    } catch (error) {
      if (!isUniqueViolation(error, `${table}.hash`)) {
        throw error;
      }
      const winnerId = findIdByHash(hash);
      if (winnerId === undefined) {
        throw error;
      }
      logger.info(`${table} ${hash.slice(0, 12)} inserted concurrently, using #${winnerId}`);
      return { id: winnerId, hash, created: false };
    }

    hooks.runAfterInsert({ ...target, id, hash }, db);
    logger.debug(`${table} ${hash.slice(0, 12)} stored as #${id}`);
    return { id, hash, created: true };
  });

  return run.immediate();
}
