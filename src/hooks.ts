import type { Connection } from './db';
import type { Calculation, Geometry } from './models';

/** A geometry about to be inserted. `hash` is filled by a before_insert listener. */
export interface GeometryDraft extends Geometry {
  hash?: string;
}

/** A calculation about to be inserted, with its resolved geometry. */
export interface CalculationDraft extends Calculation {
  hash?: string;
  geometryId: number;
  geometryHash: string;
}

export type Inserted<T> = T & { id: number; hash: string };

export type BeforeInsertListener<T> = (target: T, db: Connection) => void;
export type AfterInsertListener<T> = (row: Inserted<T>, db: Connection) => void;

/**
 * Listeners attached to the write path of one table.
 *
 * before_insert listeners run before the row reaches the database and may
 * mutate it; after_insert listeners run inside the same transaction once
 * the row has an id. A listener that throws aborts the insert.
 */
export class WriteHooks<T> {
  private readonly before: BeforeInsertListener<T>[] = [];
  private readonly after: AfterInsertListener<T>[] = [];

  beforeInsert(listener: BeforeInsertListener<T>): () => void {
    this.before.push(listener);
    return () => remove(this.before, listener);
  }

  afterInsert(listener: AfterInsertListener<T>): () => void {
    this.after.push(listener);
    return () => remove(this.after, listener);
  }

  runBeforeInsert(target: T, db: Connection): void {
    for (const listener of [...this.before]) {
      listener(target, db);
    }
  }

  runAfterInsert(row: Inserted<T>, db: Connection): void {
    for (const listener of [...this.after]) {
      listener(row, db);
    }
  }
}

function remove<L>(list: L[], listener: L): void {
  const index = list.indexOf(listener);
  if (index !== -1) {
    list.splice(index, 1);
  }
}

export interface StoreHooks {
  geometry: WriteHooks<GeometryDraft>;
  calculation: WriteHooks<CalculationDraft>;
}

export function createHooks(): StoreHooks {
  return {
    geometry: new WriteHooks<GeometryDraft>(),
    calculation: new WriteHooks<CalculationDraft>(),
  };
}
