import { z } from 'zod';
import { bufferToCoordinates, coordinatesToBuffer, parseJsonColumn } from './codec';
import type { Connection } from './db';
import { insertOrFetch } from './dedupe';
import { StoreError } from './errors';
import { geometryHash, normalizeSymbol } from './hash';
import type { GeometryDraft, WriteHooks } from './hooks';
import type { Logger } from './logger';
import type { Geometry, GeometryRow, StoredRef } from './models';

interface RawGeometryRow {
  id: number;
  hash: string;
  symbols: string;
  coordinates: Buffer;
  charge: number;
  spin: number;
}

const finite = z.number().finite();

const geometrySchema = z
  .object({
    symbols: z.array(z.string().trim().regex(/^[A-Za-z]{1,3}$/, 'not an element symbol')).min(1),
    coordinates: z.array(z.tuple([finite, finite, finite])),
    charge: z.number().int().default(0),
    spin: z.number().int().nonnegative().default(0),
  })
  .refine((geo) => geo.symbols.length === geo.coordinates.length, {
    message: 'symbols and coordinates must have the same length',
    path: ['coordinates'],
  });

const symbolsSchema = z.array(z.string());

/**
 * Checks shape and normalizes symbol casing. Coordinates are taken as Angstrom.
 */
export function validateGeometry(input: unknown): Geometry {
  const parsed = geometrySchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'geometry';
    throw new StoreError('INVALID_RECORD', `Invalid geometry ${field}: ${issue?.message ?? 'unknown error'}`);
  }
  return {
    ...parsed.data,
    symbols: parsed.data.symbols.map(normalizeSymbol),
  };
}

/** before_insert listener keeping `hash` in sync with content. */
export function populateGeometryHash(target: GeometryDraft): void {
  target.hash = geometryHash(target);
}

export class GeometryStore {
  private readonly findIdStmt;
  private readonly findByHashStmt;
  private readonly findByIdStmt;
  private readonly insertStmt;

  constructor(
    private readonly db: Connection,
    private readonly hooks: WriteHooks<GeometryDraft>,
    private readonly logger: Logger,
  ) {
    this.findIdStmt = db.prepare<[string], { id: number }>('SELECT id FROM geometry WHERE hash = ?');
    this.findByHashStmt = db.prepare<[string], RawGeometryRow>(
      'SELECT id, hash, symbols, coordinates, charge, spin FROM geometry WHERE hash = ?',
    );
    this.findByIdStmt = db.prepare<[number], RawGeometryRow>(
      'SELECT id, hash, symbols, coordinates, charge, spin FROM geometry WHERE id = ?',
    );
    this.insertStmt = db.prepare<[string, string, Buffer, number, number]>(
      'INSERT INTO geometry (hash, symbols, coordinates, charge, spin) VALUES (?, ?, ?, ?, ?)',
    );
  }

  /**
   * Stores a geometry unless one with the same hash exists.
   * Returns the row id either way.
   */
  insertOrFetch(geometry: Geometry): StoredRef {
    const target: GeometryDraft = validateGeometry(geometry);

    return insertOrFetch({
      db: this.db,
      table: 'geometry',
      hooks: this.hooks,
      logger: this.logger,
      target,
      findIdByHash: (hash) => this.findIdStmt.get(hash)?.id,
      insert: (row, hash) => {
        const info = this.insertStmt.run(
          hash,
          JSON.stringify(row.symbols),
          coordinatesToBuffer(row.coordinates),
          row.charge,
          row.spin,
        );
        return Number(info.lastInsertRowid);
      },
    });
  }

  findByHash(hash: string): GeometryRow | null {
    const raw = this.findByHashStmt.get(hash);
    return raw ? toGeometryRow(raw) : null;
  }

  findById(id: number): GeometryRow | null {
    const raw = this.findByIdStmt.get(id);
    return raw ? toGeometryRow(raw) : null;
  }

  /** Looks up a geometry by content, without inserting it. */
  find(geometry: Geometry): GeometryRow | null {
    return this.findByHash(geometryHash(validateGeometry(geometry)));
  }
}

function toGeometryRow(raw: RawGeometryRow): GeometryRow {
  return {
    id: raw.id,
    hash: raw.hash,
    symbols: parseJsonColumn(symbolsSchema, raw.symbols, 'geometry.symbols'),
    coordinates: bufferToCoordinates(raw.coordinates),
    charge: raw.charge,
    spin: raw.spin,
  };
}
