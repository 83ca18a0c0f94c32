import { z } from 'zod';
import { jsonObjectSchema, parseJsonColumn } from './codec';
import type { Connection } from './db';
import { insertOrFetch } from './dedupe';
import { StoreError } from './errors';
import { calculationHash, hashRegistry, PRIMARY_HASH } from './hash';
import type { CalculationDraft, Inserted, WriteHooks } from './hooks';
import type { Logger } from './logger';
import type { Calculation, CalculationRow, StoredRef } from './models';

interface RawCalculationRow {
  id: number;
  hash: string;
  geometry_id: number;
  program: string;
  method: string;
  basis: string | null;
  calctype: string | null;
  program_version: string | null;
  input: string | null;
  keywords: string;
  cmdline_args: string;
  files: string;
  scratch_dir: string | null;
  wall_time: number | null;
  hostname: string | null;
  hostcpus: number | null;
  hostmem: number | null;
  extras: string;
}

const COLUMNS = `id, hash, geometry_id, program, method, basis, calctype, program_version, input,
  keywords, cmdline_args, files, scratch_dir, wall_time, hostname, hostcpus, hostmem, extras`;

const nullableText = z.string().nullable().default(null);
const nullableCount = z.number().int().nonnegative().nullable().default(null);

const calculationSchema = z.object({
  program: z.string().trim().min(1),
  method: z.string().trim().min(1),
  basis: z.string().trim().nullable().default(null),
  calctype: z.string().trim().nullable().default(null),
  programVersion: nullableText,
  input: nullableText,
  keywords: jsonObjectSchema.default({}),
  cmdlineArgs: z.array(z.string()).default([]),
  files: z.record(z.string()).default({}),
  scratchDir: nullableText,
  wallTime: z.number().nonnegative().nullable().default(null),
  hostname: nullableText,
  hostcpus: nullableCount,
  hostmem: nullableCount,
  extras: jsonObjectSchema.default({}),
});

const cmdlineArgsSchema = z.array(z.string());
const filesSchema = z.record(z.string());

export function validateCalculation(input: unknown): Calculation {
  const parsed = calculationSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'calculation';
    throw new StoreError('INVALID_RECORD', `Invalid calculation ${field}: ${issue?.message ?? 'unknown error'}`);
  }
  return parsed.data;
}

/** before_insert listener: the row hash is the primary named hash. */
export function populateCalculationHash(target: CalculationDraft): void {
  target.hash = calculationHash(target, target.geometryHash, PRIMARY_HASH);
}

/** after_insert listener writing every registered named hash of a new calculation. */
export function populateCalculationHashes(row: Inserted<CalculationDraft>, db: Connection): void {
  const existing = new Set(
    db
      .prepare<[number], { name: string }>('SELECT name FROM calculation_hash WHERE calculation_id = ?')
      .all(row.id)
      .map((hashRow) => hashRow.name),
  );
  const insert = db.prepare<[number, string, string]>(
    'INSERT INTO calculation_hash (calculation_id, name, value) VALUES (?, ?, ?)',
  );

  for (const name of hashRegistry.available()) {
    if (existing.has(name)) continue;
    const value = name === PRIMARY_HASH ? row.hash : calculationHash(row, row.geometryHash, name);
    insert.run(row.id, name, value);
  }
}

export interface CalculationRef {
  geometryId: number;
  geometryHash: string;
}

export class CalculationStore {
  private readonly findIdStmt;
  private readonly findByIdStmt;
  private readonly findByHashStmt;
  private readonly findByNamedHashStmt;
  private readonly findByMethodStmt;
  private readonly insertStmt;

  constructor(
    private readonly db: Connection,
    private readonly hooks: WriteHooks<CalculationDraft>,
    private readonly logger: Logger,
  ) {
    this.findIdStmt = db.prepare<[string], { id: number }>('SELECT id FROM calculation WHERE hash = ?');
    this.findByIdStmt = db.prepare<[number], RawCalculationRow>(`SELECT ${COLUMNS} FROM calculation WHERE id = ?`);
    this.findByHashStmt = db.prepare<[string], RawCalculationRow>(
      `SELECT ${COLUMNS} FROM calculation WHERE hash = ?`,
    );
    this.findByNamedHashStmt = db.prepare<[string, string], RawCalculationRow>(`
      SELECT ${COLUMNS} FROM calculation
      WHERE id IN (SELECT calculation_id FROM calculation_hash WHERE name = ? AND value = ?)
      ORDER BY id
    `);
    this.findByMethodStmt = db.prepare<
      { geometryId: number; method: string; basis: string | null },
      RawCalculationRow
    >(`
      SELECT ${COLUMNS} FROM calculation
      WHERE geometry_id = @geometryId
        AND method = @method COLLATE NOCASE
        AND ((basis IS NULL AND @basis IS NULL) OR basis = @basis COLLATE NOCASE)
      ORDER BY id
    `);
    this.insertStmt = db.prepare<[Record<string, string | number | null>]>(`
      INSERT INTO calculation (
        hash, geometry_id, program, method, basis, calctype, program_version, input,
        keywords, cmdline_args, files, scratch_dir, wall_time, hostname, hostcpus, hostmem, extras
      ) VALUES (
        @hash, @geometryId, @program, @method, @basis, @calctype, @programVersion, @input,
        @keywords, @cmdlineArgs, @files, @scratchDir, @wallTime, @hostname, @hostcpus, @hostmem, @extras
      )
    `);
  }

  /**
   * Stores a calculation run on the referenced geometry unless one with the
   * same hash exists. Provenance of a deduplicated row is left as first written.
   */
  insertOrFetch(calculation: Calculation, ref: CalculationRef): StoredRef {
    const target: CalculationDraft = {
      ...validateCalculation(calculation),
      geometryId: ref.geometryId,
      geometryHash: ref.geometryHash,
    };

    return insertOrFetch({
      db: this.db,
      table: 'calculation',
      hooks: this.hooks,
      logger: this.logger,
      target,
      findIdByHash: (hash) => this.findIdStmt.get(hash)?.id,
      insert: (row, hash) => {
        const info = this.insertStmt.run({
          hash,
          geometryId: row.geometryId,
          program: row.program,
          method: row.method,
          basis: row.basis,
          calctype: row.calctype,
          programVersion: row.programVersion,
          input: row.input,
          keywords: JSON.stringify(row.keywords),
          cmdlineArgs: JSON.stringify(row.cmdlineArgs),
          files: JSON.stringify(row.files),
          scratchDir: row.scratchDir,
          wallTime: row.wallTime,
          hostname: row.hostname,
          hostcpus: row.hostcpus,
          hostmem: row.hostmem,
          extras: JSON.stringify(row.extras),
        });
        return Number(info.lastInsertRowid);
      },
    });
  }

  findById(id: number): CalculationRow | null {
    const raw = this.findByIdStmt.get(id);
    return raw ? toCalculationRow(raw) : null;
  }

  findByHash(hash: string): CalculationRow | null {
    const raw = this.findByHashStmt.get(hash);
    return raw ? toCalculationRow(raw) : null;
  }

  /** Calculations whose named hash equals `value`; coarse hashes may match several. */
  findByNamedHash(name: string, value: string): CalculationRow[] {
    hashRegistry.get(name);
    return this.findByNamedHashStmt.all(name, value).map(toCalculationRow);
  }

  /**
   * Calculations on a geometry with the given method and basis, oldest first.
   * Method and basis are trimmed as on insert.
   */
  findByMethod(geometryId: number, method: string, basis: string | null): CalculationRow[] {
    return this.findByMethodStmt
      .all({ geometryId, method: method.trim(), basis: basis === null ? null : basis.trim() })
      .map(toCalculationRow);
  }
}

function toCalculationRow(raw: RawCalculationRow): CalculationRow {
  return {
    id: raw.id,
    hash: raw.hash,
    geometryId: raw.geometry_id,
    program: raw.program,
    method: raw.method,
    basis: raw.basis,
    calctype: raw.calctype,
    programVersion: raw.program_version,
    input: raw.input,
    keywords: parseJsonColumn(jsonObjectSchema, raw.keywords, 'calculation.keywords'),
    cmdlineArgs: parseJsonColumn(cmdlineArgsSchema, raw.cmdline_args, 'calculation.cmdline_args'),
    files: parseJsonColumn(filesSchema, raw.files, 'calculation.files'),
    scratchDir: raw.scratch_dir,
    wallTime: raw.wall_time,
    hostname: raw.hostname,
    hostcpus: raw.hostcpus,
    hostmem: raw.hostmem,
    extras: parseJsonColumn(jsonObjectSchema, raw.extras, 'calculation.extras'),
  };
}
