import {
  CalculationStore,
  populateCalculationHash,
  populateCalculationHashes,
} from './calculation';
import { loadConfig, type ConfigOverrides } from './config';
import { openDatabase, type Connection } from './db';
import { EnergyStore } from './energy';
import { StoreError } from './errors';
import { GeometryStore, populateGeometryHash } from './geometry';
import { createHooks, type StoreHooks } from './hooks';
import { createLogger, type Logger } from './logger';
import type { Calculation, Geometry, StoredRef } from './models';
import { initSchema, type TableName } from './schema';

export interface OpenStoreOptions extends ConfigOverrides {
  logger?: Logger;
}

export interface StoredCalculation {
  geometry: StoredRef;
  calculation: StoredRef;
}

/**
 * Handle over one SQLite database: schema, write-path listeners and the
 * geometry, calculation and energy stores.
 */
export class CalcStore {
  readonly hooks: StoreHooks;
  readonly geometries: GeometryStore;
  readonly calculations: CalculationStore;
  readonly energies: EnergyStore;

  constructor(
    readonly db: Connection,
    readonly logger: Logger = createLogger(),
  ) {
    initSchema(db);

    this.hooks = createHooks();
    this.hooks.geometry.beforeInsert(populateGeometryHash);
    this.hooks.calculation.beforeInsert(populateCalculationHash);
    this.hooks.calculation.afterInsert(populateCalculationHashes);

    this.geometries = new GeometryStore(db, this.hooks.geometry, logger);
    this.calculations = new CalculationStore(db, this.hooks.calculation, logger);
    this.energies = new EnergyStore(db, this.calculations, logger);
  }

  /** Runs `fn` in one immediate transaction, or a savepoint when already inside one. */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }

  insertGeometry(geometry: Geometry): StoredRef {
    return this.geometries.insertOrFetch(geometry);
  }

  /** Stores a calculation on an already stored geometry, referenced by its hash. */
  insertCalculation(calculation: Calculation, geometryHash: string): StoredRef {
    return this.transaction(() => {
      const geometry = this.geometries.findByHash(geometryHash);
      if (!geometry) {
        throw new StoreError('NOT_FOUND', `No geometry with hash ${geometryHash}`);
      }
      return this.calculations.insertOrFetch(calculation, {
        geometryId: geometry.id,
        geometryHash: geometry.hash,
      });
    });
  }

  /** Stores a geometry and a calculation on it, both deduplicated. */
  storeCalculation(geometry: Geometry, calculation: Calculation): StoredCalculation {
    return this.transaction(() => {
      const geometryRef = this.geometries.insertOrFetch(geometry);
      const calculationRef = this.calculations.insertOrFetch(calculation, {
        geometryId: geometryRef.id,
        geometryHash: geometryRef.hash,
      });
      return { geometry: geometryRef, calculation: calculationRef };
    });
  }

  counts(): Record<TableName, number> {
    const count = (table: TableName): number =>
      this.db.prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${table}`).get()?.n ?? 0;
    return {
      geometry: count('geometry'),
      calculation: count('calculation'),
      calculation_hash: count('calculation_hash'),
      energy: count('energy'),
    };
  }

  close(): void {
    this.db.close();
  }
}

export function openStore(options: OpenStoreOptions = {}): CalcStore {
  const { logger: givenLogger, ...overrides } = options;
  const config = loadConfig(process.env, overrides);
  const logger = givenLogger ?? createLogger(config.logLevel);
  const db = openDatabase(config.dbPath, { busyTimeoutMs: config.busyTimeoutMs, logger });
  return new CalcStore(db, logger);
}
