import type { CalculationStore } from './calculation';
import type { Connection } from './db';
import { isUniqueViolation } from './dedupe';
import { ConsistencyError, StoreError } from './errors';
import type { Logger } from './logger';
import type { EnergyRow } from './models';

interface RawEnergyRow {
  id: number;
  calculation_id: number;
  geometry_id: number;
  value: number;
}

export interface RecordEnergyParams {
  calculationId: number;
  /** Energy in Hartree. */
  value: number;
  /**
   * Optional geometry reference. The geometry is always derived from the
   * calculation; when given, it must match.
   */
  geometryId?: number;
}

export interface RecordedEnergy extends EnergyRow {
  created: boolean;
}

export class EnergyStore {
  private readonly findByCalculationStmt;
  private readonly findByIdStmt;
  private readonly findByGeometryStmt;
  private readonly insertStmt;

  constructor(
    private readonly db: Connection,
    private readonly calculations: CalculationStore,
    private readonly logger: Logger,
  ) {
    this.findByCalculationStmt = db.prepare<[number], RawEnergyRow>(
      'SELECT id, calculation_id, geometry_id, value FROM energy WHERE calculation_id = ?',
    );
    this.findByIdStmt = db.prepare<[number], RawEnergyRow>(
      'SELECT id, calculation_id, geometry_id, value FROM energy WHERE id = ?',
    );
    this.findByGeometryStmt = db.prepare<[number], RawEnergyRow>(
      'SELECT id, calculation_id, geometry_id, value FROM energy WHERE geometry_id = ? ORDER BY id',
    );
    this.insertStmt = db.prepare<[number, number, number]>(
      'INSERT INTO energy (calculation_id, geometry_id, value) VALUES (?, ?, ?)',
    );
  }

  /**
   * Records the energy of a calculation. The geometry reference is copied
   * from the calculation row. Recording the same value again returns the
   * existing row.
   *
   * @throws ConsistencyError when `geometryId` disagrees with the
   *   calculation's geometry, or a different energy is already stored.
   */
  record(params: RecordEnergyParams): RecordedEnergy {
    const { calculationId, value, geometryId } = params;
    if (!Number.isFinite(value)) {
      throw new StoreError('INVALID_RECORD', `Energy value must be a finite number, got ${value}`);
    }

    const run = this.db.transaction((): RecordedEnergy => {
      const calculation = this.calculations.findById(calculationId);
      if (!calculation) {
        throw new StoreError('NOT_FOUND', `Calculation #${calculationId} does not exist`);
      }

      if (geometryId !== undefined && geometryId !== calculation.geometryId) {
        throw new ConsistencyError(
          'GEOMETRY_MISMATCH',
          `Energy geometry #${geometryId} differs from calculation #${calculationId} geometry #${calculation.geometryId}`,
          { calculationId, geometryId, expectedGeometryId: calculation.geometryId },
        );
      }

      const existing = this.findByCalculation(calculationId);
      if (existing) {
        return this.reuse(existing, value);
      }

      try {
        const info = this.insertStmt.run(calculationId, calculation.geometryId, value);
        const id = Number(info.lastInsertRowid);
        this.logger.debug(`energy ${value} stored as #${id} for calculation #${calculationId}`);
        return { id, calculationId, geometryId: calculation.geometryId, value, created: true };
      } catch (error) {
        const winner = isUniqueViolation(error, 'energy.calculation_id')
          ? this.findByCalculation(calculationId)
          : null;
        if (!winner) {
          throw error;
        }
        return this.reuse(winner, value);
      }
    });

    return run.immediate();
  }

  findById(id: number): EnergyRow | null {
    const raw = this.findByIdStmt.get(id);
    return raw ? toEnergyRow(raw) : null;
  }

  findByCalculation(calculationId: number): EnergyRow | null {
    const raw = this.findByCalculationStmt.get(calculationId);
    return raw ? toEnergyRow(raw) : null;
  }

  findByGeometry(geometryId: number): EnergyRow[] {
    return this.findByGeometryStmt.all(geometryId).map(toEnergyRow);
  }

  private reuse(existing: EnergyRow, value: number): RecordedEnergy {
    if (existing.value !== value) {
      throw new ConsistencyError(
        'ENERGY_CONFLICT',
        `Calculation #${existing.calculationId} already has energy ${existing.value}, refusing ${value}`,
        { calculationId: existing.calculationId, stored: existing.value, offered: value },
      );
    }
    return { ...existing, created: false };
  }
}

function toEnergyRow(raw: RawEnergyRow): EnergyRow {
  return {
    id: raw.id,
    calculationId: raw.calculation_id,
    geometryId: raw.geometry_id,
    value: raw.value,
  };
}
