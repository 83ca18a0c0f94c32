import { toResults } from './convert';
import { validateCalculation } from './calculation';
import { validateGeometry } from './geometry';
import { calculationHash, geometryHash, PRIMARY_HASH } from './hash';
import { calculation as buildCalculation, type CalculationInit, type Geometry, type GeometryRow } from './models';
import type { Results } from './qcio';
import type { CalcStore } from './store';

/**
 * Energy of `calculation` run on `geometry`, matched through a named
 * calculation hash. With a coarse hash such as `minimal` several
 * calculations can match; the oldest one with an energy wins.
 */
export function energy(
  geometry: Geometry,
  calculation: CalculationInit,
  store: CalcStore,
  hashName: string = PRIMARY_HASH,
): number | null {
  const geoHash = geometryHash(validateGeometry(geometry));
  const value = calculationHash(validateCalculation(buildCalculation(calculation)), geoHash, hashName);

  for (const row of store.calculations.findByNamedHash(hashName, value)) {
    const energyRow = store.energies.findByCalculation(row.id);
    if (energyRow) {
      return energyRow.value;
    }
  }
  return null;
}

/**
 * Energy at `geometry` for a method and basis, whatever the program.
 * Method and basis compare case-insensitively; a `null` basis only matches `null`.
 */
export function energyByMethod(
  geometry: Geometry,
  method: string,
  basis: string | null,
  store: CalcStore,
): number | null {
  const geometryRow = store.geometries.find(geometry);
  if (!geometryRow) {
    return null;
  }
  for (const row of store.calculations.findByMethod(geometryRow.id, method, basis)) {
    const energyRow = store.energies.findByCalculation(row.id);
    if (energyRow) {
      return energyRow.value;
    }
  }
  return null;
}

export function geometry(hash: string, store: CalcStore): GeometryRow | null {
  return store.geometries.findByHash(hash);
}

/** Rebuilds QCIO results for a stored calculation that has an energy. */
export function results(calculationId: number, store: CalcStore): Results | null {
  const calculationRow = store.calculations.findById(calculationId);
  const energyRow = store.energies.findByCalculation(calculationId);
  if (!calculationRow || !energyRow) {
    return null;
  }
  const geometryRow = store.geometries.findById(energyRow.geometryId);
  if (!geometryRow) {
    return null;
  }
  return toResults({ geometry: geometryRow, calculation: calculationRow, energy: energyRow });
}
