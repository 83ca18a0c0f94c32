import { fromResults, toInternal } from './convert';
import type { RecordedEnergy } from './energy';
import type { StoredRef } from './models';
import type { CalcStore, StoredCalculation } from './store';

export interface WrittenEnergy {
  geometry: StoredRef;
  calculation: StoredRef;
  energy: RecordedEnergy;
}

/**
 * Records QCIO results: geometry, calculation and energy in one transaction.
 * Writing the same results twice stores nothing new.
 */
export function energy(results: unknown, store: CalcStore): WrittenEnergy {
  const records = fromResults(results);
  return store.transaction(() => {
    const stored = store.storeCalculation(records.geometry, records.calculation);
    const energyRow = store.energies.record({
      calculationId: stored.calculation.id,
      value: records.energy,
    });
    return { ...stored, energy: energyRow };
  });
}

/** Records the geometry and calculation of a QCIO ProgramInput, without a result. */
export function programInput(input: unknown, provenance: unknown, store: CalcStore): StoredCalculation {
  const records = toInternal(input, provenance);
  return store.storeCalculation(records.geometry, records.calculation);
}
