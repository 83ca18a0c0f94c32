import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MEMORY, openDatabase } from '../db';
import { createLogger } from '../logger';
import { calculation } from '../models';
import * as read from '../read';
import { CalcStore } from '../store';
import * as write from '../write';
import { catchError, h2, water, waterXtbResults } from './helpers';

describe('write and read', () => {
  let store: CalcStore;

  beforeEach(() => {
    store = new CalcStore(openDatabase(MEMORY), createLogger('silent'));
  });

  afterEach(() => {
    store.close();
  });

  it('reads an energy back through the minimal hash', () => {
    write.energy(waterXtbResults(), store);

    const energy = read.energy(water, { program: 'crest', method: 'gfn2' }, store, 'minimal');

    expect(energy).toBe(-5.062316802835694);
  });

  it('matches the full hash only when every hashed field agrees', () => {
    write.energy(waterXtbResults(), store);

    expect(read.energy(water, { program: 'crest', method: 'gfn2' }, store)).toBeNull();
    expect(
      read.energy(water, { program: 'crest', method: 'gfn2', calctype: 'energy', programVersion: '3.0.2' }, store),
    ).toBe(-5.062316802835694);
  });

  it('stores nothing new when the same results are written twice', () => {
    const first = write.energy(waterXtbResults(), store);
    const second = write.energy(waterXtbResults(), store);

    expect(first.geometry.created && first.calculation.created && first.energy.created).toBe(true);
    expect(second.geometry).toEqual({ ...first.geometry, created: false });
    expect(second.calculation).toEqual({ ...first.calculation, created: false });
    expect(second.energy).toEqual({ ...first.energy, created: false });
    expect(store.counts()).toEqual({ geometry: 1, calculation: 1, calculation_hash: 2, energy: 1 });
  });

  it('deduplicates results that differ only in provenance', () => {
    const results = waterXtbResults();
    write.energy(results, store);
    const again = write.energy({ ...results, provenance: { ...results.provenance, hostname: 'node-9', wall_time: 1.2 } }, store);

    expect(again.calculation.created).toBe(false);
    expect(store.counts().calculation).toBe(1);
  });

  it('writes nothing when the results do not convert', () => {
    const error = catchError(() => write.energy({ ...waterXtbResults(), data: {} }, store));

    expect(error).toMatchObject({ code: 'CONVERSION_FAILED', field: 'data.energy' });
    expect(store.counts().geometry).toBe(0);
  });

  it('looks up energies by method and basis', () => {
    write.energy(waterXtbResults(), store);

    expect(read.energyByMethod(water, 'GFN2', null, store)).toBe(-5.062316802835694);
    expect(read.energyByMethod(water, 'gfn2', 'sto-3g', store)).toBeNull();
    expect(read.energyByMethod({ ...water, charge: 1 }, 'gfn2', null, store)).toBeNull();
  });

  it('rebuilds QCIO results for a stored calculation', () => {
    const written = write.energy(waterXtbResults(), store);
    const results = read.results(written.calculation.id, store);

    expect(results?.data).toEqual({ energy: -5.062316802835694 });
    expect(results?.input_data.model).toEqual({ method: 'gfn2', basis: null });
    expect(results?.input_data.structure.geometry[1]?.[0]).toBeCloseTo(1.8897261259082012, 12);
    expect(results?.provenance.program).toBe('crest');
  });

  it('records a program input without an energy', () => {
    const results = waterXtbResults();
    const stored = write.programInput(results.input_data, results.provenance, store);

    expect(stored.calculation.created).toBe(true);
    expect(read.results(stored.calculation.id, store)).toBeNull();
    expect(read.geometry(stored.geometry.hash, store)?.symbols).toEqual(['O', 'H', 'H']);
  });

  it('finds a calculation written with padded method and basis by the same input', () => {
    const padded = { program: 'psi4', method: 'HF ', basis: ' STO-3G' };
    const { calculation: calc } = store.storeCalculation(h2, calculation(padded));
    store.energies.record({ calculationId: calc.id, value: -1.117 });

    expect(read.energy(h2, padded, store, 'minimal')).toBe(-1.117);
    expect(read.energy(h2, padded, store)).toBe(-1.117);
    expect(read.energy(h2, { program: 'PSI4', method: ' hf', basis: 'sto-3g ' }, store, 'minimal')).toBe(-1.117);
    expect(read.energyByMethod(h2, 'HF ', ' STO-3G', store)).toBe(-1.117);
    expect(read.energyByMethod(h2, ' hf', 'sto-3g ', store)).toBe(-1.117);
  });

  it('stores the H2 scenario with a derived energy geometry', () => {
    const h1 = store.insertGeometry(h2);
    expect(store.insertGeometry(h2).id).toBe(h1.id);

    const c1 = store.insertCalculation(calculation({ program: 'psi4', method: 'HF', basis: 'STO-3G' }), h1.hash);
    const energy = store.energies.record({ calculationId: c1.id, value: -1.117 });

    expect(read.geometry(h1.hash, store)?.id).toBe(energy.geometryId);
    expect(read.energyByMethod(h2, 'HF', 'STO-3G', store)).toBe(-1.117);
  });
});
