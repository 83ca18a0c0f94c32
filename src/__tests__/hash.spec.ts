import { describe, it, expect } from 'vitest';
import {
  calculationHash,
  canonicalGeometry,
  formatCoordinate,
  geometryHash,
  hashRegistry,
  sha256,
  stableStringify,
} from '../hash';
import { StoreError } from '../errors';
import { calculation, type Geometry } from '../models';
import { catchError, h2, hfSto3g as hf, water } from './helpers';

describe('stableStringify', () => {
  it('sorts keys recursively and drops undefined members', () => {
    expect(stableStringify({ b: 1, a: [{ d: 2, c: undefined }] })).toBe('{"a":[{"d":2}],"b":1}');
  });

  it('serializes primitives like JSON.stringify', () => {
    expect(stableStringify(null)).toBe('null');
    expect(stableStringify('x')).toBe('"x"');
    expect(stableStringify([3, 1, 2])).toBe('[3,1,2]');
  });
});

describe('geometryHash', () => {
  it('hashes the canonical form', () => {
    expect(canonicalGeometry(h2)).toBe(
      '{"charge":0,"coordinates":[["0.000000","0.000000","0.000000"],["0.000000","0.000000","0.740000"]],"spin":0,"symbols":["H","H"]}',
    );
    expect(geometryHash(h2)).toBe(sha256(canonicalGeometry(h2)));
    expect(geometryHash(h2)).toMatch(/^[0-9a-f]{64}$/);
  });

  it('ignores differences below the coordinate precision', () => {
    const jittered: Geometry = {
      ...h2,
      coordinates: [
        [1e-9, 0, -1e-9],
        [0, 0, 0.74 + 1e-9],
      ],
    };
    expect(geometryHash(jittered)).toBe(geometryHash(h2));
  });

  it('treats negative zero as zero', () => {
    expect(formatCoordinate(-0)).toBe('0.000000');
    expect(formatCoordinate(-0.0000001)).toBe('0.000000');
    expect(formatCoordinate(0.74)).toBe('0.740000');
  });

  it('normalizes symbol casing', () => {
    expect(geometryHash({ ...h2, symbols: ['h', 'H'] })).toBe(geometryHash(h2));
  });

  it('changes when a coordinate moves beyond the precision', () => {
    const moved: Geometry = {
      ...h2,
      coordinates: [
        [0, 0, 0],
        [0, 0, 0.74001],
      ],
    };
    expect(geometryHash(moved)).not.toBe(geometryHash(h2));
  });

  it('treats atom order as significant', () => {
    const reordered: Geometry = {
      ...water,
      symbols: ['H', 'O', 'H'],
      coordinates: [
        [1, 0, 0],
        [0, 0, 0],
        [0, 1, 0],
      ],
    };
    expect(geometryHash(reordered)).not.toBe(geometryHash(water));
  });

  it('changes with charge and spin', () => {
    expect(geometryHash({ ...h2, charge: 1, spin: 1 })).not.toBe(geometryHash(h2));
  });
});

describe('calculationHash', () => {
  const geoHash = geometryHash(h2);

  it('is reproducible from content alone', () => {
    const again = calculation({ program: 'psi4', method: 'HF', basis: 'STO-3G' });
    expect(calculationHash(again, geoHash)).toBe(calculationHash(hf, geoHash));
  });

  it('changes with its own fields', () => {
    const mp2 = calculation({ program: 'psi4', method: 'MP2', basis: 'STO-3G' });
    expect(calculationHash(mp2, geoHash)).not.toBe(calculationHash(hf, geoHash));
  });

  it('changes with the geometry hash', () => {
    expect(calculationHash(hf, geometryHash(water))).not.toBe(calculationHash(hf, geoHash));
  });

  it('compares method, basis and program case-insensitively', () => {
    const lower = calculation({ program: 'Psi4', method: 'hf', basis: 'sto-3g' });
    expect(calculationHash(lower, geoHash)).toBe(calculationHash(hf, geoHash));
  });

  it('ignores provenance and extras', () => {
    const elsewhere = { ...hf, hostname: 'node-7', wallTime: 12.5, hostcpus: 16, extras: { note: 'rerun' } };
    expect(calculationHash(elsewhere, geoHash)).toBe(calculationHash(hf, geoHash));
  });

  it('minimal ignores keywords while full does not', () => {
    const tight = { ...hf, keywords: { e_convergence: 1e-10 } };
    expect(calculationHash(tight, geoHash, 'minimal')).toBe(calculationHash(hf, geoHash, 'minimal'));
    expect(calculationHash(tight, geoHash, 'full')).not.toBe(calculationHash(hf, geoHash, 'full'));
  });

  it('rejects unknown hash names', () => {
    const error = catchError(() => calculationHash(hf, geoHash, 'fancy'));
    expect(error).toBeInstanceOf(StoreError);
    expect(error).toMatchObject({ code: 'UNKNOWN_HASH' });
  });

  it('lists registered hash names', () => {
    expect(hashRegistry.available()).toEqual(['minimal', 'full']);
  });
});
