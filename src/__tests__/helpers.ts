import { calculation, type Geometry } from '../models';

/** Runs `fn` and returns what it threw, or undefined. */
export function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

export const h2: Geometry = {
  symbols: ['H', 'H'],
  coordinates: [
    [0, 0, 0],
    [0, 0, 0.74],
  ],
  charge: 0,
  spin: 0,
};

export const water: Geometry = {
  symbols: ['O', 'H', 'H'],
  coordinates: [
    [0, 0, 0],
    [1, 0, 0],
    [0, 1, 0],
  ],
  charge: 0,
  spin: 0,
};

export const hfSto3g = calculation({ program: 'psi4', method: 'HF', basis: 'STO-3G' });

export function waterXtbResults() {
  return {
    input_data: {
      structure: {
        symbols: ['O', 'H', 'H'],
        geometry: [
          [0.0, 0.0, 0.0],
          [1.8897261259082012, 0.0, 0.0],
          [0.0, 1.8897261259082012, 0.0],
        ],
        charge: 0,
        multiplicity: 1,
      },
      model: { method: 'gfn2', basis: null },
      calctype: 'energy',
    },
    success: true,
    data: { energy: -5.062316802835694 },
    provenance: { program: 'crest', program_version: '3.0.2' },
  };
}
