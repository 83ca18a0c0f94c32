/**
 * Internal record types.
 *
 * Coordinates are always Angstrom. `spin` is the number of unpaired
 * electrons (2S), so multiplicity = spin + 1.
 */

export type Vector3 = [number, number, number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface Geometry {
  symbols: string[];
  coordinates: Vector3[];
  charge: number;
  spin: number;
}

export interface Provenance {
  scratchDir: string | null;
  wallTime: number | null;
  hostname: string | null;
  hostcpus: number | null;
  hostmem: number | null;
}

export interface Calculation extends Provenance {
  program: string;
  method: string;
  basis: string | null;
  calctype: string | null;
  programVersion: string | null;
  input: string | null;
  keywords: JsonObject;
  cmdlineArgs: string[];
  files: Record<string, string>;
  extras: JsonObject;
}

/** Minimal calculation description; everything else takes its default. */
export type CalculationInit = Pick<Calculation, 'program' | 'method'> & Partial<Calculation>;

export function calculation(init: CalculationInit): Calculation {
  return {
    basis: null,
    calctype: null,
    programVersion: null,
    input: null,
    keywords: {},
    cmdlineArgs: [],
    files: {},
    scratchDir: null,
    wallTime: null,
    hostname: null,
    hostcpus: null,
    hostmem: null,
    extras: {},
    ...init,
  };
}

export interface GeometryRow extends Geometry {
  id: number;
  hash: string;
}

export interface CalculationRow extends Calculation {
  id: number;
  hash: string;
  geometryId: number;
}

export interface EnergyRow {
  id: number;
  calculationId: number;
  geometryId: number;
  value: number;
}

/** Outcome of an insert-or-fetch. `created` is false when the row already existed. */
export interface StoredRef {
  id: number;
  hash: string;
  created: boolean;
}
