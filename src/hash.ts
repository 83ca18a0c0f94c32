import { createHash } from 'crypto';
import { StoreError } from './errors';
import type { Calculation, Geometry } from './models';

// Coordinates are compared at 1e-6 Angstrom
export const COORDINATE_DECIMALS = 6;

export function sha256(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

/**
 * Deterministic JSON serialization.
 * Object keys are sorted recursively, array order is preserved and
 * `undefined` members are left out, as `JSON.stringify` does.
 */
export function stableStringify(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }
  if (Array.isArray(value)) {
    return '[' + value.map((item) => stableStringify(item)).join(',') + ']';
  }
  const pairs = Object.entries(value)
    .filter(([, member]) => member !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, member]) => JSON.stringify(key) + ':' + stableStringify(member));
  return '{' + pairs.join(',') + '}';
}

/** `cl` and `CL` both become `Cl`. */
export function normalizeSymbol(symbol: string): string {
  const trimmed = symbol.trim();
  return trimmed.charAt(0).toUpperCase() + trimmed.slice(1).toLowerCase();
}

export function formatCoordinate(value: number): string {
  const text = value.toFixed(COORDINATE_DECIMALS);
  // -0.0000001 rounds to "-0.000000"
  return Number(text) === 0 ? (0).toFixed(COORDINATE_DECIMALS) : text;
}

/**
 * Canonical form of a geometry. Atom order is kept as given: two orderings
 * of the same molecule are different geometries.
 */
export function canonicalGeometry(geometry: Geometry): string {
  return stableStringify({
    symbols: geometry.symbols.map(normalizeSymbol),
    coordinates: geometry.coordinates.map((xyz) => xyz.map(formatCoordinate)),
    charge: geometry.charge,
    spin: geometry.spin,
  });
}

export function geometryHash(geometry: Geometry): string {
  return sha256(canonicalGeometry(geometry));
}

type HashFields = (calc: Calculation) => Record<string, unknown>;

const lower = (value: string | null): string | null => (value === null ? null : value.toLowerCase());

const minimal: HashFields = (calc) => ({
  program: lower(calc.program),
  method: lower(calc.method),
  basis: lower(calc.basis),
});

const full: HashFields = (calc) => ({
  ...minimal(calc),
  calctype: lower(calc.calctype),
  programVersion: calc.programVersion,
  input: calc.input,
  keywords: calc.keywords,
  cmdlineArgs: calc.cmdlineArgs,
  files: calc.files,
});

const HASH_FIELDS = { minimal, full } as const satisfies Record<string, HashFields>;

export type HashName = keyof typeof HASH_FIELDS;

/** The hash stored on the calculation row and used for deduplication. */
export const PRIMARY_HASH: HashName = 'full';

function isHashName(name: string): name is HashName {
  return Object.prototype.hasOwnProperty.call(HASH_FIELDS, name);
}

export const hashRegistry = {
  available(): HashName[] {
    return Object.keys(HASH_FIELDS).filter(isHashName);
  },

  get(name: string): HashFields {
    if (!isHashName(name)) {
      throw new StoreError('UNKNOWN_HASH', `Unknown calculation hash "${name}"`, undefined, {
        available: hashRegistry.available(),
      });
    }
    return HASH_FIELDS[name];
  },
};

/**
 * Hash of a calculation's own fields combined with its geometry's hash.
 * Row ids never enter the digest, so the value is reproducible from content alone.
 * Provenance and extras are not hashed.
 */
export function calculationHash(
  calc: Calculation,
  geometryHashValue: string,
  name: string = PRIMARY_HASH,
): string {
  const fields = hashRegistry.get(name);
  return sha256(stableStringify({ ...fields(calc), geometry: geometryHashValue }));
}
