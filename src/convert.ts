import fs from 'fs';
import type { z } from 'zod';
import { ConversionError } from './errors';
import { normalizeSymbol } from './hash';
import { calculation as buildCalculation, type Calculation, type Geometry, type Vector3 } from './models';
import {
  ProgramInputSchema,
  ProvenanceSchema,
  ResultsSchema,
  StructureSchema,
  type ProgramInput,
  type QcioProvenance,
  type QcioStructure,
  type Results,
} from './qcio';

export const ANGSTROM_TO_BOHR = 1.8897261259082012;

export type LengthUnit = 'bohr' | 'angstrom';

export interface InternalRecords {
  geometry: Geometry;
  calculation: Calculation;
}

export interface InternalResults extends InternalRecords {
  /** Hartree */
  energy: number;
}

export function parseUnit(unit: string | undefined, field: string): LengthUnit {
  const normalized = (unit ?? 'bohr').trim().toLowerCase();
  if (normalized === 'bohr' || normalized === 'angstrom') {
    return normalized;
  }
  throw new ConversionError(field, `unrecognized length unit "${unit}"`);
}

export function toAngstrom(value: number, unit: LengthUnit): number {
  return unit === 'bohr' ? value / ANGSTROM_TO_BOHR : value;
}

export function toBohr(value: number): number {
  return value * ANGSTROM_TO_BOHR;
}

function parse<S extends z.ZodTypeAny>(schema: S, input: unknown, prefix: string[]): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const path = [...prefix, ...(issue?.path ?? [])].join('.');
    throw new ConversionError(path || 'document', issue?.message ?? 'invalid document');
  }
  return parsed.data;
}

function structureToGeometry(structure: QcioStructure, prefix: string[]): Geometry {
  if (structure.symbols.length !== structure.geometry.length) {
    throw new ConversionError(
      [...prefix, 'structure', 'geometry'].join('.'),
      `${structure.geometry.length} positions for ${structure.symbols.length} symbols`,
    );
  }
  const unit = parseUnit(structure.units, [...prefix, 'structure', 'units'].join('.'));
  return {
    symbols: structure.symbols.map(normalizeSymbol),
    coordinates: structure.geometry.map(
      (xyz): Vector3 => [toAngstrom(xyz[0], unit), toAngstrom(xyz[1], unit), toAngstrom(xyz[2], unit)],
    ),
    charge: structure.charge,
    spin: structure.multiplicity - 1,
  };
}

function programInputToRecords(input: ProgramInput, provenance: QcioProvenance, prefix: string[]): InternalRecords {
  return {
    geometry: structureToGeometry(input.structure, prefix),
    calculation: buildCalculation({
      program: provenance.program,
      method: input.model.method,
      basis: input.model.basis,
      calctype: input.calctype,
      programVersion: provenance.program_version,
      keywords: input.keywords,
      cmdlineArgs: input.cmdline_args,
      files: input.files,
      scratchDir: provenance.scratch_dir,
      wallTime: provenance.wall_time,
      hostname: provenance.hostname,
      hostcpus: provenance.hostcpus,
      hostmem: provenance.hostmem,
      extras: input.extras,
    }),
  };
}

/** Reads a JSON document from disk; unreadable or malformed files are named in the error. */
export function readJsonFile(file: string): unknown {
  let text: string;
  try {
    text = fs.readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ConversionError(file, error instanceof Error ? error.message : String(error));
  }
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new ConversionError(file, `not valid JSON (${error instanceof Error ? error.message : String(error)})`);
  }
}

/** Converts a lone QCIO structure (Bohr unless `units` says otherwise). */
export function fromStructure(structure: unknown): Geometry {
  return structureToGeometry(parse(StructureSchema, structure, ['structure']), []);
}

/**
 * Converts a QCIO ProgramInput into internal records. A ProgramInput names
 * no program, so `provenance` is required: the program and the run details
 * come from it. For a Results document, which carries both, use `fromResults`.
 *
 * @throws ConversionError naming the first offending field
 */
export function toInternal(input: unknown, provenance: unknown): InternalRecords {
  const programInput = parse(ProgramInputSchema, input, []);
  const prov = parse(ProvenanceSchema, provenance, ['provenance']);
  return programInputToRecords(programInput, prov, []);
}

/**
 * Converts successful QCIO Results carrying an energy.
 */
export function fromResults(results: unknown): InternalResults {
  const parsed = parse(ResultsSchema, results, []);
  if (!parsed.success) {
    throw new ConversionError('success', 'results are not from a successful calculation');
  }
  const energy = parsed.data.energy;
  if (energy === undefined || energy === null) {
    throw new ConversionError('data.energy', 'results carry no energy');
  }
  return { ...programInputToRecords(parsed.input_data, parsed.provenance, ['input_data']), energy };
}

/** Rebuilds the modeled part of a ProgramInput; the structure is in Bohr. */
export function toProgramInput(geometry: Geometry, calculation: Calculation): ProgramInput {
  return {
    calctype: calculation.calctype ?? 'energy',
    structure: {
      symbols: [...geometry.symbols],
      geometry: geometry.coordinates.map((xyz): Vector3 => [toBohr(xyz[0]), toBohr(xyz[1]), toBohr(xyz[2])]),
      charge: geometry.charge,
      multiplicity: geometry.spin + 1,
    },
    model: {
      method: calculation.method,
      basis: calculation.basis,
    },
    keywords: calculation.keywords,
    cmdline_args: [...calculation.cmdlineArgs],
    files: { ...calculation.files },
    extras: calculation.extras,
  };
}

export function toProvenance(calculation: Calculation): QcioProvenance {
  return {
    program: calculation.program,
    program_version: calculation.programVersion,
    scratch_dir: calculation.scratchDir,
    wall_time: calculation.wallTime,
    hostname: calculation.hostname,
    hostcpus: calculation.hostcpus,
    hostmem: calculation.hostmem,
  };
}

export interface ExternalRecords {
  geometry: Geometry;
  calculation: Calculation;
  energy: { value: number };
}

export function toResults(records: ExternalRecords): Results {
  return {
    input_data: toProgramInput(records.geometry, records.calculation),
    success: true,
    data: { energy: records.energy.value },
    provenance: toProvenance(records.calculation),
  };
}
