/**
 * QCIO document shapes accepted and emitted by the adapter.
 *
 * Only the fields calcstore models are declared; anything else in an
 * incoming document (structure identifiers and connectivity, result data
 * besides the energy, logs, tracebacks) is dropped on parsing.
 * Structure geometries are in Bohr unless `units` says otherwise.
 */
import { z } from 'zod';
import { jsonObjectSchema } from './codec';

const finite = z.number().finite();

export const StructureSchema = z.object({
  symbols: z.array(z.string()).min(1),
  geometry: z.array(z.tuple([finite, finite, finite])),
  charge: z.number().int().default(0),
  multiplicity: z.number().int().positive().default(1),
  /** Not part of QCIO proper: lets callers hand over Angstrom structures. */
  units: z.string().optional(),
});

export const ModelSchema = z.object({
  method: z.string().trim().min(1),
  basis: z.string().nullable().default(null),
});

export const ProgramInputSchema = z.object({
  calctype: z.string().default('energy'),
  structure: StructureSchema,
  model: ModelSchema,
  keywords: jsonObjectSchema.default({}),
  cmdline_args: z.array(z.string()).default([]),
  files: z.record(z.string()).default({}),
  extras: jsonObjectSchema.default({}),
});

export const ProvenanceSchema = z.object({
  program: z.string().trim().min(1),
  program_version: z.string().nullable().default(null),
  scratch_dir: z.string().nullable().default(null),
  wall_time: z.number().nonnegative().nullable().default(null),
  hostname: z.string().nullable().default(null),
  hostcpus: z.number().int().nonnegative().nullable().default(null),
  hostmem: z.number().int().nonnegative().nullable().default(null),
});

export const ResultsSchema = z.object({
  input_data: ProgramInputSchema,
  success: z.boolean(),
  data: z
    .object({
      energy: z.number().finite().nullable().optional(),
    })
    .default({}),
  provenance: ProvenanceSchema,
});

export type QcioStructure = z.infer<typeof StructureSchema>;
export type QcioModel = z.infer<typeof ModelSchema>;
export type ProgramInput = z.infer<typeof ProgramInputSchema>;
export type QcioProvenance = z.infer<typeof ProvenanceSchema>;
export type Results = z.infer<typeof ResultsSchema>;
