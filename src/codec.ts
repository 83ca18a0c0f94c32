import { z } from 'zod';
import { StoreError } from './errors';
import type { JsonObject, JsonValue, Vector3 } from './models';

const BYTES_PER_FLOAT = 8;

/** Packs (n, 3) coordinates into a little-endian float64 blob. */
export function coordinatesToBuffer(coordinates: Vector3[]): Buffer {
  const buffer = Buffer.alloc(coordinates.length * 3 * BYTES_PER_FLOAT);
  coordinates.forEach((xyz, atom) => {
    xyz.forEach((value, axis) => {
      buffer.writeDoubleLE(value, (atom * 3 + axis) * BYTES_PER_FLOAT);
    });
  });
  return buffer;
}

export function bufferToCoordinates(buffer: Buffer): Vector3[] {
  if (buffer.byteLength % (3 * BYTES_PER_FLOAT) !== 0) {
    throw new StoreError('INVALID_RECORD', `Coordinate blob of ${buffer.byteLength} bytes is not (n, 3) float64`);
  }
  const coordinates: Vector3[] = [];
  for (let offset = 0; offset < buffer.byteLength; offset += 3 * BYTES_PER_FLOAT) {
    coordinates.push([
      buffer.readDoubleLE(offset),
      buffer.readDoubleLE(offset + BYTES_PER_FLOAT),
      buffer.readDoubleLE(offset + 2 * BYTES_PER_FLOAT),
    ]);
  }
  return coordinates;
}

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema),
  ]),
);

export const jsonObjectSchema: z.ZodType<JsonObject> = z.record(jsonValueSchema);

/** Parses a JSON text column and checks its shape. */
export function parseJsonColumn<T>(schema: z.ZodType<T>, text: string, column: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new StoreError('INVALID_RECORD', `Column ${column} does not hold JSON`, undefined, { cause: error });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new StoreError('INVALID_RECORD', `Column ${column} has an unexpected shape: ${parsed.error.message}`);
  }
  return parsed.data;
}
