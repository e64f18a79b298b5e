import { z } from 'zod';
import type { Coordinates } from '@pipjoin/core';

// Drivers disagree on numeric columns: pg returns count(*) and NUMERIC as strings,
// sqlite returns numbers.
const countSchema = z.union([
  z.number().int().nonnegative(),
  z.bigint().nonnegative().transform(Number),
  z
    .string()
    .regex(/^\d+$/, 'not a non-negative integer')
    .transform(Number),
]);

const identifierSchema = z.union([z.string().min(1), z.number().int(), z.bigint()]).transform(String);

const coordinateSchema = z.union([
  z.string().regex(/^-?\d+(\.\d+)?$/, 'not a decimal number'),
  z.number().finite().transform(String),
]);

const countRowSchema = z.object({ total: countSchema });
const idRowSchema = z.object({ id: identifierSchema });
const pointRowSchema = z.object({ longitude: coordinateSchema, latitude: coordinateSchema });

function describe(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(row)'}: ${issue.message}`).join('; ');
}

/** Total record count from the rows of the count query. */
export function toTotal(rows: readonly unknown[]): number {
  const parsed = countRowSchema.safeParse(rows[0]);
  if (!parsed.success) {
    throw new Error(`malformed count row: ${describe(parsed.error)}`);
  }
  return parsed.data.total;
}

export function toIdentifiers(rows: readonly unknown[]): string[] {
  return rows.map((row, position) => {
    const parsed = idRowSchema.safeParse(row);
    if (!parsed.success) {
      throw new Error(`malformed id row ${String(position)}: ${describe(parsed.error)}`);
    }
    return parsed.data.id;
  });
}

/** Coordinates of a point row. Text values are kept as stored. */
export function toCoordinates(row: unknown): Coordinates {
  const parsed = pointRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new Error(`malformed point row: ${describe(parsed.error)}`);
  }
  return parsed.data;
}
