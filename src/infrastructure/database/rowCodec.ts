import { z } from 'zod';
import { StoreReadError } from '../../core/errors/StoreReadError.js';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Timestamps are stored as ISO-8601 UTC strings, which sort lexicographically
 * in chronological order.
 */
export function encodeTimestamp(date: Date): string {
  return date.toISOString();
}

export const isoTimestamp = z
  .string()
  .refine((value) => !Number.isNaN(Date.parse(value)), 'invalid timestamp')
  .transform((value) => new Date(value));

export const sqliteBoolean = z.union([z.literal(0), z.literal(1)]).transform((value) => value === 1);

export const jsonObjectColumn = z
  .string()
  .nullable()
  .transform((value, ctx): unknown => {
    if (value === null) return undefined;
    try {
      return JSON.parse(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      });
      return z.NEVER;
    }
  })
  .pipe(z.record(z.string(), z.unknown()).optional());

/**
 * Decode a raw row, raising StoreReadError when it does not fit the schema.
 */
export function decodeRow<T extends z.ZodTypeAny>(schema: T, table: string, row: unknown): z.output<T> {
  const result = schema.safeParse(row);
  if (!result.success) {
    const rowId = typeof row === 'object' && row !== null && 'id' in row ? row.id : undefined;
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
      .join('; ');
    throw new StoreReadError(table, rowId, detail);
  }
  return result.data;
}

/**
 * updated_at must move forward on every write, even when two writes land
 * in the same millisecond.
 */
export function nextUpdatedAt(clock: Clock, previous: Date): Date {
  const now = clock();
  return now.getTime() > previous.getTime() ? now : new Date(previous.getTime() + 1);
}

export type ColumnValue = string | number | null;
