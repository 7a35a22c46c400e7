import { z } from 'zod';
import { ValidationError } from '../errors';

/**
 * Parse a submitted form against a schema, throwing a ValidationError that
 * carries per-field messages when it does not match.
 */
export function parseForm<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return result.data;
  }

  const fields: Record<string, string[]> = {};
  for (const issue of result.error.issues) {
    const field = issue.path.length > 0 ? String(issue.path[0]) : 'form';
    (fields[field] ??= []).push(issue.message);
  }
  throw new ValidationError(fields);
}

/** Route ids are positive 32-bit integers (the serial column's range); anything else names no record. */
export const idParamSchema = z.coerce.number().int().positive().max(2147483647);
