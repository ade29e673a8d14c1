import { z } from 'zod';
import { BadRequestError, FieldErrors, ValidationError } from './errors.js';

export const REQUIRED_MESSAGE = 'This field is required.';
export const INTEGER_MESSAGE = 'A valid integer is required.';

function isMissing(value: unknown): boolean {
  return value === undefined || value === null || value === '';
}

/**
 * Whole numbers given as JSON numbers or digit strings. Fractions, booleans
 * and anything else are rejected rather than rounded.
 */
export const wholeNumber = z.unknown().transform((value, ctx): number => {
  if (isMissing(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: REQUIRED_MESSAGE });
    return z.NEVER;
  }
  const n =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && /^\s*-?\d+\s*$/.test(value)
        ? Number(value)
        : Number.NaN;
  if (!Number.isSafeInteger(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: INTEGER_MESSAGE });
    return z.NEVER;
  }
  return n;
});

/** Primary-key references. A fractional id is truncated to its integer part. */
export const primaryKey = z.unknown().transform((value, ctx): number => {
  if (isMissing(value)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: REQUIRED_MESSAGE });
    return z.NEVER;
  }
  const n =
    typeof value === 'number'
      ? Math.trunc(value)
      : typeof value === 'string' && /^\s*\d+\s*$/.test(value)
        ? Number(value)
        : Number.NaN;
  if (!Number.isSafeInteger(n) || n < 1) {
    const received = Array.isArray(value) ? 'list' : typeof value;
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Incorrect type. Expected pk value, received ${received}.`,
    });
    return z.NEVER;
  }
  return n;
});

export function fieldErrors(error: z.ZodError): FieldErrors {
  const fields: FieldErrors = {};
  const push = (key: string, message: string) => {
    (fields[key] ??= []).push(message);
  };
  for (const issue of error.issues) {
    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) push(key, 'This field is not allowed.');
      continue;
    }
    const key = issue.path.length ? issue.path.join('.') : 'non_field_errors';
    // zod reports a missing key as "Required"
    const message = issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined'
      ? REQUIRED_MESSAGE
      : issue.message;
    push(key, message);
  }
  return fields;
}

/** Parses `input` or throws a ValidationError naming every bad field. */
export function parseWith<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) throw new ValidationError(fieldErrors(result.error));
  return result.data;
}

/** Path ids: digits only. */
export function parsePathId(raw: string): number | null {
  if (!/^\d+$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
}

export function requirePathId(raw: string, label: string): number {
  const id = parsePathId(raw);
  if (id === null) throw new BadRequestError(`Invalid ${label} ID format: ${raw}`);
  return id;
}
