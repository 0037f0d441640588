import { z } from 'zod';

import { InvalidIntervalError } from '../errors';

const intervalSchema = z.number().finite().positive();

/** Due times may be zero: a one-shot scheduled for the past fires as soon as possible. */
const dueTimeSchema = z.number().finite().nonnegative();

function parseWith(schema: z.ZodNumber, value: number): number {
  const result = schema.safeParse(value);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => issue.message).join('; ');
    throw new InvalidIntervalError(value, detail);
  }
  return result.data;
}

export function parseInterval(value: number): number {
  return parseWith(intervalSchema, value);
}

export function parseDueTime(value: number): number {
  return parseWith(dueTimeSchema, value);
}
