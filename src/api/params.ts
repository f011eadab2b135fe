import { z } from 'zod';
import { SOURCE_TYPES } from '../source/adapter.js';
import { ValidationError } from '../shared/errors.js';

export const SourceTypeParam = z.enum(SOURCE_TYPES);

export function pageQuery(defaultLimit: number) {
  return z.object({
    limit: z.coerce.number().int().min(1).max(500).default(defaultLimit),
    offset: z.coerce.number().int().min(0).default(0),
  });
}

export const BooleanParam = z.enum(['true', 'false']).transform((v) => v === 'true');

/**
 * Validate query, path or body input against a schema.
 *
 * @throws ValidationError with zod's field errors
 */
export function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, what = 'request'): z.output<T> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new ValidationError(`Invalid ${what}`, { errors: parsed.error.flatten().fieldErrors });
  }
  return parsed.data;
}
