// Copyright (c) 2026 DEFNOISE AI — Licensed under AGPL-3.0. See LICENSE.

import { z, type ZodTypeAny } from 'zod';
import { ValidationError } from './errors.js';

/** Query-string value where an empty string means "not given". */
export function optionalQueryParam<T extends ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' ? undefined : value), schema.optional());
}

export const paginationSchema = z.object({
  // Upper bound keeps the offset inside Postgres bigint.
  skip: z.coerce.number().int().min(0).max(Number.MAX_SAFE_INTEGER).default(0),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

/** Path-segment id: plain decimal digits only, so `1e0`, ` 5` and `0x10` are rejected. */
export const idSchema = z
  .string()
  .regex(/^\d+$/, 'Expected a positive integer id')
  .pipe(z.coerce.number().int().positive());

/** Length in characters (code points), the way VARCHAR(n) counts. */
export function characterLength(text: string): number {
  return [...text].length;
}

/** Postgres text columns cannot hold U+0000. */
export function hasNoNul(text: string): boolean {
  return !text.includes('\u0000');
}

/** Text bounded by character count and free of NUL bytes. */
export function storableText(maxChars: number, field: string) {
  return z
    .string()
    .refine((text) => characterLength(text) <= maxChars, {
      message: `${field} must be at most ${maxChars} characters`,
    })
    .refine(hasNoNul, { message: `${field} must not contain NUL characters` });
}

/**
 * Parses `input` with `schema`, turning zod failures into a ValidationError
 * labelled with where the input came from.
 */
export function parseInput<T extends ZodTypeAny>(schema: T, input: unknown, label: string): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`${label} validation failed`, result.error.errors);
  }
  return result.data;
}
