/**
 * Stock converters for property tree values.
 *
 * Tree values are always text; these zod schemas turn that text into typed
 * values. Any zod schema that accepts a string can be used the same way.
 *
 * @module tree/coerce
 */

import { z } from 'zod';

const numeric = z
  .string()
  .trim()
  .min(1, 'Expected a number, received empty text')
  .pipe(z.coerce.number().finite());

export const TreeValue = {
  /** The raw text. */
  string: z.string(),
  /** A finite number; empty text is rejected. */
  number: numeric,
  /** A whole number. */
  integer: numeric.pipe(z.number().int()),
  /** `true`/`false`, or `1`/`0`. */
  boolean: z
    .string()
    .trim()
    .pipe(z.enum(['true', 'false', '1', '0']))
    .transform((value) => value === 'true' || value === '1'),
} as const;
