import { z } from 'zod';
import { InvalidArgumentError } from '../errors';
import { SPATIAL_LEVELS, levelForName } from '../constants/spatial-levels';
import type { SpatialLevel } from '../constants/spatial-levels';
import { DOMAINS } from '../constants/domains';
import { parsePeriod } from '../utils/period';

/**
 * Accepts the canonical level names plus the administrative aliases
 * (`emd`/`norm`, `sig`, `sido`) and normalizes to a canonical level.
 */
export const spatialLevelSchema = z
  .string()
  .trim()
  .transform((value, ctx): SpatialLevel => {
    const level = levelForName(value.toLowerCase());
    if (!level) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `level must be one of: ${SPATIAL_LEVELS.join(', ')}`,
      });
      return z.NEVER;
    }
    return level;
  });

export const domainSchema = z.enum(DOMAINS, {
  errorMap: () => ({ message: `domain must be one of: ${DOMAINS.join(', ')}` }),
});

export const regionSchema = z.string().trim().min(1, 'region is required');

export const periodSchema = z
  .string()
  .trim()
  .regex(/^\d{4}(-\d{2}(-\d{2})?)?$/, 'period must be YYYY, YYYY-MM, or YYYY-MM-DD')
  .refine((value) => parsePeriod(value) !== null, 'period is not a valid calendar date');

/**
 * Assert that a Zod safeParse result succeeded, throwing an InvalidArgumentError if not.
 * After calling this, `parsed.data` is type-safe.
 *
 * @example
 * ```ts
 * const parsed = schema.safeParse(body);
 * assertValidated(parsed);
 * // parsed.data is now typed
 * ```
 */
export function assertValidated<Input, Output>(
  parsed: z.SafeParseReturnType<Input, Output>,
  message = 'Validation failed',
): asserts parsed is z.SafeParseSuccess<Output> {
  if (!parsed.success) {
    throw new InvalidArgumentError(
      message,
      parsed.error.issues.map((i) => ({
        field: i.path.join('.'),
        message: i.message,
      })),
    );
  }
}
