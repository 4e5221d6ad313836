/**
 * Zod validation schemas for CLI inputs
 *
 * Commander hands options over as strings; these schemas coerce and bound
 * them before any runtime is built.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/**
 * A decimal integer flag value, e.g. "--concurrency 4".
 */
function integerFlag(flag: string, min: number, max: number) {
  return z
    .string()
    .regex(/^\d+$/, `${flag} must be a whole number`)
    .transform((val) => parseInt(val, 10))
    .refine((val) => val >= min && val <= max, {
      message: `${flag} must be between ${min} and ${max}`,
    });
}

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestOptionsSchema = z.object({
  prune: z.boolean().default(false),
  concurrency: integerFlag('--concurrency', 1, 64).optional(),
});

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(2000, 'Question too long (max 2000 chars)'),
});

// ============================================================================
// SEARCH COMMAND SCHEMA
// ============================================================================

export const SearchArgsSchema = z.object({
  query: z
    .string()
    .trim()
    .min(1, 'Search query cannot be empty')
    .max(500, 'Search query too long (max 500 chars)'),
});

/**
 * `-k` is bounded by retrieval.max_top_k, which is only known once the
 * config is loaded.
 */
export function searchOptionsSchema(maxTopK: number) {
  return z.object({
    k: integerFlag('-k', 1, maxTopK).optional(),
  });
}

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema.
 *
 * @throws ValidationError listing every issue
 *
 * @example
 * ```typescript
 * const { prune, concurrency } = validateInput(IngestOptionsSchema, cmdOptions);
 * ```
 */
export function validateInput<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);

  if (result.success) {
    return result.data;
  }

  const issues = result.error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return `${path}${issue.message}`;
  });
  throw new ValidationError('Invalid command input', issues);
}
