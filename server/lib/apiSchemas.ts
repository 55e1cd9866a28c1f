/**
 * Zod schemas for Elexon BMRS API responses.
 *
 * These validate the shape of JSON payloads at the system boundary. Unlike a
 * lenient "log and degrade" check, a mismatch here rejects the whole response:
 * a half-parsed fuel mix would slip past the quality filter.
 */

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Actual generation per type  (generation/actual/per-type)
// ---------------------------------------------------------------------------

/** One fuel-type reading inside a settlement period. */
export const FuelTypeEntrySchema = z
  .object({
    psrType: z.string().trim().min(1),
    quantity: z.number().finite().nonnegative(),
  })
  .passthrough();

/** One settlement period. A missing `data` list means no fuel types reported. */
export const GenerationPeriodSchema = z
  .object({
    startTime: z
      .string()
      .refine((value) => Number.isFinite(Date.parse(value)), { message: 'startTime is not an ISO-8601 timestamp' }),
    settlementPeriod: z.number().int().optional(),
    data: z.array(FuelTypeEntrySchema).default([]),
  })
  .passthrough();

export const GenerationPerTypeResponseSchema = z
  .object({
    data: z.array(GenerationPeriodSchema),
  })
  .passthrough();

export type FuelTypeEntry = z.infer<typeof FuelTypeEntrySchema>;
export type GenerationPeriod = z.infer<typeof GenerationPeriodSchema>;
export type GenerationPerTypeResponse = z.infer<typeof GenerationPerTypeResponseSchema>;

// ---------------------------------------------------------------------------
// Validation helper
// ---------------------------------------------------------------------------

export type SchemaCheck<T> = { ok: true; data: T } | { ok: false; issues: string[] };

/** Validates `payload`, flattening at most `maxIssues` zod issues into `path: message` strings. */
export function checkApiResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, maxIssues = 5): SchemaCheck<T> {
  const result = schema.safeParse(payload);
  if (result.success) return { ok: true, data: result.data };
  const issues = result.error.issues.slice(0, maxIssues).map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
  return { ok: false, issues };
}
