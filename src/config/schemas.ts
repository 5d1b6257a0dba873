/**
 * Schemas for the configuration files. Parsed once at load time; any
 * violation becomes a ConfigurationError.
 */
import { z } from 'zod';

// category-index.json: { field: { rawValue: index } }
export const categoryIndexSchema = z.record(
  z.string(),
  z.record(z.string(), z.number().int())
);

const bandSchema = z.object({
  min: z.number().nullable(),
  max: z.number().nullable(),
  label: z.string().min(1),
});

// continuous-banding.json: { field: { bands, column_name?, min_inclusive?, max_exclusive?, validate? } }
export const bandingFileSchema = z.record(
  z.string(),
  z.object({
    bands: z.array(bandSchema),
    column_name: z.string().min(1).optional(),
    min_inclusive: z.boolean().default(true),
    max_exclusive: z.boolean().default(true),
    // false = skip gap/overlap checks; the first matching band wins
    validate: z.boolean().default(true),
  })
);

const tableRefSchema = z.object({
  file: z.string().min(1),
  keys: z.array(z.string().min(1)).min(1),
  value: z.string().min(1).optional(),
});

const baseSchema = z.union([
  z.object({ value: z.number() }).strict(),
  z.object({ table: z.string().min(1), fields: z.array(z.string().min(1)).min(1).optional() }).strict(),
]);

const factorSchema = z.object({
  name: z.string().min(1),
  table: z.string().min(1),
  fields: z.array(z.string().min(1)).min(1).optional(),
  operation: z.enum(['multiply', 'add']),
  default: z.union([z.number(), z.literal('neutral')]).optional(),
});

// rating.json
export const ratingFileSchema = z.object({
  tables: z.record(z.string(), tableRefSchema).default({}),
  base: baseSchema,
  factors: z.array(factorSchema).default([]),
  rounding: z.number().int().min(0).max(10).optional(),
});

export type BandingFile = z.infer<typeof bandingFileSchema>;
export type RatingFile = z.infer<typeof ratingFileSchema>;

/**
 * Flatten zod issues into one line: `path: message; path: message`.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}
