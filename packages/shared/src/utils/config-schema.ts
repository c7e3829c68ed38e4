/**
 * Zod schema for root scope options.
 *
 * Omitted fields fall back to defaults; only values that cannot work
 * (an empty separator, a non-positive interval) are rejected.
 */

import { z } from "zod";

export const DEFAULT_SEPARATOR = ".";
export const DEFAULT_REPORT_INTERVAL_MS = 1000;

export const BucketsSchema = z.object({
  kind: z.enum(["value", "duration"]),
  upperBounds: z
    .array(z.number().finite())
    .min(1, "At least one bucket bound is required")
    .refine(
      (bounds) => bounds.every((bound, i) => i === 0 || bound > bounds[i - 1]),
      "Bucket bounds must be strictly ascending",
    ),
});

export const RootScopeOptionsSchema = z.object({
  prefix: z.string().optional().default(""),
  separator: z.string().min(1, "Separator must not be empty").optional().default(DEFAULT_SEPARATOR),
  tags: z.record(z.string()).nullish().transform((tags) => tags ?? {}),
  reportIntervalMs: z
    .number()
    .int()
    .positive("Report interval must be positive")
    .optional()
    .default(DEFAULT_REPORT_INTERVAL_MS),
  defaultBuckets: BucketsSchema.optional(),
});

export type ValidatedRootScopeOptions = z.infer<typeof RootScopeOptionsSchema>;
