import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * In Zod 4, .default({}) doesn't work for objects with inner defaults.
 * This helper makes the field optional and applies schema defaults when undefined.
 * Note: Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

/** Search output settings. */
export const SearchSettingsSchema = z.object({
  /** Maximum number of results to show (unlimited when absent) */
  limit: z.number().int().positive().optional(),
});

/** Complete .cookfind.yaml schema. An empty file reads as all defaults. */
export const ConfigSchema = withDefaults(z.object({
  /** Search roots, tried in order by fetch; the first one is searched by default */
  roots: z.array(z.string().min(1)).min(1).default(['.']),
  log_level: LogLevelSchema.default('info'),
  search: withDefaults(SearchSettingsSchema),
}));

export type Config = z.infer<typeof ConfigSchema>;
export type SearchSettings = z.infer<typeof SearchSettingsSchema>;
