import { z } from 'zod';

/**
 * Helper to create an optional field with schema defaults.
 * Both undefined and null are treated as "missing" and converted to {}.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Extension written on relative imports of source modules. */
export const ImportExtensionSchema = z.enum(['.js', '.ts', '']);

/** Additional method predicates, on top of the context-first and async checks. */
export const ValidationSettingsSchema = z.object({
  /** Every method must end with a nullable error result */
  require_terminal_error: z.boolean().default(false),
  /** Every method must produce exactly this many results */
  result_count: z.number().int().min(0).optional(),
});

/** Transaction pattern settings. */
export const TransactionSettingsSchema = z.object({
  /** Interface name → methods that run without a transaction */
  read_only: z.record(z.string(), z.array(z.string())).default({}),
});

/** Root configuration (wrapgen.yaml). */
export const ConfigSchema = z.object({
  /** Symbol name of the context-carrier type every method takes first */
  context_type: z.string().min(1).default('Context'),
  /** Symbol name of the error-carrier type */
  error_type: z.string().min(1).default('Error'),
  import_extension: ImportExtensionSchema.default('.js'),
  /** tsconfig.json used for type resolution, relative to the config file */
  tsconfig: z.string().optional(),
  validation: withDefaults(ValidationSettingsSchema),
  transaction: withDefaults(TransactionSettingsSchema),
});

export type ImportExtension = z.infer<typeof ImportExtensionSchema>;
export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type TransactionSettings = z.infer<typeof TransactionSettingsSchema>;
export type Config = z.infer<typeof ConfigSchema>;
