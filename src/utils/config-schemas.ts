/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for runtime validation of environment variables,
 * the config file, CLI arguments and crawler options.
 */

import { z } from 'zod';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true and 'false', '0', 'no' as false;
 * anything else (including unset) falls through to the default.
 */
export function booleanStringSchema(defaultVal: boolean) {
  return z
    .string()
    .optional()
    .transform((val) => {
      if (!val) return defaultVal;
      const normalized = val.toLowerCase();
      if (['true', '1', 'yes'].includes(normalized)) return true;
      if (['false', '0', 'no'].includes(normalized)) return false;
      return defaultVal;
    });
}

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options: { min?: number; max?: number; default: number }) {
  let schema = z.coerce.number().int();

  if (options.min !== undefined) schema = schema.min(options.min);
  if (options.max !== undefined) schema = schema.max(options.max);

  return schema.default(options.default);
}

/**
 * Schema for an absolute http(s) URL.
 */
export const httpUrlSchema = z
  .string()
  .url()
  .refine((url) => /^https?:\/\//i.test(url), {
    message: 'Must be an http:// or https:// URL',
  });

// ============================================
// LOG CONFIGURATION
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema(false),
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// CRAWLER CONFIGURATION
// ============================================

export const crawlerConfigSchema = z.object({
  headless: booleanStringSchema(true),
  timeout: integerStringSchema({ min: 1000, max: 300000, default: 30000 }),
  details: booleanStringSchema(true),
  output: z.string().min(1).default('results.json'),
  waitAttempts: integerStringSchema({ min: 1, max: 120, default: 10 }),
  pollIntervalMs: integerStringSchema({ min: 0, max: 60000, default: 1000 }),
  detailDelayMs: integerStringSchema({ min: 0, max: 60000, default: 300 }),
  userAgent: z.string().min(1).optional(),
});

export type CrawlerConfig = z.infer<typeof crawlerConfigSchema>;

// ============================================
// CRAWL OPTIONS
// ============================================

export const yearSchema = z.number().int().min(1900).max(2100);

/**
 * Options every crawl needs. Issues are validated separately by the
 * issue-spec parser so its errors keep their own types.
 */
export const crawlOptionsSchema = z.object({
  url: httpUrlSchema,
  year: yearSchema,
  getDetails: z.boolean().default(false),
  headless: z.boolean().default(true),
  timeout: z.number().int().min(1000).max(300000).default(30000),
});


// ============================================
// ERRORS
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your arguments, environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse with a schema, throwing ConfigValidationError on failure.
 */
export function parseConfig<T extends z.ZodTypeAny>(
  schema: T,
  section: string,
  input: unknown
): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError(section, result.error);
  }
  return result.data;
}
