/**
 * Configuration Schemas
 *
 * Zod schemas for runtime configuration and scrape requests. Environment
 * variables and CLI input both go through these for consistent validation.
 */

import { z } from 'zod';
import type { ScrapeRequest } from '../types/index.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Schema for parsing a string as a boolean.
 * Recognizes 'true', '1', 'yes' as true; everything else as false.
 */
export const booleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return false;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as an integer with bounds.
 */
export function integerStringSchema(options?: {
  min?: number;
  max?: number;
  default?: number;
}) {
  const { min, max } = options ?? {};
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  if (options?.default !== undefined) {
    return schema.default(options.default);
  }
  return schema;
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// BROWSER CONFIGURATION
// ============================================

export const browserConfigSchema = z.object({
  headed: booleanStringSchema,
  navigationTimeout: integerStringSchema({ min: 1000, max: 300000, default: 25000 }),
  logsDir: z.string().min(1).default('logs'),
});

export type BrowserEnvConfig = z.infer<typeof browserConfigSchema>;

// ============================================
// SCRAPE REQUEST
// ============================================

export const debugOptionsSchema = z.object({
  headed: z.boolean().default(false),
  slowMoMs: z.number().int().min(0).max(5000).default(0),
  devtools: z.boolean().default(false),
  recordVideoDir: z.string().min(1).nullable().default(null),
  recordHarPath: z.string().min(1).nullable().default(null),
  tracePath: z.string().min(1).nullable().default(null),
  consoleLogPath: z.string().min(1).nullable().default(null),
  logsDir: z.string().min(1).default('logs'),
  pauseOnStart: z.boolean().default(false),
});

export const scrapeRequestSchema = z.object({
  postcode: z
    .string()
    .trim()
    .min(1, { message: 'Postcode is required' })
    .transform((val) => val.toUpperCase()),
  addressHint: z
    .string()
    .nullable()
    .default(null)
    .transform((val) => (val && val.trim() ? val.trim() : null)),
  addressIndex: z.number().int().min(1).default(1),
  moving: z.boolean().nullable().default(null),
  extraFields: z.record(z.string()).default({}),
  maxSteps: z.number().int().min(0).max(50).default(6),
  respectRobots: z.boolean().default(true),
  debug: debugOptionsSchema.default({}),
});

export type ScrapeRequestInput = z.input<typeof scrapeRequestSchema>;

/**
 * Validate a scrape request, filling defaults
 *
 * @throws ConfigValidationError
 */
export function parseScrapeRequest(input: ScrapeRequestInput): ScrapeRequest {
  const result = scrapeRequestSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError('scrapeRequest', result.error);
  }
  return result.data;
}

// ============================================
// ERROR FORMATTING
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
      `Please check your environment variables or command-line options.`
    );
    this.name = 'ConfigValidationError';
  }
}
