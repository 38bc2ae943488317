/**
 * Configuration Schemas
 *
 * Centralized Zod schemas for type-safe runtime configuration validation.
 * All environment variable parsing goes through these schemas for consistent
 * validation and clear error messages.
 */

import { z } from 'zod';
import { TIMEOUTS } from './timeouts.js';

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
 * Schema for an optional boolean string that falls back to `true` when unset.
 */
export const booleanStringDefaultTrueSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (!val) return true;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Schema for parsing a string as a bounded integer with a default.
 */
export function integerStringSchema(options: { min: number; max: number; default: number }) {
  return z.coerce.number().int().min(options.min).max(options.max).default(options.default);
}

// ============================================
// LOG LEVEL SCHEMA
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const logConfigSchema = z.object({
  level: logLevelSchema.default('info'),
  prettyPrint: booleanStringSchema,
});

export type LogConfig = z.infer<typeof logConfigSchema>;

// ============================================
// TELEMETRY CONFIGURATION
// ============================================

/** Bounds shared by environment values and per-session overrides */
export const TELEMETRY_LIMITS = {
  maxEvents: { min: 100, max: 1_000_000, default: 10_000 },
  timelineSize: { min: 1, max: 20, default: 20 },
  criticalIssueLimit: { min: 1, max: 100, default: 10 },
  textPreviewLength: { min: 10, max: 10_000, default: 100 },
  snapshotTimeoutMs: { min: 100, max: 120_000, default: TIMEOUTS.PERFORMANCE_SNAPSHOT },
} as const;

export const telemetryConfigSchema = z.object({
  /** Events retained in a session's event log before the oldest are dropped */
  maxEvents: integerStringSchema(TELEMETRY_LIMITS.maxEvents),
  /** Entries in exported timelines */
  timelineSize: integerStringSchema(TELEMETRY_LIMITS.timelineSize),
  /** Critical issues listed in a console analysis */
  criticalIssueLimit: integerStringSchema(TELEMETRY_LIMITS.criticalIssueLimit),
  /** Characters kept when message text is previewed */
  textPreviewLength: integerStringSchema(TELEMETRY_LIMITS.textPreviewLength),
  /** Upper bound on one performance snapshot round-trip */
  snapshotTimeoutMs: integerStringSchema(TELEMETRY_LIMITS.snapshotTimeoutMs),
  /** Collect a performance snapshot on every page load */
  autoSnapshot: booleanStringDefaultTrueSchema,
});

function boundedInteger(limits: { min: number; max: number }) {
  return z.number().int().min(limits.min).max(limits.max).optional();
}

/**
 * Per-session overrides, already typed, held to the same bounds as the
 * environment values.
 */
export const telemetryOverridesSchema = z.object({
  maxEvents: boundedInteger(TELEMETRY_LIMITS.maxEvents),
  timelineSize: boundedInteger(TELEMETRY_LIMITS.timelineSize),
  criticalIssueLimit: boundedInteger(TELEMETRY_LIMITS.criticalIssueLimit),
  textPreviewLength: boundedInteger(TELEMETRY_LIMITS.textPreviewLength),
  snapshotTimeoutMs: boundedInteger(TELEMETRY_LIMITS.snapshotTimeoutMs),
  autoSnapshot: z.boolean().optional(),
});

export type TelemetryConfig = z.infer<typeof telemetryConfigSchema>;

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
      `Please check your environment variables or configuration file.`
    );
    this.name = 'ConfigValidationError';
  }
}
