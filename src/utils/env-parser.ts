/**
 * Environment Variable Parser
 *
 * Type-safe environment variable parsing with validation.
 * Centralizes all env var access and provides clear error messages
 * for misconfiguration.
 */

import {
  logConfigSchema,
  telemetryConfigSchema,
  telemetryOverridesSchema,
  ConfigValidationError,
  type LogConfig,
  type TelemetryConfig,
} from './config-schemas.js';

// ============================================
// ENVIRONMENT VARIABLE MAPPING
// ============================================

function mapEnvToLogConfig() {
  return {
    level: process.env.LOG_LEVEL,
    prettyPrint: process.env.LOG_PRETTY,
  };
}

function mapEnvToTelemetryConfig() {
  return {
    maxEvents: process.env.PAGEWATCH_MAX_EVENTS,
    timelineSize: process.env.PAGEWATCH_TIMELINE_SIZE,
    criticalIssueLimit: process.env.PAGEWATCH_CRITICAL_ISSUE_LIMIT,
    textPreviewLength: process.env.PAGEWATCH_TEXT_PREVIEW_LENGTH,
    snapshotTimeoutMs: process.env.PAGEWATCH_SNAPSHOT_TIMEOUT_MS,
    autoSnapshot: process.env.PAGEWATCH_AUTO_SNAPSHOT,
  };
}

// ============================================
// INDIVIDUAL CONFIG PARSERS
// ============================================

/**
 * Parse and validate logging configuration from environment.
 */
export function parseLogConfig(): LogConfig {
  const result = logConfigSchema.safeParse(mapEnvToLogConfig());
  if (!result.success) {
    throw new ConfigValidationError('logging', result.error);
  }
  return result.data;
}

/**
 * Parse and validate telemetry configuration from environment.
 */
export function parseTelemetryConfig(): TelemetryConfig {
  const result = telemetryConfigSchema.safeParse(mapEnvToTelemetryConfig());
  if (!result.success) {
    throw new ConfigValidationError('telemetry', result.error);
  }
  return result.data;
}

// ============================================
// CONFIG CACHING
// ============================================

let cachedLogConfig: LogConfig | null = null;
let cachedTelemetryConfig: TelemetryConfig | null = null;

/**
 * Get cached log configuration (parses once on first call).
 */
export function getLogConfig(): LogConfig {
  if (!cachedLogConfig) {
    cachedLogConfig = parseLogConfig();
  }
  return cachedLogConfig;
}

/**
 * Get cached telemetry configuration (parses once on first call).
 */
export function getTelemetryConfig(): TelemetryConfig {
  if (!cachedTelemetryConfig) {
    cachedTelemetryConfig = parseTelemetryConfig();
  }
  return cachedTelemetryConfig;
}

/**
 * Resolve the configuration for one session: environment values with
 * per-session overrides on top. Overrides that are undefined fall through
 * to the environment value.
 *
 * @throws ConfigValidationError if an override is out of range.
 */
export function resolveTelemetryConfig(overrides: Partial<TelemetryConfig> = {}): TelemetryConfig {
  const result = telemetryOverridesSchema.safeParse(overrides);
  if (!result.success) {
    throw new ConfigValidationError('telemetry overrides', result.error);
  }

  const base = getTelemetryConfig();
  const parsed = result.data;
  return {
    maxEvents: parsed.maxEvents ?? base.maxEvents,
    timelineSize: parsed.timelineSize ?? base.timelineSize,
    criticalIssueLimit: parsed.criticalIssueLimit ?? base.criticalIssueLimit,
    textPreviewLength: parsed.textPreviewLength ?? base.textPreviewLength,
    snapshotTimeoutMs: parsed.snapshotTimeoutMs ?? base.snapshotTimeoutMs,
    autoSnapshot: parsed.autoSnapshot ?? base.autoSnapshot,
  };
}

/**
 * Clear all cached configurations.
 * Useful for testing when environment variables change.
 */
export function clearConfigCache(): void {
  cachedLogConfig = null;
  cachedTelemetryConfig = null;
}

// ============================================
// VALIDATION HELPERS
// ============================================

type ConfigSection = 'log' | 'telemetry';

const parsers: Record<ConfigSection, () => unknown> = {
  log: parseLogConfig,
  telemetry: parseTelemetryConfig,
};

/**
 * Validate all configurations at startup.
 *
 * @throws ConfigValidationError if any configuration is invalid.
 */
export function validateAllConfigs(sections: ConfigSection[] = ['log', 'telemetry']): void {
  for (const section of sections) {
    parsers[section]();
  }
}

/**
 * Check if a configuration section is valid without throwing.
 */
export function isConfigValid(section: ConfigSection): { valid: boolean; error?: string } {
  try {
    parsers[section]();
    return { valid: true };
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      return { valid: false, error: error.message };
    }
    return { valid: false, error: String(error) };
  }
}
