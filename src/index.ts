/**
 * pagewatch
 *
 * Browser telemetry and analysis engine: classifies console output,
 * correlates network traffic, assembles performance snapshots and
 * aggregates them per monitoring session.
 *
 * Usage:
 * ```typescript
 * import { chromium } from 'playwright-core';
 * import { monitorPage } from 'pagewatch';
 *
 * const browser = await chromium.launch();
 * const page = await browser.newPage();
 * const monitor = monitorPage(page);
 * await page.goto('https://example.com');
 * console.log(monitor.session.getSessionSummary());
 * monitor.stop();
 * ```
 */

import type { Page } from 'playwright-core';
import { TelemetrySession, type TelemetrySessionOptions } from './core/telemetry-session.js';
import {
  attachPageInstrumentation,
  type InstrumentationOptions,
} from './core/playwright-instrumentation.js';
import type { TeardownReport } from './types/telemetry.js';

export * from './types/telemetry.js';

export { EventLog, isBrowserEventType } from './core/event-log.js';
export type { EventLogOptions, EventQuery } from './core/event-log.js';

export { ConsoleMonitor, normalizeConsoleLevel } from './core/console-monitor.js';
export type { ConsoleMonitorOptions } from './core/console-monitor.js';
export {
  CONSOLE_PATTERNS,
  CRITICAL_SEVERITY_SCORE,
  SEVERITY_SCORES,
  severityScore,
} from './core/console-patterns.js';

export { NetworkMonitor, isSuccessful, isError } from './core/network-monitor.js';
export type { NetworkMonitorOptions } from './core/network-monitor.js';
export {
  NETWORK_THRESHOLDS,
  analyzeNetworkIssues,
  calculatePerformanceScore,
  responseTimeBand,
} from './core/network-insights.js';

export {
  PerformanceMonitor,
  VITAL_THRESHOLDS,
  gradeVital,
  gradeScore,
  gradeMemoryUsage,
  memoryUsagePercentage,
  classifyResource,
  analyzeResourceBreakdown,
  rawSnapshotSchema,
} from './core/performance-monitor.js';
export type { PerformanceMonitorOptions, RawSnapshot } from './core/performance-monitor.js';

export { TelemetrySession, consoleSeverity, responseSeverity } from './core/telemetry-session.js';
export type { TelemetrySessionOptions } from './core/telemetry-session.js';

export { TelemetrySessionManager } from './core/session-manager.js';
export type { SessionManagerOptions } from './core/session-manager.js';

export {
  attachPageInstrumentation,
  toNetworkTiming,
  blockedReasonOf,
  PERFORMANCE_SNAPSHOT_SCRIPT,
} from './core/playwright-instrumentation.js';
export type { InstrumentationOptions, DetachFn } from './core/playwright-instrumentation.js';

export { Logger, logger, configureLogger, getLogger } from './utils/logger.js';
export type { LogContext, LoggerConfig, LogLevel } from './utils/logger.js';
export {
  getLogConfig,
  getTelemetryConfig,
  resolveTelemetryConfig,
  validateAllConfigs,
  isConfigValid,
  clearConfigCache,
} from './utils/env-parser.js';
export {
  ConfigValidationError,
  TELEMETRY_LIMITS,
  telemetryConfigSchema,
  telemetryOverridesSchema,
} from './utils/config-schemas.js';
export type { TelemetryConfig } from './utils/config-schemas.js';
export { TimeoutError, withTimeout } from './utils/timeouts.js';

export interface PageMonitor {
  session: TelemetrySession;
  /** Detach from the page and stop the session */
  stop(): TeardownReport;
}

/**
 * Create a session and attach it to a Playwright page in one step
 */
export function monitorPage(
  page: Page,
  options: TelemetrySessionOptions & InstrumentationOptions = {}
): PageMonitor {
  const session = new TelemetrySession(options);
  const detach = attachPageInstrumentation(page, session, {
    autoSnapshot: options.autoSnapshot,
    logger: options.logger,
  });

  return {
    session,
    stop() {
      detach();
      return session.stop();
    },
  };
}
