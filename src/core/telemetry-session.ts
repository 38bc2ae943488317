/**
 * Telemetry Session
 *
 * One monitoring session over one page. Routes every raw browser signal to
 * the monitor that owns it, records it in the session's event log and
 * notifies subscribers.
 *
 * Sessions share no state. Ingestion never throws; once stopped, a session
 * ignores further signals.
 */

import { randomUUID } from 'node:crypto';
import type {
  BrowserEvent,
  BrowserEventType,
  ClockFn,
  ConsoleLevel,
  ConsoleMessage,
  EventData,
  EventSeverity,
  PerformanceMetrics,
  PerformanceProbe,
  RawConsoleEvent,
  RawNavigationEvent,
  RawPageError,
  RawRequestEvent,
  RawRequestFailure,
  RawResponseEvent,
  SessionEventListener,
  SessionExport,
  SessionSummary,
  TeardownReport,
} from '../types/telemetry.js';
import { EventLog } from './event-log.js';
import { ConsoleMonitor } from './console-monitor.js';
import { NetworkMonitor } from './network-monitor.js';
import { PerformanceMonitor } from './performance-monitor.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { sessionStoppedMessage } from '../utils/error-messages.js';
import { resolveTelemetryConfig } from '../utils/env-parser.js';
import type { TelemetryConfig } from '../utils/config-schemas.js';
import { monotonicNow } from '../utils/clock.js';

export interface TelemetrySessionOptions {
  sessionId?: string;
  clock?: ClockFn;
  /** Used by the session and all of its monitors */
  logger?: Logger;
  /** Overrides on top of the environment configuration */
  config?: Partial<TelemetryConfig>;
}

/**
 * Event severity of a console message, derived from its level
 */
export function consoleSeverity(level: ConsoleLevel): EventSeverity {
  switch (level) {
    case 'error':
    case 'assert':
      return 'error';
    case 'warning':
      return 'warning';
    case 'debug':
      return 'debug';
    default:
      return 'info';
  }
}

export function responseSeverity(status: number): EventSeverity {
  return status >= 400 ? 'warning' : 'info';
}

export class TelemetrySession {
  readonly sessionId: string;
  readonly startedAt: number;
  readonly config: TelemetryConfig;

  readonly events: EventLog;
  readonly console: ConsoleMonitor;
  readonly network: NetworkMonitor;
  readonly performance: PerformanceMonitor;

  private active = true;
  private stoppedAt: number | null = null;
  private listeners: Map<BrowserEventType | '*', Set<SessionEventListener>> = new Map();
  private readonly clock: ClockFn;
  private readonly log: Logger;

  constructor(options: TelemetrySessionOptions = {}) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.clock = options.clock ?? monotonicNow;
    this.log = options.logger ?? rootLogger.session;
    this.config = resolveTelemetryConfig(options.config);
    this.startedAt = this.clock();

    const shared = { clock: this.clock, logger: options.logger };
    this.events = new EventLog({ ...shared, maxEvents: this.config.maxEvents });
    this.console = new ConsoleMonitor({
      ...shared,
      criticalIssueLimit: this.config.criticalIssueLimit,
      timelineSize: this.config.timelineSize,
      textPreviewLength: this.config.textPreviewLength,
    });
    this.network = new NetworkMonitor({ ...shared, timelineSize: this.config.timelineSize });
    this.performance = new PerformanceMonitor({
      ...shared,
      snapshotTimeoutMs: this.config.snapshotTimeoutMs,
      timelineSize: this.config.timelineSize,
    });

    this.log.info('Telemetry session started', { sessionId: this.sessionId });
  }

  get isActive(): boolean {
    return this.active;
  }

  // ============================================
  // INGESTION
  // ============================================

  handleConsoleMessage(raw: RawConsoleEvent): ConsoleMessage | null {
    if (!this.accepting('console message')) return null;

    const message = this.console.addMessage(raw);
    this.record(
      'console',
      {
        level: message.level,
        text: message.text,
        category: message.category,
        severityScore: message.severityScore,
        location: message.location,
      },
      consoleSeverity(message.level),
      'console_monitor'
    );
    return message;
  }

  handlePageError(raw: RawPageError): ConsoleMessage | null {
    if (!this.accepting('page error')) return null;

    const message = this.console.addPageError(raw);
    this.record(
      'error',
      {
        message: message.text,
        stack: message.stackTrace,
        category: message.category,
      },
      'error',
      'page_error'
    );
    return message;
  }

  /**
   * Returns the id the request is tracked under, or null when stopped
   */
  handleRequest(raw: RawRequestEvent): string | null {
    if (!this.accepting('request')) return null;

    const requestId = this.network.addRequest(raw);
    this.record(
      'network',
      {
        phase: 'request',
        requestId,
        url: raw.url,
        method: raw.method ?? 'GET',
        resourceType: raw.resourceType ?? 'other',
      },
      'info',
      'network_monitor'
    );
    return requestId;
  }

  handleResponse(requestId: string, raw: RawResponseEvent): void {
    if (!this.accepting('response')) return;

    // Unmatched responses are logged by the monitor and not recorded
    const request = this.network.addResponse(requestId, raw);
    if (!request) return;

    this.record(
      'network',
      {
        phase: 'response',
        requestId,
        url: request.url,
        status: raw.status,
        duration: request.duration,
        cacheHit: request.cacheHit,
      },
      responseSeverity(raw.status),
      'network_monitor'
    );
  }

  handleRequestFailed(requestId: string, raw: RawRequestFailure): void {
    if (!this.accepting('request failure')) return;

    const request = this.network.addRequestFailure(requestId, raw);
    if (!request) return;

    this.record(
      'network',
      {
        phase: 'failure',
        requestId,
        url: request.url,
        error: raw.error,
        blockedReason: raw.blockedReason,
      },
      'error',
      'network_monitor'
    );
  }

  handleNavigation(raw: RawNavigationEvent): void {
    if (!this.accepting('navigation')) return;

    this.record(
      'navigation',
      { url: raw.url, title: raw.title, trigger: raw.trigger ?? 'navigation' },
      'info',
      'browser'
    );
  }

  recordInteraction(action: string, details: EventData = {}): void {
    if (!this.accepting('interaction')) return;

    this.record('interaction', { ...details, action }, 'info', 'user');
  }

  /**
   * Take a performance snapshot through the probe. Resolves to null when
   * the session is already stopped.
   */
  async collectPerformance(
    probe: PerformanceProbe,
    url?: string
  ): Promise<PerformanceMetrics | null> {
    if (!this.accepting('performance snapshot')) return null;

    const metrics = await this.performance.collectSnapshot(probe, url);
    if (this.active) {
      this.record(
        'performance',
        {
          url: metrics.url,
          pageLoadTime: metrics.pageLoadTime,
          domContentLoaded: metrics.domContentLoaded,
          firstContentfulPaint: metrics.firstContentfulPaint,
          largestContentfulPaint: metrics.largestContentfulPaint,
          cumulativeLayoutShift: metrics.cumulativeLayoutShift,
        },
        'info',
        'performance_monitor'
      );
    }
    return metrics;
  }

  private accepting(signal: string): boolean {
    if (this.active) return true;
    this.log.debug(sessionStoppedMessage(this.sessionId, signal), { sessionId: this.sessionId });
    return false;
  }

  private record(
    eventType: BrowserEventType,
    data: EventData,
    severity: EventSeverity,
    source: string
  ): void {
    const event = this.events.record(eventType, data, severity, source);
    if (event) {
      this.emit(event);
    }
  }

  // ============================================
  // SUBSCRIPTIONS
  // ============================================

  /**
   * Subscribe to recorded events of one type, or all of them with '*'.
   * Returns an unsubscribe function.
   */
  on(eventType: BrowserEventType | '*', listener: SessionEventListener): () => void {
    let set = this.listeners.get(eventType);
    if (!set) {
      set = new Set();
      this.listeners.set(eventType, set);
    }
    set.add(listener);
    return () => {
      this.listeners.get(eventType)?.delete(listener);
    };
  }

  private emit(event: BrowserEvent): void {
    const targets = [
      ...(this.listeners.get(event.eventType) ?? []),
      ...(this.listeners.get('*') ?? []),
    ];
    for (const listener of targets) {
      try {
        listener(event);
      } catch (error) {
        this.log.error('Session listener error', {
          sessionId: this.sessionId,
          eventType: event.eventType,
          error,
        });
      }
    }
  }

  // ============================================
  // REPORTING
  // ============================================

  get sessionDuration(): number {
    return (this.stoppedAt ?? this.clock()) - this.startedAt;
  }

  getSessionSummary(): SessionSummary {
    const consoleAnalysis = this.console.getAnalysis();
    const networkAnalysis = this.network.getAnalysis();

    return {
      sessionId: this.sessionId,
      startedAt: this.startedAt,
      sessionDuration: this.sessionDuration,
      totalEvents: this.events.totalRecorded,
      console: {
        total: consoleAnalysis.totalMessages,
        errors: consoleAnalysis.errorCount,
        warnings: consoleAnalysis.warningCount,
        info: consoleAnalysis.infoCount,
        critical: this.console.getCriticalIssues().length,
      },
      network: {
        totalRequests: networkAnalysis.totalRequests,
        successfulRequests: networkAnalysis.successfulRequests,
        failedRequests: networkAnalysis.failedRequests,
        pendingRequests: this.network.pendingCount,
        statusCodes: networkAnalysis.statusCodes,
        performanceScore: networkAnalysis.performanceScore,
      },
      performance: this.performance.getLatest(),
      monitoringActive: this.active,
    };
  }

  exportSummary(): SessionExport {
    return {
      summary: this.getSessionSummary(),
      console: this.console.exportSummary(),
      network: this.network.exportSummary(),
      performance: this.performance.exportSummary(),
      timeline: this.events.recent(this.config.timelineSize),
    };
  }

  // ============================================
  // TEARDOWN
  // ============================================

  /**
   * Stop accepting signals. Pending requests are reported, not awaited.
   */
  stop(): TeardownReport {
    if (this.active) {
      this.active = false;
      this.stoppedAt = this.clock();
      this.listeners.clear();
      this.log.info('Telemetry session stopped', {
        sessionId: this.sessionId,
        pendingRequests: this.network.pendingCount,
        durationMs: this.sessionDuration,
      });
    }

    return {
      sessionId: this.sessionId,
      pendingRequests: this.network.pendingCount,
      sessionDuration: this.sessionDuration,
    };
  }
}
