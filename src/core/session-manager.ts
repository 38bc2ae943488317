/**
 * Session Manager - Registry of independent telemetry sessions
 *
 * Sessions are keyed by id and never share state. Stopping is synchronous
 * and never waits on in-flight requests or snapshots.
 */

import { TelemetrySession, type TelemetrySessionOptions } from './telemetry-session.js';
import type { ClockFn, TeardownReport } from '../types/telemetry.js';
import type { TelemetryConfig } from '../utils/config-schemas.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface SessionManagerOptions {
  clock?: ClockFn;
  logger?: Logger;
  /** Defaults applied to every session this manager creates */
  config?: Partial<TelemetryConfig>;
}

export class TelemetrySessionManager {
  private sessions: Map<string, TelemetrySession> = new Map();
  private readonly options: SessionManagerOptions;
  private readonly log: Logger;

  constructor(options: SessionManagerOptions = {}) {
    this.options = options;
    this.log = options.logger ?? rootLogger.sessionManager;
  }

  /**
   * Create and register a session.
   * @throws Error if the id is already registered
   */
  create(options: TelemetrySessionOptions = {}): TelemetrySession {
    if (options.sessionId !== undefined && this.sessions.has(options.sessionId)) {
      throw new Error(`Session already exists: ${options.sessionId}`);
    }

    const session = new TelemetrySession({
      clock: this.options.clock,
      logger: this.options.logger,
      ...options,
      config: { ...this.options.config, ...options.config },
    });
    this.sessions.set(session.sessionId, session);

    this.log.debug('Session registered', {
      sessionId: session.sessionId,
      activeSessions: this.sessions.size,
    });
    return session;
  }

  get(sessionId: string): TelemetrySession | undefined {
    return this.sessions.get(sessionId);
  }

  list(): TelemetrySession[] {
    return [...this.sessions.values()];
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Stop one session; undefined when the id is not registered
   */
  stop(sessionId: string): TeardownReport | undefined {
    return this.sessions.get(sessionId)?.stop();
  }

  stopAll(): TeardownReport[] {
    const reports = this.list().map((session) => session.stop());
    this.log.info('All sessions stopped', {
      sessions: reports.length,
      pendingRequests: reports.reduce((sum, r) => sum + r.pendingRequests, 0),
    });
    return reports;
  }

  /**
   * Stop and unregister a session
   */
  remove(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;

    session.stop();
    this.sessions.delete(sessionId);
    return true;
  }
}
