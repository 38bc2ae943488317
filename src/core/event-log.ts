/**
 * Event Log
 *
 * Append-only, arrival-ordered log of BrowserEvents for timeline and debug
 * views. Recording never fails: it is the sink of last resort for every
 * signal a session sees. Only the most recent `maxEvents` are retained.
 */

import {
  BROWSER_EVENT_TYPES,
  type BrowserEvent,
  type BrowserEventType,
  type ClockFn,
  type EventData,
  type EventSeverity,
} from '../types/telemetry.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { invalidEventTypeMessage } from '../utils/error-messages.js';
import { monotonicNow } from '../utils/clock.js';
import { takeLast } from '../utils/series.js';

const DEFAULT_MAX_EVENTS = 10_000;

export interface EventLogOptions {
  maxEvents?: number;
  clock?: ClockFn;
  logger?: Logger;
}

export interface EventQuery {
  eventType?: BrowserEventType;
  severity?: EventSeverity;
  /** Inclusive lower bound on timestamp */
  since?: number;
  /** Inclusive upper bound on timestamp */
  until?: number;
  /** Keep only the most recent matches */
  limit?: number;
}

const EVENT_TYPES: ReadonlySet<string> = new Set(BROWSER_EVENT_TYPES);

export function isBrowserEventType(value: string): value is BrowserEventType {
  return EVENT_TYPES.has(value);
}

export class EventLog {
  private events: BrowserEvent[] = [];
  private nextId = 1;
  private recorded = 0;
  private readonly maxEvents: number;
  private readonly clock: ClockFn;
  private readonly log: Logger;

  constructor(options: EventLogOptions = {}) {
    this.maxEvents = Math.max(1, options.maxEvents ?? DEFAULT_MAX_EVENTS);
    this.clock = options.clock ?? monotonicNow;
    this.log = options.logger ?? rootLogger.eventLog;
  }

  /**
   * Append one event. Returns the frozen event, or null when the type is
   * not a known event type.
   */
  record(
    eventType: BrowserEventType,
    data: EventData,
    severity: EventSeverity = 'info',
    source: string = eventType
  ): BrowserEvent | null {
    if (!isBrowserEventType(eventType)) {
      this.log.warn(invalidEventTypeMessage(String(eventType)));
      return null;
    }

    const event: BrowserEvent = Object.freeze({
      id: this.nextId++,
      timestamp: this.clock(),
      eventType,
      source,
      severity,
      data: Object.freeze({ ...data }),
    });

    this.events.push(event);
    this.recorded++;
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    return event;
  }

  /**
   * Most recent events in arrival order
   */
  recent(limit: number): BrowserEvent[] {
    return takeLast(this.events, limit);
  }

  query(filter: EventQuery = {}): BrowserEvent[] {
    const matches = this.events.filter((event) => {
      if (filter.eventType && event.eventType !== filter.eventType) return false;
      if (filter.severity && event.severity !== filter.severity) return false;
      if (filter.since !== undefined && event.timestamp < filter.since) return false;
      if (filter.until !== undefined && event.timestamp > filter.until) return false;
      return true;
    });

    if (filter.limit !== undefined) {
      return takeLast(matches, filter.limit);
    }
    return matches;
  }

  countsByType(): Partial<Record<BrowserEventType, number>> {
    const counts: Partial<Record<BrowserEventType, number>> = {};
    for (const event of this.events) {
      counts[event.eventType] = (counts[event.eventType] ?? 0) + 1;
    }
    return counts;
  }

  countsBySeverity(): Record<EventSeverity, number> {
    const counts: Record<EventSeverity, number> = { error: 0, warning: 0, info: 0, debug: 0 };
    for (const event of this.events) {
      counts[event.severity]++;
    }
    return counts;
  }

  /** Events currently retained */
  get size(): number {
    return this.events.length;
  }

  /** Events recorded since creation, including ones dropped by retention */
  get totalRecorded(): number {
    return this.recorded;
  }

  /**
   * Drop retained events. `totalRecorded` keeps counting across a clear,
   * and ids continue from where they left off.
   */
  clear(): void {
    this.events = [];
  }
}
