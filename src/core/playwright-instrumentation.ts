/**
 * Playwright Instrumentation
 *
 * Wires a Playwright page's events into a telemetry session. Listener
 * callbacks never throw back into Playwright's emitter; failures are
 * logged.
 */

import type {
  ConsoleMessage as PlaywrightConsoleMessage,
  Page,
  Request,
  Response,
} from 'playwright-core';
import type { TelemetrySession } from './telemetry-session.js';
import type { NetworkTiming, SourceLocation } from '../types/telemetry.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type { Page } from 'playwright-core';

export interface InstrumentationOptions {
  /** Take a performance snapshot on every load; defaults to the session config */
  autoSnapshot?: boolean;
  logger?: Logger;
}

/** Removes every listener added by attachPageInstrumentation */
export type DetachFn = () => void;

/**
 * Evaluated in the page. Returns raw timing values; anything the browser
 * does not support comes back as null. Time to interactive and total
 * blocking time need a long-task observer running from page start, so
 * this script leaves them null; a custom probe may supply them.
 */
export const PERFORMANCE_SNAPSHOT_SCRIPT = `(() => {
  const navigation = performance.getEntriesByType('navigation')[0];
  const firstInput = performance.getEntriesByType('first-input')[0];
  const resources = performance.getEntriesByType('resource');
  const paint = performance.getEntriesByType('paint');
  const lcp = performance.getEntriesByType('largest-contentful-paint').slice(-1)[0];
  const shifts = performance.getEntriesByType('layout-shift');
  const firstPaint = paint.find((p) => p.name === 'first-paint');
  const firstContentfulPaint = paint.find((p) => p.name === 'first-contentful-paint');
  const memory = performance.memory;
  return {
    pageLoadTime: navigation && navigation.loadEventEnd > 0 ? navigation.loadEventEnd - navigation.fetchStart : null,
    domContentLoaded: navigation && navigation.domContentLoadedEventEnd > 0 ? navigation.domContentLoadedEventEnd - navigation.fetchStart : null,
    firstPaint: firstPaint ? firstPaint.startTime : null,
    firstContentfulPaint: firstContentfulPaint ? firstContentfulPaint.startTime : null,
    largestContentfulPaint: lcp ? lcp.startTime : null,
    cumulativeLayoutShift: shifts.reduce((sum, entry) => sum + (entry.hadRecentInput ? 0 : entry.value), 0),
    firstInputDelay: firstInput ? firstInput.processingStart - firstInput.startTime : null,
    timeToInteractive: null,
    totalBlockingTime: null,
    memoryUsage: memory ? {
      usedJSHeapSize: memory.usedJSHeapSize,
      totalJSHeapSize: memory.totalJSHeapSize,
      jsHeapSizeLimit: memory.jsHeapSizeLimit
    } : null,
    resourceCount: resources.length,
    resources: resources.map((entry) => ({
      name: entry.name,
      initiatorType: entry.initiatorType,
      startTime: entry.startTime,
      duration: entry.duration,
      transferSize: entry.transferSize,
      encodedBodySize: entry.encodedBodySize,
      decodedBodySize: entry.decodedBodySize
    }))
  };
})()`;

type PlaywrightTiming = ReturnType<Request['timing']>;

/** Playwright reports unavailable timing marks as -1 */
function span(from: number, to: number): number | undefined {
  return from >= 0 && to >= 0 && to >= from ? to - from : undefined;
}

/**
 * Convert Playwright's resource timing (marks relative to startTime) into
 * phase durations
 */
export function toNetworkTiming(timing: PlaywrightTiming): NetworkTiming {
  const lastMark = timing.responseEnd >= 0 ? timing.responseEnd : timing.responseStart;
  return {
    dnsLookup: span(timing.domainLookupStart, timing.domainLookupEnd),
    tcpConnect: span(timing.connectStart, timing.connectEnd),
    tlsHandshake: span(timing.secureConnectionStart, timing.connectEnd),
    requestSent: span(timing.connectEnd, timing.requestStart),
    waiting: span(timing.requestStart, timing.responseStart),
    contentDownload: span(timing.responseStart, timing.responseEnd),
    totalTime: lastMark >= 0 ? lastMark : undefined,
  };
}

export function blockedReasonOf(errorText: string): string | undefined {
  return /ERR_BLOCKED_BY_[A-Z_]+/.exec(errorText)?.[0];
}

function contentLength(headers: Record<string, string>): number | undefined {
  const raw = headers['content-length'];
  if (raw === undefined) return undefined;
  const size = Number.parseInt(raw, 10);
  return Number.isFinite(size) && size >= 0 ? size : undefined;
}

function sourceLocation(message: PlaywrightConsoleMessage): SourceLocation | undefined {
  const location = message.location();
  if (!location.url) return undefined;
  return {
    url: location.url,
    lineNumber: location.lineNumber,
    columnNumber: location.columnNumber,
  };
}

/**
 * Subscribe a session to a page. Requests are joined to their responses
 * by Request object identity, not by URL.
 */
export function attachPageInstrumentation(
  page: Page,
  session: TelemetrySession,
  options: InstrumentationOptions = {}
): DetachFn {
  const log = options.logger ?? rootLogger.instrumentation;
  const autoSnapshot = options.autoSnapshot ?? session.config.autoSnapshot;
  const requestIds = new WeakMap<Request, string>();
  const context = { sessionId: session.sessionId };

  const guard = <A extends unknown[]>(name: string, handler: (...args: A) => void) =>
    (...args: A): void => {
      try {
        handler(...args);
      } catch (error) {
        log.error(`Failed to handle ${name} event`, { ...context, error });
      }
    };

  const onConsole = guard('console', (message: PlaywrightConsoleMessage) => {
    session.handleConsoleMessage({
      text: message.text(),
      type: message.type(),
      location: sourceLocation(message),
    });
  });

  // Rendered the way the browser console prints uncaught errors
  const onPageError = guard('pageerror', (error: Error) => {
    session.handlePageError({
      message: `Uncaught ${error.name}: ${error.message}`,
      stack: error.stack,
    });
  });

  const onRequest = guard('request', (request: Request) => {
    const requestId = session.handleRequest({
      url: request.url(),
      method: request.method(),
      headers: request.headers(),
      resourceType: request.resourceType(),
      postData: request.postData() ?? undefined,
    });
    if (requestId) {
      requestIds.set(request, requestId);
    }
  });

  const onResponse = guard('response', (response: Response) => {
    const request = response.request();
    const requestId = requestIds.get(request);
    if (!requestId) {
      log.debug('Response for a request seen before instrumentation', {
        ...context,
        url: response.url(),
      });
      return;
    }

    const headers = response.headers();
    session.handleResponse(requestId, {
      status: response.status(),
      headers,
      size: contentLength(headers),
      fromServiceWorker: response.fromServiceWorker(),
      timing: toNetworkTiming(request.timing()),
    });
  });

  const onRequestFailed = guard('requestfailed', (request: Request) => {
    const requestId = requestIds.get(request);
    if (!requestId) {
      log.debug('Failure for a request seen before instrumentation', {
        ...context,
        url: request.url(),
      });
      return;
    }

    const errorText = request.failure()?.errorText ?? 'Unknown network error';
    session.handleRequestFailed(requestId, {
      error: errorText,
      blockedReason: blockedReasonOf(errorText),
    });
  });

  const onLoad = guard('load', () => {
    const url = page.url();
    session.handleNavigation({ url, trigger: 'load' });

    if (!autoSnapshot) return;
    session
      .collectPerformance(() => page.evaluate<unknown>(PERFORMANCE_SNAPSHOT_SCRIPT), url)
      .catch((error: unknown) => {
        log.error('Automatic performance snapshot failed', { ...context, url, error });
      });
  });

  page.on('console', onConsole);
  page.on('pageerror', onPageError);
  page.on('request', onRequest);
  page.on('response', onResponse);
  page.on('requestfailed', onRequestFailed);
  page.on('load', onLoad);

  log.debug('Page instrumentation attached', { ...context, url: page.url() });

  return () => {
    page.off('console', onConsole);
    page.off('pageerror', onPageError);
    page.off('request', onRequest);
    page.off('response', onResponse);
    page.off('requestfailed', onRequestFailed);
    page.off('load', onLoad);
    log.debug('Page instrumentation detached', context);
  };
}
