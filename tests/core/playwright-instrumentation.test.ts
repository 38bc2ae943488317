/**
 * Tests for wiring Playwright page events into a session
 *
 * Uses an in-process EventEmitter page; no browser is launched.
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Page } from 'playwright-core';
import {
  attachPageInstrumentation,
  blockedReasonOf,
  toNetworkTiming,
  PERFORMANCE_SNAPSHOT_SCRIPT,
} from '../../src/core/playwright-instrumentation.js';
import { TelemetrySession } from '../../src/core/telemetry-session.js';
import { Logger } from '../../src/utils/logger.js';

const NO_TIMING = {
  startTime: 0,
  domainLookupStart: -1,
  domainLookupEnd: -1,
  connectStart: -1,
  secureConnectionStart: -1,
  connectEnd: -1,
  requestStart: -1,
  responseStart: -1,
  responseEnd: -1,
};

interface FakeRequestInit {
  url: string;
  method?: string;
  resourceType?: string;
  errorText?: string;
  timing?: typeof NO_TIMING;
}

class FakeRequest {
  constructor(private readonly init: FakeRequestInit) {}
  url(): string {
    return this.init.url;
  }
  method(): string {
    return this.init.method ?? 'GET';
  }
  headers(): Record<string, string> {
    return { accept: '*/*' };
  }
  resourceType(): string {
    return this.init.resourceType ?? 'fetch';
  }
  postData(): string | null {
    return null;
  }
  failure(): { errorText: string } | null {
    return this.init.errorText ? { errorText: this.init.errorText } : null;
  }
  timing(): typeof NO_TIMING {
    return this.init.timing ?? NO_TIMING;
  }
}

class FakeResponse {
  constructor(
    private readonly req: FakeRequest,
    private readonly statusCode: number,
    private readonly responseHeaders: Record<string, string> = {}
  ) {}
  request(): FakeRequest {
    return this.req;
  }
  url(): string {
    return this.req.url();
  }
  status(): number {
    return this.statusCode;
  }
  headers(): Record<string, string> {
    return this.responseHeaders;
  }
  fromServiceWorker(): boolean {
    return false;
  }
}

class FakePage extends EventEmitter {
  currentUrl = 'https://shop.test/';
  evaluate = vi.fn(async (_script: string) => ({ pageLoadTime: 640, resourceCount: 9 }));
  url(): string {
    return this.currentUrl;
  }
}

function consoleMessage(type: string, text: string) {
  return {
    type: () => type,
    text: () => text,
    location: () => ({ url: 'https://shop.test/app.js', lineNumber: 4, columnNumber: 2 }),
  };
}

describe('attachPageInstrumentation', () => {
  let now: number;
  let log: Logger;
  let page: FakePage;
  let session: TelemetrySession;

  beforeEach(() => {
    now = 1000;
    log = new Logger('test');
    vi.spyOn(log, 'debug').mockImplementation(() => {});
    vi.spyOn(log, 'info').mockImplementation(() => {});
    vi.spyOn(log, 'warn').mockImplementation(() => {});
    vi.spyOn(log, 'error').mockImplementation(() => {});
    page = new FakePage();
    session = new TelemetrySession({ sessionId: 's1', clock: () => now, logger: log });
  });

  function attach(autoSnapshot = false) {
    return attachPageInstrumentation(page as unknown as Page, session, { autoSnapshot, logger: log });
  }

  it('should forward console messages with their location', () => {
    attach();
    page.emit('console', consoleMessage('warning', 'Slow network detected'));

    const [message] = session.console.getMessages();
    expect(message.level).toBe('warning');
    expect(message.category).toBe('performance_warning');
    expect(message.location).toEqual({ url: 'https://shop.test/app.js', lineNumber: 4, columnNumber: 2 });
  });

  it('should render page errors as uncaught exceptions', () => {
    attach();
    page.emit('pageerror', new TypeError('x is undefined'));

    const [message] = session.console.getMessages();
    expect(message.text).toBe('Uncaught TypeError: x is undefined');
    expect(message.category).toBe('javascript_error');
    expect(session.events.query({ eventType: 'error' })).toHaveLength(1);
  });

  it('should join responses to requests by object identity', () => {
    attach();
    const first = new FakeRequest({ url: 'https://shop.test/api/items' });
    const second = new FakeRequest({ url: 'https://shop.test/api/items' });

    page.emit('request', first);
    page.emit('request', second);
    now = 1040;
    page.emit('response', new FakeResponse(second, 500));
    now = 1090;
    page.emit('response', new FakeResponse(first, 200, { 'content-length': '2048' }));

    const settled = session.network.getSettledRequests();
    expect(settled.map((r) => [r.responseStatus, r.duration, r.size])).toEqual([
      [200, 90, 2048],
      [500, 40, undefined],
    ]);
    expect(session.network.pendingCount).toBe(0);
  });

  it('should derive phase timings from the request timing', () => {
    attach();
    const request = new FakeRequest({
      url: 'https://shop.test/',
      timing: {
        startTime: 0,
        domainLookupStart: 1,
        domainLookupEnd: 5,
        connectStart: 5,
        secureConnectionStart: -1,
        connectEnd: 20,
        requestStart: 21,
        responseStart: 80,
        responseEnd: -1,
      },
    });

    page.emit('request', request);
    page.emit('response', new FakeResponse(request, 200));

    const [settled] = session.network.getSettledRequests();
    expect(settled.timing).toEqual({
      dnsLookup: 4,
      tcpConnect: 15,
      tlsHandshake: undefined,
      requestSent: 1,
      waiting: 59,
      contentDownload: undefined,
      totalTime: 80,
    });
  });

  it('should record failures with a blocked reason', () => {
    attach();
    const request = new FakeRequest({
      url: 'https://ads.test/pixel.gif',
      resourceType: 'image',
      errorText: 'net::ERR_BLOCKED_BY_CLIENT',
    });

    page.emit('request', request);
    page.emit('requestfailed', request);

    const analysis = session.network.getAnalysis();
    expect(analysis.failedRequests).toBe(1);
    expect(analysis.blockedRequests).toBe(1);
  });

  it('should skip responses for requests seen before attaching', () => {
    const early = new FakeRequest({ url: 'https://shop.test/early.js' });
    attach();

    page.emit('response', new FakeResponse(early, 200));

    expect(session.events.size).toBe(0);
    expect(session.network.getAnalysis().totalRequests).toBe(0);
  });

  it('should record a navigation and a performance snapshot on load', async () => {
    attach(true);
    page.emit('load', page);

    expect(session.events.query({ eventType: 'navigation' })[0].data).toEqual({
      url: 'https://shop.test/',
      trigger: 'load',
    });
    await vi.waitFor(() => {
      expect(session.performance.snapshotCount).toBe(1);
    });
    expect(page.evaluate).toHaveBeenCalledWith(PERFORMANCE_SNAPSHOT_SCRIPT);
    expect(session.performance.getLatest()).toMatchObject({
      url: 'https://shop.test/',
      pageLoadTime: 640,
      resourceCount: 9,
    });
  });

  it('should not snapshot on load when auto snapshots are off', () => {
    attach(false);
    page.emit('load', page);

    expect(page.evaluate).not.toHaveBeenCalled();
    expect(session.events.query({ eventType: 'navigation' })).toHaveLength(1);
  });

  it('should log handler failures instead of throwing into the emitter', () => {
    attach();
    const broken = {
      type: () => 'log',
      text: () => {
        throw new Error('execution context was destroyed');
      },
      location: () => ({ url: '', lineNumber: 0, columnNumber: 0 }),
    };

    expect(() => page.emit('console', broken)).not.toThrow();
    expect(log.error).toHaveBeenCalledWith(
      'Failed to handle console event',
      expect.objectContaining({ sessionId: 's1' })
    );
  });

  it('should remove every listener on detach', () => {
    const detach = attach();
    detach();

    for (const event of ['console', 'pageerror', 'request', 'response', 'requestfailed', 'load']) {
      expect(page.listenerCount(event)).toBe(0);
    }
    page.emit('console', consoleMessage('log', 'after detach'));
    expect(session.console.messageCount).toBe(0);
  });
});

describe('instrumentation helpers', () => {
  it('should treat unavailable timing marks as absent', () => {
    expect(toNetworkTiming(NO_TIMING)).toEqual({});
  });

  it('should extract blocked reasons from error text', () => {
    expect(blockedReasonOf('net::ERR_BLOCKED_BY_RESPONSE.NotSameOrigin')).toBe('ERR_BLOCKED_BY_RESPONSE');
    expect(blockedReasonOf('net::ERR_FAILED')).toBeUndefined();
  });
});
