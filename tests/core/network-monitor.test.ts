/**
 * Tests for request/response correlation and network analysis
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { NetworkMonitor } from '../../src/core/network-monitor.js';
import {
  analyzeNetworkIssues,
  calculatePerformanceScore,
  responseTimeBand,
} from '../../src/core/network-insights.js';
import { Logger } from '../../src/utils/logger.js';
import { unknownRequestMessage } from '../../src/utils/error-messages.js';

describe('NetworkMonitor', () => {
  let now: number;
  let log: Logger;
  let monitor: NetworkMonitor;

  /** Issue a GET and answer it after `duration` ms */
  function completeRequest(
    id: string,
    url: string,
    status: number,
    duration: number,
    extra: { fromCache?: boolean; size?: number; compressedSize?: number; resourceType?: string } = {}
  ): void {
    monitor.addRequest({ requestId: id, url, method: 'GET', resourceType: extra.resourceType });
    now += duration;
    monitor.addResponse(id, {
      status,
      fromCache: extra.fromCache,
      size: extra.size,
      compressedSize: extra.compressedSize,
    });
  }

  beforeEach(() => {
    now = 0;
    log = new Logger('test');
    vi.spyOn(log, 'warn').mockImplementation(() => {});
    vi.spyOn(log, 'debug').mockImplementation(() => {});
    monitor = new NetworkMonitor({ clock: () => now, logger: log });
  });

  describe('correlation', () => {
    it('should mark a failed request and remove it from pending', () => {
      monitor.addRequest({
        requestId: 'r1',
        url: 'https://a.com/x',
        method: 'GET',
        resourceType: 'script',
      });
      monitor.addRequestFailure('r1', { error: 'net::ERR_FAILED' });

      const analysis = monitor.getAnalysis();
      expect(analysis.failedRequests).toBe(1);
      expect(analysis.successfulRequests).toBe(0);
      expect(monitor.pendingCount).toBe(0);
      expect(monitor.getPendingRequests()).toEqual([]);
      expect(monitor.getRequest('r1')?.status).toBe('failed');
    });

    it('should fill response fields and compute duration', () => {
      now = 100;
      monitor.addRequest({ requestId: 'r1', url: 'https://a.com:8443/api', method: 'POST' });
      now = 340;
      monitor.addResponse('r1', {
        status: 201,
        headers: { 'content-type': 'application/json' },
        size: 512,
        timing: { waiting: 200 },
      });

      const request = monitor.getRequest('r1');
      expect(request).toMatchObject({
        status: 'completed',
        domain: 'a.com:8443',
        method: 'POST',
        resourceType: 'other',
        responseStatus: 201,
        responseTimestamp: 340,
        size: 512,
        timing: { waiting: 200 },
        duration: 240,
        cacheHit: false,
        fromServiceWorker: false,
      });
    });

    it('should ignore a response for an unknown request id with a warning', () => {
      monitor.addResponse('ghost', { status: 200 });

      expect(log.warn).toHaveBeenCalledWith(unknownRequestMessage('response', 'ghost'), {
        requestId: 'ghost',
      });
      expect(monitor.getAnalysis().totalRequests).toBe(0);
      expect(monitor.getRequest('ghost')).toBeUndefined();
    });

    it('should settle every request once when answers arrive out of order', () => {
      const count = 1000;
      for (let i = 0; i < count; i++) {
        monitor.addRequest({ requestId: `r${i}`, url: `https://a.com/item/${i}` });
      }

      // 7919 is coprime with 1000, so this visits every index once
      for (let i = 0; i < count; i++) {
        const index = (i * 7919) % count;
        now += 1;
        if (index % 10 === 0) {
          expect(monitor.addRequestFailure(`r${index}`, { error: 'net::ERR_FAILED' })).toBeDefined();
        } else {
          expect(monitor.addResponse(`r${index}`, { status: 200 })).toBeDefined();
        }
      }

      const settledIds = monitor.getSettledRequests().map((r) => r.requestId);
      expect(monitor.pendingCount).toBe(0);
      expect(settledIds).toHaveLength(count);
      expect(new Set(settledIds).size).toBe(count);
      expect(monitor.getAnalysis().failedRequests).toBe(100);
      expect(monitor.addResponse('r5', { status: 200 })).toBeUndefined();
    });

    it('should ignore a failure for an already settled request', () => {
      completeRequest('r1', 'https://a.com/', 200, 50);
      monitor.addRequestFailure('r1', { error: 'net::ERR_ABORTED' });

      expect(monitor.getRequest('r1')?.status).toBe('completed');
      expect(monitor.getRequest('r1')?.error).toBeUndefined();
      expect(log.warn).toHaveBeenCalledWith(unknownRequestMessage('failure', 'r1'), {
        requestId: 'r1',
      });
    });

    it('should mint ids when the caller gives none', () => {
      now = 5000;
      const first = monitor.addRequest({ url: 'https://a.com/1' });
      const second = monitor.addRequest({ url: 'https://a.com/2' });

      expect(first).toBe('req-5000-1');
      expect(second).toBe('req-5000-2');
      expect(monitor.pendingCount).toBe(2);
    });

    it('should replace an entry when a request id is reused', () => {
      monitor.addRequest({ requestId: 'dup', url: 'https://a.com/old' });
      monitor.addRequest({ requestId: 'dup', url: 'https://a.com/new' });

      expect(monitor.getRequest('dup')?.url).toBe('https://a.com/new');
      expect(monitor.pendingCount).toBe(1);
      expect(log.warn).toHaveBeenCalledWith('Request id reused, replacing previous entry', {
        requestId: 'dup',
        url: 'https://a.com/new',
      });
    });

    it('should never report a negative duration', () => {
      monitor.addRequest({ requestId: 'r1', url: 'https://a.com/', timestamp: 500 });
      monitor.addResponse('r1', { status: 200, timestamp: 400 });

      expect(monitor.getRequest('r1')?.duration).toBe(0);
    });

    it('should keep domains and resource types seen, including pending requests', () => {
      monitor.addRequest({ url: 'https://cdn.test/app.js', resourceType: 'script' });
      monitor.addRequest({ url: 'not a url' });

      expect([...monitor.domainsSeen]).toEqual(['cdn.test', '']);
      expect([...monitor.resourceTypesSeen]).toEqual(['script', 'other']);
    });
  });

  describe('cache detection', () => {
    it('should detect cache hits from flags and headers', () => {
      monitor.addRequest({ requestId: 'a', url: 'https://a.com/a' });
      monitor.addRequest({ requestId: 'b', url: 'https://a.com/b' });
      monitor.addRequest({ requestId: 'c', url: 'https://a.com/c' });
      monitor.addRequest({ requestId: 'd', url: 'https://a.com/d' });

      monitor.addResponse('a', { status: 200, fromCache: 'from-cache' });
      monitor.addResponse('b', { status: 200, headers: { 'x-cache-status': 'HIT from-cache' } });
      monitor.addResponse('c', { status: 200, fromMemoryCache: true });
      monitor.addResponse('d', { status: 200, headers: { 'cache-control': 'max-age=60' } });

      expect(['a', 'b', 'c', 'd'].map((id) => monitor.getRequest(id)?.cacheHit)).toEqual([
        true,
        true,
        true,
        false,
      ]);
    });
  });

  describe('getAnalysis', () => {
    it('should return a zero-value analysis when empty', () => {
      expect(monitor.getAnalysis()).toEqual({
        totalRequests: 0,
        successfulRequests: 0,
        failedRequests: 0,
        blockedRequests: 0,
        cachedRequests: 0,
        averageResponseTime: 0,
        slowestRequests: [],
        fastestRequests: [],
        resourceTypes: {},
        domains: {},
        statusCodes: {},
        totalBytesTransferred: 0,
        totalBytesCompressed: 0,
        compressionRatio: 0,
        issues: [],
        recommendations: [],
        performanceScore: 0,
      });
    });

    it('should exclude pending requests from every aggregate', () => {
      completeRequest('done', 'https://a.com/done', 200, 100);
      monitor.addRequest({ requestId: 'waiting', url: 'https://b.com/slow' });

      const analysis = monitor.getAnalysis();
      expect(analysis.totalRequests).toBe(1);
      expect(analysis.averageResponseTime).toBe(100);
      expect(analysis.domains).toEqual({ 'a.com': 1 });
    });

    it('should not flag a failure rate of exactly 10%', () => {
      for (let i = 0; i < 9; i++) {
        completeRequest(`ok-${i}`, 'https://a.com/ok', 200, 100);
      }
      completeRequest('boom', 'https://a.com/boom', 500, 100);

      const analysis = monitor.getAnalysis();
      expect(analysis.failedRequests).toBe(1);
      expect(analysis.issues).toEqual(['Server errors detected: 1 requests with 5xx status codes']);
      expect(analysis.statusCodes).toEqual({ 200: 9, 500: 1 });
    });

    it('should flag a failure rate above 10%', () => {
      completeRequest('ok', 'https://a.com/ok', 200, 100);
      monitor.addRequest({ requestId: 'bad', url: 'https://a.com/bad' });
      monitor.addRequestFailure('bad', { error: 'net::ERR_BLOCKED_BY_CLIENT', blockedReason: 'ERR_BLOCKED_BY_CLIENT' });

      const analysis = monitor.getAnalysis();
      expect(analysis.blockedRequests).toBe(1);
      expect(analysis.issues).toEqual(['High network failure rate: 50.0% of requests failed']);
    });

    it('should score an all-cached fast session at 100', () => {
      completeRequest('a', 'https://a.com/a', 200, 50, { fromCache: true });
      completeRequest('b', 'https://a.com/b', 304, 80, { fromCache: true });

      const analysis = monitor.getAnalysis();
      expect(analysis.cachedRequests).toBe(2);
      expect(analysis.performanceScore).toBe(100);
    });

    it('should combine success rate, latency band and cache rate in the score', () => {
      completeRequest('ok', 'https://a.com/ok', 200, 600);
      monitor.addRequest({ requestId: 'bad', url: 'https://a.com/bad' });
      monitor.addRequestFailure('bad', { error: 'net::ERR_FAILED' });

      // 40 * 0.5 + 30 + 20 * 0
      expect(monitor.getAnalysis().performanceScore).toBe(50);
    });

    it('should report a compression ratio of 0 when no bytes were transferred', () => {
      completeRequest('a', 'https://a.com/a', 200, 10);

      expect(monitor.getAnalysis().compressionRatio).toBe(0);
    });

    it('should compute and clamp the compression ratio', () => {
      completeRequest('a', 'https://a.com/a', 200, 10, { size: 1000, compressedSize: 250 });
      expect(monitor.getAnalysis().compressionRatio).toBe(0.75);

      completeRequest('b', 'https://a.com/b', 200, 10, { size: 0, compressedSize: 2000 });
      expect(monitor.getAnalysis().compressionRatio).toBe(0);
    });

    it('should list slowest and fastest timed requests', () => {
      const durations = [300, 100, 700, 200, 600, 400, 500];
      durations.forEach((d, i) => completeRequest(`r${i}`, `https://a.com/${i}`, 200, d));

      const analysis = monitor.getAnalysis();
      expect(analysis.slowestRequests.map((r) => r.duration)).toEqual([700, 600, 500, 400, 300]);
      expect(analysis.fastestRequests.map((r) => r.duration)).toEqual([100, 200, 300, 400, 500]);
      expect(analysis.averageResponseTime).toBe(400);
    });

    it('should flag slow averages as an issue above 2000ms', () => {
      completeRequest('slow', 'https://a.com/slow', 200, 2500);

      const analysis = monitor.getAnalysis();
      expect(analysis.issues).toEqual(['Slow average response time: 2500ms']);
      expect(analysis.performanceScore).toBe(50);
    });

    it('should recommend on request mix thresholds', () => {
      for (let i = 0; i < 21; i++) {
        completeRequest(`img-${i}`, `https://a.com/${i}.png`, 200, 10, { resourceType: 'image' });
      }

      expect(monitor.getAnalysis().recommendations).toEqual([
        'Many image requests detected - consider image optimization and lazy loading',
      ]);
    });
  });

  describe('getDomainAnalysis', () => {
    it('should aggregate settled requests per domain', () => {
      completeRequest('a1', 'https://a.com/1', 200, 100, { size: 100 });
      completeRequest('a2', 'https://a.com/2', 404, 300, { size: 50 });
      completeRequest('b1', 'https://b.com/1', 200, 40);
      monitor.addRequest({ requestId: 'c1', url: 'https://c.com/pending' });

      const domains = monitor.getDomainAnalysis();
      expect(Object.keys(domains)).toEqual(['a.com', 'b.com']);
      expect(domains['a.com']).toEqual({
        totalRequests: 2,
        successfulRequests: 1,
        failedRequests: 1,
        totalBytes: 150,
        averageResponseTime: 200,
        minResponseTime: 100,
        maxResponseTime: 300,
        successRate: 0.5,
        resourceTypes: { other: 2 },
        statusCodes: { 200: 1, 404: 1 },
      });
    });

    it('should aggregate a domain with hundreds of thousands of requests', () => {
      const quiet = new NetworkMonitor({ clock: () => now, logger: new Logger('test') });
      for (let i = 0; i < 200_000; i++) {
        quiet.addRequest({ requestId: `r${i}`, url: 'https://bulk.test/ping' });
        now += (i % 1000) + 1;
        quiet.addResponse(`r${i}`, { status: 200 });
      }

      const stats = quiet.getDomainAnalysis()['bulk.test'];
      expect(stats.totalRequests).toBe(200_000);
      expect(stats.minResponseTime).toBe(1);
      expect(stats.maxResponseTime).toBe(1000);
      expect(stats.averageResponseTime).toBe(500.5);
      expect(() => quiet.exportSummary()).not.toThrow();
    }, 30_000);
  });

  describe('exportSummary', () => {
    it('should agree with getAnalysis and report pending requests', () => {
      const small = new NetworkMonitor({ clock: () => now, logger: log, timelineSize: 2 });
      for (let i = 0; i < 3; i++) {
        small.addRequest({ requestId: `r${i}`, url: `https://a.com/${i}` });
        now += 10;
        small.addResponse(`r${i}`, { status: 200 });
      }
      small.addRequest({ requestId: 'open', url: 'https://a.com/open' });

      const exported = small.exportSummary();
      expect(exported.analysis).toEqual(small.getAnalysis());
      expect(exported.analysis.totalRequests).toBe(3);
      expect(exported.pendingRequests).toBe(1);
      expect(exported.monitoringDuration).toBe(30);
      expect(exported.timeline.map((t) => t.url)).toEqual(['https://a.com/1', 'https://a.com/2']);
      expect(exported.domainAnalysis).toEqual(small.getDomainAnalysis());
      expect(exported.domainAnalysis['a.com'].totalRequests).toBe(3);
    });
  });
});

describe('network insights', () => {
  it('should band response times', () => {
    expect(responseTimeBand(0)).toBe(40);
    expect(responseTimeBand(499)).toBe(40);
    expect(responseTimeBand(500)).toBe(30);
    expect(responseTimeBand(1999)).toBe(20);
    expect(responseTimeBand(2000)).toBe(10);
  });

  it('should clamp the performance score', () => {
    expect(calculatePerformanceScore(1, 0, 1)).toBe(100);
    expect(calculatePerformanceScore(0, 5000, 0)).toBe(10);
  });

  it('should flag many domains and soft-slow averages', () => {
    const domains: Record<string, number> = {};
    for (let i = 0; i < 11; i++) domains[`d${i}.test`] = 1;

    const result = analyzeNetworkIssues({
      totalRequests: 11,
      failedRequests: 0,
      averageResponseTime: 1500,
      statusCodes: { 200: 10, 403: 1 },
      domains,
      resourceTypes: { script: 16 },
    });

    expect(result.issues).toEqual([
      'Client errors detected: 1 requests with 4xx status codes',
      'High number of domains: 11 different domains contacted',
    ]);
    expect(result.recommendations).toEqual([
      'Consider optimizing response times for better user experience',
      'Review client-side requests - check URLs, parameters, and authentication',
      'Consider reducing external dependencies to improve loading performance',
      'Many script requests detected - consider script bundling and minification',
    ]);
  });
});
