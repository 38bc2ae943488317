/**
 * Network Monitor
 *
 * Correlates request, response and failure events by request id and derives
 * aggregate analyses from the settled requests.
 *
 * All requests live in one map keyed by id, tagged pending, completed or
 * failed. A request is settled exactly once; a second response or failure
 * for the same id is treated as unknown.
 */

import type {
  ClockFn,
  DomainStats,
  NetworkAnalysis,
  NetworkRequest,
  NetworkSummaryExport,
  NetworkTimelineEntry,
  RawRequestEvent,
  RawRequestFailure,
  RawResponseEvent,
  RequestSample,
} from '../types/telemetry.js';
import { analyzeNetworkIssues, calculatePerformanceScore } from './network-insights.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { unknownRequestMessage } from '../utils/error-messages.js';
import { monotonicNow } from '../utils/clock.js';
import { extractDomain } from '../utils/url-utils.js';
import { takeLast, valueRange } from '../utils/series.js';

export interface NetworkMonitorOptions {
  clock?: ClockFn;
  logger?: Logger;
  timelineSize?: number;
}

const SAMPLE_SIZE = 5;

export function isSuccessful(request: NetworkRequest): boolean {
  return (
    request.responseStatus !== undefined &&
    request.responseStatus >= 200 &&
    request.responseStatus < 400
  );
}

export function isError(request: NetworkRequest): boolean {
  return (
    request.error !== undefined ||
    (request.responseStatus !== undefined && request.responseStatus >= 400)
  );
}

function detectCacheHit(raw: RawResponseEvent): boolean {
  if (raw.fromCache === true) return true;
  if (typeof raw.fromCache === 'string' && raw.fromCache.toLowerCase().includes('from-cache')) {
    return true;
  }
  if (raw.fromDiskCache || raw.fromMemoryCache) return true;

  return Object.values(raw.headers ?? {}).some((value) =>
    value.toLowerCase().includes('from-cache')
  );
}

function increment<K extends string | number>(counts: Record<K, number>, key: K): void {
  counts[key] = (counts[key] ?? 0) + 1;
}

function toSample(request: NetworkRequest, duration: number): RequestSample {
  return {
    url: request.url,
    method: request.method,
    duration,
    status: request.responseStatus,
    size: request.size,
    cacheHit: request.cacheHit,
  };
}

export class NetworkMonitor {
  private requests: Map<string, NetworkRequest> = new Map();
  private sequence = 0;
  private readonly seenDomains: Set<string> = new Set();
  private readonly seenResourceTypes: Set<string> = new Set();
  private readonly startTime: number;
  private readonly clock: ClockFn;
  private readonly log: Logger;
  private readonly timelineSize: number;

  constructor(options: NetworkMonitorOptions = {}) {
    this.clock = options.clock ?? monotonicNow;
    this.log = options.logger ?? rootLogger.network;
    this.timelineSize = options.timelineSize ?? 20;
    this.startTime = this.clock();
  }

  // ============================================
  // INGESTION
  // ============================================

  /**
   * Start tracking a request. Returns the id responses and failures must
   * be reported under.
   */
  addRequest(raw: RawRequestEvent): string {
    const timestamp = raw.timestamp ?? this.clock();
    const requestId = raw.requestId ?? `req-${Math.round(timestamp)}-${++this.sequence}`;

    if (this.requests.has(requestId)) {
      this.log.warn('Request id reused, replacing previous entry', { requestId, url: raw.url });
      this.requests.delete(requestId);
    }

    const request: NetworkRequest = {
      requestId,
      url: raw.url,
      domain: extractDomain(raw.url),
      method: raw.method ?? 'GET',
      headers: { ...raw.headers },
      resourceType: raw.resourceType ?? 'other',
      initiator: raw.initiator,
      postData: raw.postData,
      timestamp,
      status: 'pending',
      cacheHit: false,
      fromServiceWorker: false,
    };

    this.requests.set(requestId, request);
    this.seenDomains.add(request.domain);
    this.seenResourceTypes.add(request.resourceType);

    this.log.debug('Added network request', { requestId, method: request.method, url: request.url });
    return requestId;
  }

  /**
   * Settle a pending request with its response. Returns the settled
   * request, or undefined when the id is unknown or already settled.
   */
  addResponse(requestId: string, raw: RawResponseEvent): NetworkRequest | undefined {
    const request = this.pendingRequest(requestId, 'response');
    if (!request) return undefined;

    const responseTimestamp = raw.timestamp ?? this.clock();
    request.responseStatus = raw.status;
    request.responseHeaders = { ...raw.headers };
    request.responseTimestamp = responseTimestamp;
    request.size = raw.size;
    request.compressedSize = raw.compressedSize;
    request.timing = raw.timing ? { ...raw.timing } : undefined;
    request.cacheHit = detectCacheHit(raw);
    request.fromServiceWorker = raw.fromServiceWorker ?? false;
    request.duration = Math.max(0, responseTimestamp - request.timestamp);
    request.status = 'completed';

    this.log.debug('Added response for request', {
      requestId,
      url: request.url,
      status: request.responseStatus,
    });
    return request;
  }

  addRequestFailure(requestId: string, raw: RawRequestFailure): NetworkRequest | undefined {
    const request = this.pendingRequest(requestId, 'failure');
    if (!request) return undefined;

    request.error = raw.error;
    request.blockedReason = raw.blockedReason;
    request.status = 'failed';

    this.log.warn('Request failed', { requestId, url: request.url, error: raw.error });
    return request;
  }

  private pendingRequest(
    requestId: string,
    kind: 'response' | 'failure'
  ): NetworkRequest | undefined {
    const request = this.requests.get(requestId);
    if (!request || request.status !== 'pending') {
      this.log.warn(unknownRequestMessage(kind, requestId), { requestId });
      return undefined;
    }
    return request;
  }

  // ============================================
  // ACCESSORS
  // ============================================

  getRequest(requestId: string): NetworkRequest | undefined {
    return this.requests.get(requestId);
  }

  getPendingRequests(): NetworkRequest[] {
    return [...this.requests.values()].filter((r) => r.status === 'pending');
  }

  get pendingCount(): number {
    let count = 0;
    for (const request of this.requests.values()) {
      if (request.status === 'pending') count++;
    }
    return count;
  }

  /**
   * Completed and failed requests in the order they were first seen
   */
  getSettledRequests(): NetworkRequest[] {
    return [...this.requests.values()].filter((r) => r.status !== 'pending');
  }

  get domainsSeen(): ReadonlySet<string> {
    return this.seenDomains;
  }

  get resourceTypesSeen(): ReadonlySet<string> {
    return this.seenResourceTypes;
  }

  // ============================================
  // ANALYSIS
  // ============================================

  getAnalysis(): NetworkAnalysis {
    const settled = this.getSettledRequests();
    if (settled.length === 0) {
      return {
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
      };
    }

    let successfulRequests = 0;
    let failedRequests = 0;
    let blockedRequests = 0;
    let cachedRequests = 0;
    let totalBytes = 0;
    let totalCompressed = 0;
    const resourceTypes: Record<string, number> = {};
    const domains: Record<string, number> = {};
    const statusCodes: Record<number, number> = {};
    const timed: RequestSample[] = [];

    for (const request of settled) {
      if (isSuccessful(request)) successfulRequests++;
      if (isError(request)) failedRequests++;
      if (request.blockedReason) blockedRequests++;
      if (request.cacheHit) cachedRequests++;
      totalBytes += request.size ?? 0;
      totalCompressed += request.compressedSize ?? 0;

      increment(resourceTypes, request.resourceType);
      increment(domains, request.domain);
      if (request.responseStatus !== undefined) {
        increment(statusCodes, request.responseStatus);
      }
      if (request.duration !== undefined) {
        timed.push(toSample(request, request.duration));
      }
    }

    const totalRequests = settled.length;
    const averageResponseTime =
      timed.length > 0 ? timed.reduce((sum, s) => sum + s.duration, 0) / timed.length : 0;

    const compressionRatio =
      totalBytes > 0 ? Math.min(1, Math.max(0, 1 - totalCompressed / totalBytes)) : 0;

    const { issues, recommendations } = analyzeNetworkIssues({
      totalRequests,
      failedRequests,
      averageResponseTime,
      statusCodes,
      domains,
      resourceTypes,
    });

    return {
      totalRequests,
      successfulRequests,
      failedRequests,
      blockedRequests,
      cachedRequests,
      averageResponseTime,
      slowestRequests: [...timed].sort((a, b) => b.duration - a.duration).slice(0, SAMPLE_SIZE),
      fastestRequests: [...timed].sort((a, b) => a.duration - b.duration).slice(0, SAMPLE_SIZE),
      resourceTypes,
      domains,
      statusCodes,
      totalBytesTransferred: totalBytes,
      totalBytesCompressed: totalCompressed,
      compressionRatio,
      issues,
      recommendations,
      performanceScore: calculatePerformanceScore(
        successfulRequests / totalRequests,
        averageResponseTime,
        cachedRequests / totalRequests
      ),
    };
  }

  getDomainAnalysis(): Record<string, DomainStats> {
    const grouped = new Map<string, NetworkRequest[]>();
    for (const request of this.getSettledRequests()) {
      const bucket = grouped.get(request.domain);
      if (bucket) {
        bucket.push(request);
      } else {
        grouped.set(request.domain, [request]);
      }
    }

    const result: Record<string, DomainStats> = {};
    for (const [domain, requests] of grouped) {
      const durations = requests
        .map((r) => r.duration)
        .filter((d): d is number => d !== undefined);
      const range = valueRange(durations);
      const resourceTypes: Record<string, number> = {};
      const statusCodes: Record<number, number> = {};
      let successfulRequests = 0;
      let failedRequests = 0;
      let totalBytes = 0;

      for (const request of requests) {
        if (isSuccessful(request)) successfulRequests++;
        else if (isError(request)) failedRequests++;
        totalBytes += request.size ?? 0;
        increment(resourceTypes, request.resourceType);
        if (request.responseStatus !== undefined) {
          increment(statusCodes, request.responseStatus);
        }
      }

      result[domain] = {
        totalRequests: requests.length,
        successfulRequests,
        failedRequests,
        totalBytes,
        averageResponseTime:
          durations.length > 0 ? durations.reduce((a, b) => a + b, 0) / durations.length : 0,
        minResponseTime: range?.min ?? 0,
        maxResponseTime: range?.max ?? 0,
        successRate: successfulRequests / requests.length,
        resourceTypes,
        statusCodes,
      };
    }

    return result;
  }

  exportSummary(): NetworkSummaryExport {
    const ordered = this.getSettledRequests().sort((a, b) => a.timestamp - b.timestamp);
    const timeline: NetworkTimelineEntry[] = takeLast(ordered, this.timelineSize).map((request) => ({
      timestamp: request.timestamp,
      url: request.url,
      method: request.method,
      status: request.responseStatus,
      duration: request.duration,
      size: request.size,
      error: request.error,
    }));

    return {
      monitoringDuration: this.clock() - this.startTime,
      analysis: this.getAnalysis(),
      domainAnalysis: this.getDomainAnalysis(),
      pendingRequests: this.pendingCount,
      timeline,
    };
  }
}
