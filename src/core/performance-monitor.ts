/**
 * Performance Monitor
 *
 * Assembles performance snapshots from an untrusted browser payload and
 * grades the latest one against Core Web Vitals thresholds.
 *
 * Collecting a snapshot is the only asynchronous operation in the engine.
 * It never rejects: a failed or slow probe still appends a snapshot, with
 * every metric absent.
 */

import { z } from 'zod';
import type {
  ClockFn,
  MemoryUsage,
  PerformanceAnalysis,
  PerformanceGrade,
  PerformanceMetrics,
  PerformanceProbe,
  PerformanceSummaryExport,
  ResourceBreakdown,
  ResourceCategory,
  ResourceTimingEntry,
  WebVitals,
} from '../types/telemetry.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { snapshotFailedMessage, snapshotTimeoutMessage } from '../utils/error-messages.js';
import { getTimeout, TimeoutError, withTimeout } from '../utils/timeouts.js';
import { monotonicNow } from '../utils/clock.js';
import { mean, takeLast } from '../utils/series.js';
import { urlPath } from '../utils/url-utils.js';

// ============================================
// RAW PAYLOAD SCHEMA
// ============================================

/**
 * A metric the page may report as a number, null, or not at all.
 * Anything that is not a finite number is treated as absent; 0 is kept.
 */
const optionalMetric = z
  .number()
  .finite()
  .nullish()
  .catch(undefined)
  .transform((value) => value ?? undefined);

const rawMemorySchema = z.object({
  usedJSHeapSize: optionalMetric,
  totalJSHeapSize: optionalMetric,
  jsHeapSizeLimit: optionalMetric,
});

const rawResourceSchema = z.object({
  name: z.string(),
  initiatorType: z.string().optional().catch(undefined),
  startTime: z.number().finite(),
  duration: z.number().finite().nonnegative(),
  transferSize: optionalMetric,
  encodedBodySize: optionalMetric,
  decodedBodySize: optionalMetric,
});

/**
 * Resource entries without a name, start time or duration are skipped;
 * the rest of the list is kept.
 */
const rawResourcesSchema = z
  .array(z.unknown())
  .nullish()
  .catch(undefined)
  .transform((entries) =>
    entries?.flatMap((entry): ResourceTimingEntry[] => {
      const parsed = rawResourceSchema.safeParse(entry);
      return parsed.success ? [parsed.data] : [];
    })
  );

export const rawSnapshotSchema = z
  .object({
    pageLoadTime: optionalMetric,
    domContentLoaded: optionalMetric,
    firstPaint: optionalMetric,
    firstContentfulPaint: optionalMetric,
    largestContentfulPaint: optionalMetric,
    cumulativeLayoutShift: optionalMetric,
    firstInputDelay: optionalMetric,
    timeToInteractive: optionalMetric,
    totalBlockingTime: optionalMetric,
    memoryUsage: rawMemorySchema
      .nullish()
      .catch(undefined)
      .transform((value) => value ?? undefined),
    resourceCount: optionalMetric,
    resources: rawResourcesSchema,
  })
  .catch({});

export type RawSnapshot = z.infer<typeof rawSnapshotSchema>;

// ============================================
// THRESHOLDS
// ============================================

interface VitalThreshold {
  /** At or below: excellent */
  excellent: number;
  /** At or below: good; above: poor */
  good: number;
}

export const VITAL_THRESHOLDS = {
  lcp: { excellent: 2500, good: 4000 },
  fid: { excellent: 100, good: 300 },
  cls: { excellent: 0.1, good: 0.25 },
  fcp: { excellent: 1800, good: 3000 },
  tti: { excellent: 3800, good: 7300 },
  tbt: { excellent: 200, good: 600 },
} as const satisfies Record<string, VitalThreshold>;

type VitalName = keyof typeof VITAL_THRESHOLDS;

const VITAL_NAMES: readonly VitalName[] = ['lcp', 'fid', 'cls', 'fcp', 'tti', 'tbt'];

/** Vitals that count towards the overall score; TTI and TBT are graded only */
const SCORED_VITALS: readonly VitalName[] = ['lcp', 'fid', 'cls', 'fcp'];

const GRADE_KEYS = {
  lcp: 'lcpGrade',
  fid: 'fidGrade',
  cls: 'clsGrade',
  fcp: 'fcpGrade',
  tti: 'ttiGrade',
  tbt: 'tbtGrade',
} as const satisfies Record<VitalName, keyof WebVitals>;

const GRADE_SCORES: Record<PerformanceGrade, number> = {
  excellent: 100,
  good: 75,
  needs_improvement: 50,
  poor: 25,
};

/** Overall score used when no vital could be graded */
const UNGRADED_SCORE = 50;

export function gradeVital(value: number, threshold: VitalThreshold): PerformanceGrade {
  if (value <= threshold.excellent) return 'excellent';
  if (value <= threshold.good) return 'good';
  return 'poor';
}

export function gradeScore(score: number): PerformanceGrade {
  if (score >= 90) return 'excellent';
  if (score >= 75) return 'good';
  if (score >= 50) return 'needs_improvement';
  return 'poor';
}

export function gradeMemoryUsage(percentage: number): PerformanceGrade {
  if (percentage < 50) return 'excellent';
  if (percentage < 70) return 'good';
  if (percentage < 85) return 'needs_improvement';
  return 'poor';
}

/**
 * Used heap as a percentage of the heap limit; undefined when the limit
 * is unknown or zero
 */
export function memoryUsagePercentage(memory: MemoryUsage | undefined): number | undefined {
  if (!memory || memory.usedJSHeapSize === undefined || !memory.jsHeapSizeLimit) {
    return undefined;
  }
  return (memory.usedJSHeapSize / memory.jsHeapSizeLimit) * 100;
}

// ============================================
// RESOURCES
// ============================================

const RESOURCE_RULES: ReadonlyArray<{ category: ResourceCategory; test: (path: string, url: string) => boolean }> = [
  { category: 'script', test: (path, url) => /\.(m?js|jsx)$/.test(path) || url.includes('javascript') },
  { category: 'stylesheet', test: (path, url) => path.endsWith('.css') || url.includes('stylesheet') },
  { category: 'image', test: (path) => /\.(jpe?g|png|gif|webp|svg|avif|ico)$/.test(path) },
  { category: 'font', test: (path) => /\.(woff2?|ttf|otf)$/.test(path) },
  { category: 'api', test: (path, url) => path.endsWith('.json') || /api|ajax/.test(url) },
];

/**
 * Category of a resource from its URL. Extensions are matched on the path,
 * so `/data.json?v=1` is an api call rather than a script.
 */
export function classifyResource(url: string): ResourceCategory {
  const lower = url.toLowerCase();
  const path = urlPath(url);
  return RESOURCE_RULES.find((rule) => rule.test(path, lower))?.category ?? 'other';
}

export function analyzeResourceBreakdown(
  resources: readonly ResourceTimingEntry[]
): Partial<Record<ResourceCategory, ResourceBreakdown>> {
  const breakdown: Partial<Record<ResourceCategory, ResourceBreakdown>> = {};

  for (const resource of resources) {
    const category = classifyResource(resource.name);
    let stats = breakdown[category];
    if (!stats) {
      stats = { count: 0, totalDuration: 0, totalSize: 0, averageDuration: 0 };
      breakdown[category] = stats;
    }

    const size = resource.transferSize ?? 0;
    stats.count++;
    stats.totalDuration += resource.duration;
    stats.totalSize += size;

    if (size > 0 && (!stats.largestResource || size > stats.largestResource.size)) {
      stats.largestResource = { name: resource.name, size, duration: resource.duration };
    }
    if (!stats.slowestResource || resource.duration > stats.slowestResource.duration) {
      stats.slowestResource = { name: resource.name, size, duration: resource.duration };
    }
  }

  for (const stats of Object.values(breakdown)) {
    if (stats) stats.averageDuration = stats.totalDuration / stats.count;
  }

  return breakdown;
}

// ============================================
// MONITOR
// ============================================

export interface PerformanceMonitorOptions {
  clock?: ClockFn;
  logger?: Logger;
  snapshotTimeoutMs?: number;
  timelineSize?: number;
}

export class PerformanceMonitor {
  private snapshots: PerformanceMetrics[] = [];
  private readonly startTime: number;
  private readonly clock: ClockFn;
  private readonly log: Logger;
  private readonly snapshotTimeoutMs: number;
  private readonly timelineSize: number;

  constructor(options: PerformanceMonitorOptions = {}) {
    this.clock = options.clock ?? monotonicNow;
    this.log = options.logger ?? rootLogger.performance;
    this.snapshotTimeoutMs = getTimeout('PERFORMANCE_SNAPSHOT', options.snapshotTimeoutMs);
    this.timelineSize = options.timelineSize ?? 20;
    this.startTime = this.clock();
  }

  /**
   * Run the probe, validate what it returns and append the snapshot
   */
  async collectSnapshot(probe: PerformanceProbe, url?: string): Promise<PerformanceMetrics> {
    let payload: unknown;
    try {
      payload = await withTimeout(probe(), this.snapshotTimeoutMs);
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.log.warn(snapshotTimeoutMessage(error.timeoutMs), { url });
      } else {
        const reason = error instanceof Error ? error.message : String(error);
        this.log.error(snapshotFailedMessage(reason), { url, error });
      }
      return this.append({ timestamp: this.clock(), url });
    }

    const raw = rawSnapshotSchema.parse(payload);
    return this.append({ timestamp: this.clock(), url, ...raw });
  }

  private append(metrics: PerformanceMetrics): PerformanceMetrics {
    this.snapshots.push(metrics);
    this.log.debug('Performance snapshot recorded', {
      url: metrics.url,
      pageLoadTime: metrics.pageLoadTime,
    });
    return metrics;
  }

  getSnapshots(): PerformanceMetrics[] {
    return [...this.snapshots];
  }

  getLatest(): PerformanceMetrics | null {
    return this.snapshots.at(-1) ?? null;
  }

  get snapshotCount(): number {
    return this.snapshots.length;
  }

  getAnalysis(): PerformanceAnalysis {
    const latest = this.getLatest();
    const webVitals = this.gradeVitals(latest);

    const scores: number[] = [];
    for (const vital of SCORED_VITALS) {
      const grade = webVitals[GRADE_KEYS[vital]];
      if (grade) scores.push(GRADE_SCORES[grade]);
    }
    const overallScore = mean(scores) ?? UNGRADED_SCORE;

    const resources = latest?.resources ?? [];
    const resourceBreakdown = analyzeResourceBreakdown(resources);
    let totalTransferSize = 0;
    let totalEncodedSize = 0;
    for (const resource of resources) {
      totalTransferSize += resource.transferSize ?? 0;
      totalEncodedSize += resource.encodedBodySize ?? 0;
    }
    const compressionRatio =
      totalTransferSize > 0
        ? Math.min(1, Math.max(0, 1 - totalEncodedSize / totalTransferSize))
        : 0;

    const memoryPercentage = memoryUsagePercentage(latest?.memoryUsage);
    const averageMemory = mean(
      this.snapshots
        .map((snapshot) => memoryUsagePercentage(snapshot.memoryUsage))
        .filter((value): value is number => value !== undefined)
    );
    const resourceCount = latest?.resourceCount ?? latest?.resources?.length;

    return {
      snapshotCount: this.snapshots.length,
      webVitals,
      overallScore,
      overallGrade: gradeScore(overallScore),
      pageLoadTime: latest?.pageLoadTime,
      domContentLoaded: latest?.domContentLoaded,
      firstPaint: latest?.firstPaint,
      resourceCount,
      totalTransferSize,
      totalEncodedSize,
      compressionRatio,
      resourceBreakdown,
      memoryUsagePercentage: memoryPercentage,
      averageMemoryUsagePercentage: averageMemory,
      memoryGrade: memoryPercentage === undefined ? undefined : gradeMemoryUsage(memoryPercentage),
      bottlenecks: this.identifyBottlenecks(webVitals, resourceBreakdown, memoryPercentage),
      recommendations: this.generateRecommendations(
        webVitals,
        resourceBreakdown,
        averageMemory,
        resourceCount
      ),
      criticalIssues: this.identifyCriticalIssues(webVitals, memoryPercentage),
    };
  }

  private gradeVitals(latest: PerformanceMetrics | null): WebVitals {
    const webVitals: WebVitals = {};
    if (!latest) return webVitals;

    const values: Record<VitalName, number | undefined> = {
      lcp: latest.largestContentfulPaint,
      fid: latest.firstInputDelay,
      cls: latest.cumulativeLayoutShift,
      fcp: latest.firstContentfulPaint,
      tti: latest.timeToInteractive,
      tbt: latest.totalBlockingTime,
    };
    for (const vital of VITAL_NAMES) {
      const value = values[vital];
      if (value === undefined) continue;
      webVitals[vital] = value;
      webVitals[GRADE_KEYS[vital]] = gradeVital(value, VITAL_THRESHOLDS[vital]);
    }
    return webVitals;
  }

  private identifyBottlenecks(
    vitals: WebVitals,
    breakdown: Partial<Record<ResourceCategory, ResourceBreakdown>>,
    memoryPercentage: number | undefined
  ): string[] {
    const bottlenecks: string[] = [];

    if (vitals.lcp !== undefined && vitals.lcp > 4000) {
      bottlenecks.push(
        `Poor Largest Contentful Paint (${vitals.lcp.toFixed(0)}ms) - main content loads too slowly`
      );
    }
    if (vitals.fid !== undefined && vitals.fid > 300) {
      bottlenecks.push(
        `Poor First Input Delay (${vitals.fid.toFixed(0)}ms) - page not responsive to user input`
      );
    }
    if (vitals.cls !== undefined && vitals.cls > 0.25) {
      bottlenecks.push(
        `Poor Cumulative Layout Shift (${vitals.cls.toFixed(3)}) - page layout is unstable`
      );
    }
    if (vitals.fcp !== undefined && vitals.fcp > 3000) {
      bottlenecks.push(
        `Slow First Contentful Paint (${vitals.fcp.toFixed(0)}ms) - initial content appears too late`
      );
    }
    if (breakdown.script && breakdown.script.averageDuration > 1000) {
      bottlenecks.push(
        `Slow JavaScript loading (avg ${breakdown.script.averageDuration.toFixed(0)}ms)`
      );
    }
    if (breakdown.stylesheet && breakdown.stylesheet.averageDuration > 500) {
      bottlenecks.push(`Slow CSS loading (avg ${breakdown.stylesheet.averageDuration.toFixed(0)}ms)`);
    }
    if (breakdown.image && breakdown.image.totalSize > 2_000_000) {
      bottlenecks.push(
        `Large image payload (${(breakdown.image.totalSize / 1024 / 1024).toFixed(1)}MB)`
      );
    }
    if (memoryPercentage !== undefined && memoryPercentage > 80) {
      bottlenecks.push(`High memory usage (${memoryPercentage.toFixed(1)}%)`);
    }

    return bottlenecks;
  }

  private generateRecommendations(
    vitals: WebVitals,
    breakdown: Partial<Record<ResourceCategory, ResourceBreakdown>>,
    averageMemory: number | undefined,
    resourceCount: number | undefined
  ): string[] {
    const recommendations: string[] = [];

    if (vitals.lcp !== undefined && vitals.lcp > 2500) {
      recommendations.push(
        'Optimize Largest Contentful Paint: compress images, use CDN, optimize server response time'
      );
    }
    if (vitals.fid !== undefined && vitals.fid > 100) {
      recommendations.push(
        'Improve First Input Delay: reduce JavaScript execution time, use web workers'
      );
    }
    if (vitals.cls !== undefined && vitals.cls > 0.1) {
      recommendations.push(
        'Fix Cumulative Layout Shift: set image dimensions, avoid dynamic content insertion'
      );
    }
    if (vitals.fcp !== undefined && vitals.fcp > 1800) {
      recommendations.push(
        'Speed up First Contentful Paint: optimize critical rendering path, inline critical CSS'
      );
    }
    if (breakdown.script && breakdown.script.count > 10) {
      recommendations.push('Bundle JavaScript files to reduce HTTP requests');
    }
    if (breakdown.stylesheet && breakdown.stylesheet.count > 5) {
      recommendations.push('Combine CSS files and remove unused styles');
    }
    if (breakdown.image && breakdown.image.totalSize > 1_000_000) {
      recommendations.push(
        'Optimize images: use WebP format, implement lazy loading, compress images'
      );
    }
    if (breakdown.font) {
      recommendations.push(
        'Optimize font loading: use font-display: swap, preload critical fonts'
      );
    }
    if (averageMemory !== undefined && averageMemory > 60) {
      recommendations.push(
        'Optimize memory usage: remove memory leaks, optimize data structures'
      );
    }
    if (resourceCount !== undefined && resourceCount > 100) {
      recommendations.push('Reduce resource count: implement resource bundling and lazy loading');
    }

    return recommendations;
  }

  private identifyCriticalIssues(vitals: WebVitals, memoryPercentage: number | undefined): string[] {
    const critical: string[] = [];

    if (vitals.lcp !== undefined && vitals.lcp > 4000) {
      critical.push('Critical: Largest Contentful Paint exceeds 4 seconds');
    }
    if (vitals.cls !== undefined && vitals.cls > 0.25) {
      critical.push('Critical: Cumulative Layout Shift causes poor user experience');
    }
    if (memoryPercentage !== undefined && memoryPercentage > 90) {
      critical.push('Critical: Memory usage near limit, risk of crashes');
    }

    return critical;
  }

  exportSummary(): PerformanceSummaryExport {
    return {
      monitoringDuration: this.clock() - this.startTime,
      analysis: this.getAnalysis(),
      snapshotCount: this.snapshots.length,
      timeline: takeLast(this.snapshots, this.timelineSize),
    };
  }
}
