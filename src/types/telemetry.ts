/**
 * Telemetry Types
 *
 * Shared shapes for everything pagewatch ingests from a browser and
 * everything it reports back. Raw* types describe what the instrumentation
 * layer hands us; the rest are normalized records and analysis results.
 */

// ============================================
// EVENT ENVELOPE
// ============================================

export const BROWSER_EVENT_TYPES = [
  'console',
  'network',
  'performance',
  'error',
  'interaction',
  'navigation',
] as const;

export type BrowserEventType = (typeof BROWSER_EVENT_TYPES)[number];

export type EventSeverity = 'error' | 'warning' | 'info' | 'debug';

/**
 * JSON-serializable payload carried by an event
 */
export type EventData = Record<string, unknown>;

export interface BrowserEvent {
  /** Sequence number within the owning event log */
  readonly id: number;
  readonly timestamp: number;
  readonly eventType: BrowserEventType;
  readonly source: string;
  readonly severity: EventSeverity;
  readonly data: Readonly<EventData>;
}

/**
 * Clock returning milliseconds
 */
export type ClockFn = () => number;

// ============================================
// CONSOLE
// ============================================

export type ConsoleLevel = 'error' | 'warning' | 'info' | 'debug' | 'log' | 'assert';

export interface SourceLocation {
  url: string;
  lineNumber?: number;
  columnNumber?: number;
}

/**
 * Console event as delivered by the instrumentation layer.
 * `type` is accepted as an alias of `level` (Playwright naming).
 */
export interface RawConsoleEvent {
  text?: string;
  level?: string;
  type?: string;
  location?: SourceLocation;
  stackTrace?: string;
  timestamp?: number;
}

export interface RawPageError {
  message?: string;
  stack?: string;
  timestamp?: number;
}

export interface ConsoleMessage {
  timestamp: number;
  /** Milliseconds since the console monitor started */
  relativeTime: number;
  level: ConsoleLevel;
  text: string;
  location?: SourceLocation;
  stackTrace?: string;
  category: string;
  severityScore: number;
  patternsMatched: string[];
  actionRequired: boolean;
}

export interface ConsolePattern {
  name: string;
  pattern: RegExp;
  category: string;
  severity: ConsoleLevel;
  description: string;
  actionRequired: boolean;
}

export interface CriticalIssue {
  timestamp: number;
  level: ConsoleLevel;
  text: string;
  category: string;
  patterns: string[];
  location?: SourceLocation;
}

export interface PatternCount {
  pattern: string;
  count: number;
}

export interface ConsoleAnalysis {
  totalMessages: number;
  errorCount: number;
  warningCount: number;
  /** info + log */
  infoCount: number;
  debugCount: number;
  levelCounts: Record<ConsoleLevel, number>;
  categories: Record<string, number>;
  criticalIssues: string[];
  patternsDetected: PatternCount[];
  recommendations: string[];
  /** Average severity score across all messages */
  severityScore: number;
}

export interface CategorySummary {
  category: string;
  count: number;
  messages: ConsoleMessage[];
  firstOccurrence?: number;
  lastOccurrence?: number;
  uniqueMessages: number;
}

export interface ConsoleTimelineEntry {
  timestamp: number;
  relativeTime: number;
  level: ConsoleLevel;
  category: string;
  text: string;
}

export interface ConsoleSummaryExport {
  monitoringDuration: number;
  analysis: ConsoleAnalysis;
  categories: Record<string, CategorySummary>;
  criticalIssues: CriticalIssue[];
  timeline: ConsoleTimelineEntry[];
}

// ============================================
// NETWORK
// ============================================

export interface NetworkTiming {
  dnsLookup?: number;
  tcpConnect?: number;
  tlsHandshake?: number;
  requestSent?: number;
  waiting?: number;
  contentDownload?: number;
  totalTime?: number;
}

export interface RawRequestEvent {
  requestId?: string;
  url: string;
  method?: string;
  headers?: Record<string, string>;
  resourceType?: string;
  initiator?: Record<string, unknown>;
  postData?: string;
  timestamp?: number;
}

export interface RawResponseEvent {
  status: number;
  headers?: Record<string, string>;
  size?: number;
  compressedSize?: number;
  fromCache?: boolean | string;
  fromDiskCache?: boolean;
  fromMemoryCache?: boolean;
  fromServiceWorker?: boolean;
  timing?: NetworkTiming;
  timestamp?: number;
}

export interface RawRequestFailure {
  error: string;
  blockedReason?: string;
  timestamp?: number;
}

export type RequestStatus = 'pending' | 'completed' | 'failed';

export interface NetworkRequest {
  requestId: string;
  url: string;
  domain: string;
  method: string;
  headers: Record<string, string>;
  resourceType: string;
  initiator?: Record<string, unknown>;
  postData?: string;
  timestamp: number;
  status: RequestStatus;

  responseStatus?: number;
  responseHeaders?: Record<string, string>;
  responseTimestamp?: number;
  size?: number;
  compressedSize?: number;
  timing?: NetworkTiming;
  cacheHit: boolean;
  fromServiceWorker: boolean;

  error?: string;
  blockedReason?: string;
  /** Milliseconds; defined once a response arrived */
  duration?: number;
}

export interface RequestSample {
  url: string;
  method: string;
  duration: number;
  status?: number;
  size?: number;
  cacheHit: boolean;
}

export interface NetworkAnalysis {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  blockedRequests: number;
  cachedRequests: number;
  averageResponseTime: number;
  slowestRequests: RequestSample[];
  fastestRequests: RequestSample[];
  resourceTypes: Record<string, number>;
  domains: Record<string, number>;
  statusCodes: Record<number, number>;
  totalBytesTransferred: number;
  totalBytesCompressed: number;
  compressionRatio: number;
  issues: string[];
  recommendations: string[];
  performanceScore: number;
}

export interface DomainStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  totalBytes: number;
  averageResponseTime: number;
  minResponseTime: number;
  maxResponseTime: number;
  successRate: number;
  resourceTypes: Record<string, number>;
  statusCodes: Record<number, number>;
}

export interface NetworkTimelineEntry {
  timestamp: number;
  url: string;
  method: string;
  status?: number;
  duration?: number;
  size?: number;
  error?: string;
}

export interface NetworkSummaryExport {
  monitoringDuration: number;
  analysis: NetworkAnalysis;
  domainAnalysis: Record<string, DomainStats>;
  pendingRequests: number;
  timeline: NetworkTimelineEntry[];
}

// ============================================
// PERFORMANCE
// ============================================

export interface MemoryUsage {
  usedJSHeapSize?: number;
  totalJSHeapSize?: number;
  jsHeapSizeLimit?: number;
}

/**
 * One entry of the page's resource timing buffer
 */
export interface ResourceTimingEntry {
  name: string;
  initiatorType?: string;
  startTime: number;
  duration: number;
  transferSize?: number;
  encodedBodySize?: number;
  decodedBodySize?: number;
}

export type ResourceCategory = 'script' | 'stylesheet' | 'image' | 'font' | 'api' | 'other';

export interface ResourceHighlight {
  name: string;
  size: number;
  duration: number;
}

export interface ResourceBreakdown {
  count: number;
  totalDuration: number;
  totalSize: number;
  averageDuration: number;
  /** Largest by transfer size; absent when no entry reported a size */
  largestResource?: ResourceHighlight;
  slowestResource?: ResourceHighlight;
}

export interface PerformanceMetrics {
  timestamp: number;
  url?: string;
  pageLoadTime?: number;
  domContentLoaded?: number;
  firstPaint?: number;
  firstContentfulPaint?: number;
  largestContentfulPaint?: number;
  cumulativeLayoutShift?: number;
  firstInputDelay?: number;
  timeToInteractive?: number;
  totalBlockingTime?: number;
  memoryUsage?: MemoryUsage;
  resourceCount?: number;
  /** Resource timing entries of the current document */
  resources?: ResourceTimingEntry[];
}

/**
 * Browser round-trip returning a raw timing payload.
 * The payload is untrusted and validated field by field.
 */
export type PerformanceProbe = () => Promise<unknown>;

export type PerformanceGrade = 'excellent' | 'good' | 'needs_improvement' | 'poor';

export interface WebVitals {
  lcp?: number;
  lcpGrade?: PerformanceGrade;
  fcp?: number;
  fcpGrade?: PerformanceGrade;
  cls?: number;
  clsGrade?: PerformanceGrade;
  fid?: number;
  fidGrade?: PerformanceGrade;
  tti?: number;
  ttiGrade?: PerformanceGrade;
  tbt?: number;
  tbtGrade?: PerformanceGrade;
}

export interface PerformanceAnalysis {
  snapshotCount: number;
  webVitals: WebVitals;
  overallScore: number;
  overallGrade: PerformanceGrade;
  pageLoadTime?: number;
  domContentLoaded?: number;
  firstPaint?: number;
  resourceCount?: number;
  totalTransferSize: number;
  totalEncodedSize: number;
  /** 1 - encoded / transferred, clamped to [0, 1]; 0 when nothing was transferred */
  compressionRatio: number;
  resourceBreakdown: Partial<Record<ResourceCategory, ResourceBreakdown>>;
  memoryUsagePercentage?: number;
  /** Mean usage over every snapshot that reported memory */
  averageMemoryUsagePercentage?: number;
  memoryGrade?: PerformanceGrade;
  bottlenecks: string[];
  recommendations: string[];
  criticalIssues: string[];
}

export interface PerformanceSummaryExport {
  monitoringDuration: number;
  analysis: PerformanceAnalysis;
  snapshotCount: number;
  timeline: PerformanceMetrics[];
}

// ============================================
// SESSION
// ============================================

export interface ConsoleStats {
  total: number;
  errors: number;
  warnings: number;
  info: number;
  critical: number;
}

export interface NetworkStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  pendingRequests: number;
  statusCodes: Record<number, number>;
  performanceScore: number;
}

export interface SessionSummary {
  sessionId: string;
  startedAt: number;
  sessionDuration: number;
  totalEvents: number;
  console: ConsoleStats;
  network: NetworkStats;
  performance: PerformanceMetrics | null;
  monitoringActive: boolean;
}

export interface SessionExport {
  summary: SessionSummary;
  console: ConsoleSummaryExport;
  network: NetworkSummaryExport;
  performance: PerformanceSummaryExport;
  timeline: BrowserEvent[];
}

export interface RawNavigationEvent {
  url: string;
  title?: string;
  /** What triggered the navigation (load, goto, history, ...) */
  trigger?: string;
}

export type SessionEventListener = (event: BrowserEvent) => void;

export interface TeardownReport {
  sessionId: string;
  pendingRequests: number;
  sessionDuration: number;
}
