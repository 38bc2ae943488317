/**
 * Console Monitor
 *
 * Classifies console output and uncaught page errors against the ordered
 * rule table, and derives analyses and recommendations from the messages
 * collected so far. Analyses are recomputed from the message list on every
 * call; nothing derived is cached.
 */

import type {
  CategorySummary,
  ClockFn,
  ConsoleAnalysis,
  ConsoleLevel,
  ConsoleMessage,
  ConsolePattern,
  ConsoleSummaryExport,
  CriticalIssue,
  PatternCount,
  RawConsoleEvent,
  RawPageError,
} from '../types/telemetry.js';
import { CONSOLE_PATTERNS, CRITICAL_SEVERITY_SCORE, severityScore } from './console-patterns.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { monotonicNow } from '../utils/clock.js';
import { previewText } from '../utils/text-preview.js';
import { takeLast, valueRange } from '../utils/series.js';

export interface ConsoleMonitorOptions {
  clock?: ClockFn;
  logger?: Logger;
  /** Rule table; defaults to the built-in patterns */
  patterns?: readonly ConsolePattern[];
  criticalIssueLimit?: number;
  timelineSize?: number;
  textPreviewLength?: number;
}

const LEVEL_ALIASES: Record<string, ConsoleLevel> = {
  error: 'error',
  warning: 'warning',
  warn: 'warning',
  info: 'info',
  debug: 'debug',
  log: 'log',
  assert: 'assert',
};

/**
 * Map a browser console type onto a console level. Types with no level of
 * their own (dir, table, trace, count, ...) are plain log output.
 */
export function normalizeConsoleLevel(level: string | undefined): ConsoleLevel {
  if (!level) return 'log';
  return LEVEL_ALIASES[level.toLowerCase()] ?? 'log';
}

function isCritical(message: ConsoleMessage): boolean {
  return message.actionRequired || message.severityScore >= CRITICAL_SEVERITY_SCORE;
}

function emptyLevelCounts(): Record<ConsoleLevel, number> {
  return { error: 0, warning: 0, info: 0, debug: 0, log: 0, assert: 0 };
}

export class ConsoleMonitor {
  private messages: ConsoleMessage[] = [];
  private byCategory: Map<string, ConsoleMessage[]> = new Map();
  private readonly startTime: number;
  private readonly clock: ClockFn;
  private readonly log: Logger;
  private readonly patterns: readonly ConsolePattern[];
  private readonly criticalIssueLimit: number;
  private readonly timelineSize: number;
  private readonly textPreviewLength: number;

  constructor(options: ConsoleMonitorOptions = {}) {
    this.clock = options.clock ?? monotonicNow;
    this.log = options.logger ?? rootLogger.console;
    this.patterns = options.patterns ?? CONSOLE_PATTERNS;
    this.criticalIssueLimit = options.criticalIssueLimit ?? 10;
    this.timelineSize = options.timelineSize ?? 20;
    this.textPreviewLength = options.textPreviewLength ?? 100;
    this.startTime = this.clock();
  }

  /**
   * Classify and store one console message
   */
  addMessage(raw: RawConsoleEvent): ConsoleMessage {
    const timestamp = raw.timestamp ?? this.clock();
    const message: ConsoleMessage = {
      timestamp,
      relativeTime: timestamp - this.startTime,
      level: normalizeConsoleLevel(raw.level ?? raw.type),
      text: raw.text ?? '',
      location: raw.location,
      stackTrace: raw.stackTrace,
      category: 'uncategorized',
      severityScore: 0,
      patternsMatched: [],
      actionRequired: false,
    };

    this.classify(message);

    const bucket = this.byCategory.get(message.category);
    if (bucket) {
      bucket.push(message);
    } else {
      this.byCategory.set(message.category, [message]);
    }
    this.messages.push(message);

    if (message.severityScore >= CRITICAL_SEVERITY_SCORE) {
      this.log.warn('Critical console issue detected', {
        category: message.category,
        patterns: message.patternsMatched,
        text: previewText(message.text, this.textPreviewLength),
      });
    }

    return message;
  }

  /**
   * An uncaught page error is an error-level console message carrying the
   * error's stack
   */
  addPageError(raw: RawPageError): ConsoleMessage {
    return this.addMessage({
      text: raw.message ?? '',
      level: 'error',
      stackTrace: raw.stack,
      timestamp: raw.timestamp,
    });
  }

  private classify(message: ConsoleMessage): void {
    for (const rule of this.patterns) {
      if (!rule.pattern.test(message.text)) continue;

      if (!message.patternsMatched.includes(rule.name)) {
        message.patternsMatched.push(rule.name);
      }
      message.category = rule.category;
      message.severityScore = Math.max(message.severityScore, severityScore(rule.severity));
      if (rule.actionRequired) {
        message.actionRequired = true;
      }
    }
  }

  getAnalysis(): ConsoleAnalysis {
    const levelCounts = emptyLevelCounts();
    if (this.messages.length === 0) {
      return {
        totalMessages: 0,
        errorCount: 0,
        warningCount: 0,
        infoCount: 0,
        debugCount: 0,
        levelCounts,
        categories: {},
        criticalIssues: [],
        patternsDetected: [],
        recommendations: [],
        severityScore: 0,
      };
    }

    const patternCounts = new Map<string, number>();
    let totalSeverity = 0;

    for (const message of this.messages) {
      levelCounts[message.level]++;
      totalSeverity += message.severityScore;
      for (const name of message.patternsMatched) {
        patternCounts.set(name, (patternCounts.get(name) ?? 0) + 1);
      }
    }

    const categories: Record<string, number> = {};
    for (const [category, messages] of this.byCategory) {
      categories[category] = messages.length;
    }

    // Map iteration keeps first-seen order, and sort is stable
    const patternsDetected: PatternCount[] = [...patternCounts.entries()]
      .map(([pattern, count]) => ({ pattern, count }))
      .sort((a, b) => b.count - a.count);

    const criticalIssues = this.newestFirst(this.messages.filter(isCritical))
      .slice(0, this.criticalIssueLimit)
      .map((message) => previewText(message.text, this.textPreviewLength));

    return {
      totalMessages: this.messages.length,
      errorCount: levelCounts.error,
      warningCount: levelCounts.warning,
      infoCount: levelCounts.info + levelCounts.log,
      debugCount: levelCounts.debug,
      levelCounts,
      categories,
      criticalIssues,
      patternsDetected,
      recommendations: this.generateRecommendations(categories),
      severityScore: totalSeverity / this.messages.length,
    };
  }

  private generateRecommendations(categories: Record<string, number>): string[] {
    const count = (category: string): number => categories[category] ?? 0;
    const recommendations: string[] = [];

    if (count('javascript_error') > 0) {
      recommendations.push(
        `Fix ${count('javascript_error')} JavaScript errors to improve application stability`
      );
    }

    if (count('network_error') > 0) {
      recommendations.push(
        `Investigate ${count('network_error')} network failures - check API endpoints and connectivity`
      );
    }

    if (count('cors_error') > 0) {
      recommendations.push('Configure CORS headers properly to resolve cross-origin request issues');
    }

    if (count('performance_warning') > 0) {
      recommendations.push('Address performance warnings to improve user experience');
    }

    if (count('security_error') > 0 || count('security_warning') > 0) {
      recommendations.push('Review and fix security-related issues (CSP violations, mixed content)');
    }

    if (count('deprecation_warning') > 0) {
      recommendations.push('Update deprecated API usage to prevent future compatibility issues');
    }

    if (count('framework_warning') > 0) {
      recommendations.push('Address framework-specific warnings to ensure optimal performance');
    }

    if (count('debug_message') > 5) {
      recommendations.push('Remove debug/development console messages from production code');
    }

    if (count('javascript_error') + count('network_error') > 10) {
      recommendations.push(
        'High error volume detected - prioritize error resolution for better user experience'
      );
    }

    return recommendations;
  }

  /**
   * Messages that need attention: action-required or critical severity
   */
  getCriticalIssues(): CriticalIssue[] {
    return this.newestFirst(this.messages.filter(isCritical)).map((message) => ({
      timestamp: message.timestamp,
      level: message.level,
      text: message.text,
      category: message.category,
      patterns: [...message.patternsMatched],
      location: message.location,
    }));
  }

  getCategorySummary(category: string): CategorySummary {
    const messages = this.byCategory.get(category);
    if (!messages || messages.length === 0) {
      return { category, count: 0, messages: [], uniqueMessages: 0 };
    }

    const range = valueRange(messages.map((m) => m.timestamp));
    return {
      category,
      count: messages.length,
      messages: takeLast(messages, 10),
      firstOccurrence: range?.min,
      lastOccurrence: range?.max,
      uniqueMessages: new Set(messages.map((m) => m.text)).size,
    };
  }

  getMessages(): ConsoleMessage[] {
    return [...this.messages];
  }

  get messageCount(): number {
    return this.messages.length;
  }

  exportSummary(): ConsoleSummaryExport {
    const categories: Record<string, CategorySummary> = {};
    for (const category of this.byCategory.keys()) {
      categories[category] = this.getCategorySummary(category);
    }

    const ordered = [...this.messages].sort((a, b) => a.timestamp - b.timestamp);
    const timeline = takeLast(ordered, this.timelineSize)
      .map((message) => ({
        timestamp: message.timestamp,
        relativeTime: message.relativeTime,
        level: message.level,
        category: message.category,
        text: previewText(message.text, this.textPreviewLength),
      }));

    return {
      monitoringDuration: this.clock() - this.startTime,
      analysis: this.getAnalysis(),
      categories,
      criticalIssues: this.getCriticalIssues(),
      timeline,
    };
  }

  /**
   * Newest first by timestamp; among equal timestamps the later arrival wins
   */
  private newestFirst(messages: ConsoleMessage[]): ConsoleMessage[] {
    return messages
      .map((message, index) => ({ message, index }))
      .sort((a, b) => b.message.timestamp - a.message.timestamp || b.index - a.index)
      .map(({ message }) => message);
  }
}
