/**
 * Network Insights
 *
 * Fixed thresholds that turn aggregate network numbers into issues,
 * recommendations and a 0-100 performance score.
 */

export interface NetworkInsightInput {
  totalRequests: number;
  failedRequests: number;
  averageResponseTime: number;
  statusCodes: Record<number, number>;
  domains: Record<string, number>;
  resourceTypes: Record<string, number>;
}

export interface NetworkInsights {
  issues: string[];
  recommendations: string[];
}

export const NETWORK_THRESHOLDS = {
  /** Failure rate strictly above this is an issue */
  FAILURE_RATE: 0.1,
  SLOW_AVERAGE_MS: 2000,
  SOFT_SLOW_AVERAGE_MS: 1000,
  MAX_DOMAINS: 10,
  MAX_REQUESTS: 100,
  MAX_IMAGES: 20,
  MAX_SCRIPTS: 15,
} as const;

function sumStatuses(statusCodes: Record<number, number>, match: (status: number) => boolean): number {
  let total = 0;
  for (const [status, count] of Object.entries(statusCodes)) {
    if (match(Number(status))) total += count;
  }
  return total;
}

export function analyzeNetworkIssues(input: NetworkInsightInput): NetworkInsights {
  const issues: string[] = [];
  const recommendations: string[] = [];

  const failureRate = input.totalRequests > 0 ? input.failedRequests / input.totalRequests : 0;
  if (failureRate > NETWORK_THRESHOLDS.FAILURE_RATE) {
    issues.push(`High network failure rate: ${(failureRate * 100).toFixed(1)}% of requests failed`);
    recommendations.push('Investigate network failures - check API endpoints and server status');
  }

  if (input.averageResponseTime > NETWORK_THRESHOLDS.SLOW_AVERAGE_MS) {
    issues.push(`Slow average response time: ${input.averageResponseTime.toFixed(0)}ms`);
    recommendations.push('Optimize API response times - consider caching, CDN, or server optimization');
  } else if (input.averageResponseTime > NETWORK_THRESHOLDS.SOFT_SLOW_AVERAGE_MS) {
    recommendations.push('Consider optimizing response times for better user experience');
  }

  const clientErrors = sumStatuses(input.statusCodes, (s) => s >= 400 && s < 500);
  const serverErrors = sumStatuses(input.statusCodes, (s) => s >= 500);

  if (clientErrors > 0) {
    issues.push(`Client errors detected: ${clientErrors} requests with 4xx status codes`);
    recommendations.push('Review client-side requests - check URLs, parameters, and authentication');
  }

  if (serverErrors > 0) {
    issues.push(`Server errors detected: ${serverErrors} requests with 5xx status codes`);
    recommendations.push('Investigate server-side issues - check server logs and health');
  }

  const domainCount = Object.keys(input.domains).length;
  if (domainCount > NETWORK_THRESHOLDS.MAX_DOMAINS) {
    issues.push(`High number of domains: ${domainCount} different domains contacted`);
    recommendations.push('Consider reducing external dependencies to improve loading performance');
  }

  if (input.totalRequests > NETWORK_THRESHOLDS.MAX_REQUESTS) {
    recommendations.push('High request volume detected - consider request bundling or optimization');
  }

  if ((input.resourceTypes['image'] ?? 0) > NETWORK_THRESHOLDS.MAX_IMAGES) {
    recommendations.push('Many image requests detected - consider image optimization and lazy loading');
  }

  if ((input.resourceTypes['script'] ?? 0) > NETWORK_THRESHOLDS.MAX_SCRIPTS) {
    recommendations.push('Many script requests detected - consider script bundling and minification');
  }

  return { issues, recommendations };
}

/**
 * Banded, not continuous: marginal latency differences inside a band
 * score the same.
 */
export function responseTimeBand(averageResponseTime: number): number {
  if (averageResponseTime < 500) return 40;
  if (averageResponseTime < 1000) return 30;
  if (averageResponseTime < 2000) return 20;
  return 10;
}

/**
 * 40 x success rate + response-time band + 20 x cache rate, clamped to [0, 100]
 */
export function calculatePerformanceScore(
  successRate: number,
  averageResponseTime: number,
  cacheRate: number
): number {
  const score = successRate * 40 + responseTimeBand(averageResponseTime) + cacheRate * 20;
  return Math.min(100, Math.max(0, score));
}
