/**
 * Console Classification Rules
 *
 * Evaluated in order against every console message. A message takes the
 * category of the LAST rule it matches, so this table runs from the most
 * general rule to the most specific one: a message that is both an uncaught
 * exception and mentions "debug" ends up as `javascript_error`.
 *
 * Reordering this table changes classification results.
 */

import type { ConsoleLevel, ConsolePattern } from '../types/telemetry.js';

/**
 * Fixed severity scale used for ranking, not configurable
 */
export const SEVERITY_SCORES: Record<ConsoleLevel, number> = {
  error: 5,
  assert: 5,
  warning: 3,
  info: 1,
  log: 1,
  debug: 0,
};

/** Score at or above which a message is a critical issue */
export const CRITICAL_SEVERITY_SCORE = 5;

export function severityScore(level: ConsoleLevel): number {
  return SEVERITY_SCORES[level];
}

export const CONSOLE_PATTERNS: readonly ConsolePattern[] = [
  // Development noise
  {
    name: 'debug_message',
    pattern: /(debug|dev|development|console\.log)/i,
    category: 'debug_message',
    severity: 'debug',
    description: 'Development/debug message',
    actionRequired: false,
  },

  // Third parties
  {
    name: 'third_party_error',
    pattern: /(google|facebook|twitter|analytics|gtag|fbq)/i,
    category: 'third_party_error',
    severity: 'warning',
    description: 'Third-party service error',
    actionRequired: false,
  },

  // Frameworks
  {
    name: 'angular_warning',
    pattern: /Angular|ng-/i,
    category: 'framework_warning',
    severity: 'warning',
    description: 'Angular framework warning',
    actionRequired: false,
  },
  {
    name: 'vue_warning',
    pattern: /Vue warn|Vue\.js/i,
    category: 'framework_warning',
    severity: 'warning',
    description: 'Vue.js framework warning',
    actionRequired: false,
  },
  {
    name: 'react_warning',
    pattern: /React|Warning.*React/i,
    category: 'framework_warning',
    severity: 'warning',
    description: 'React framework warning',
    actionRequired: false,
  },

  // Resource warnings
  {
    name: 'memory_warning',
    pattern: /(memory|heap|leak|garbage)/i,
    category: 'memory_warning',
    severity: 'warning',
    description: 'Memory usage warning',
    actionRequired: false,
  },
  {
    name: 'performance_warning',
    pattern: /(slow|performance|optimization|inefficient)/i,
    category: 'performance_warning',
    severity: 'warning',
    description: 'Performance-related warning',
    actionRequired: false,
  },
  {
    name: 'deprecation',
    pattern: /(deprecated|deprecation|will be removed)/i,
    category: 'deprecation_warning',
    severity: 'warning',
    description: 'Deprecated API usage',
    actionRequired: false,
  },

  // Security
  {
    name: 'mixed_content',
    pattern: /Mixed Content|insecure.*secure/i,
    category: 'security_warning',
    severity: 'warning',
    description: 'Mixed content warning',
    actionRequired: false,
  },
  {
    name: 'csp_violation',
    pattern: /Content Security Policy|CSP/i,
    category: 'security_error',
    severity: 'error',
    description: 'Content Security Policy violation',
    actionRequired: true,
  },
  {
    name: 'cors_error',
    pattern: /(CORS|Cross-Origin|Access-Control-Allow)/i,
    category: 'cors_error',
    severity: 'error',
    description: 'CORS policy violation',
    actionRequired: true,
  },

  // Failures
  {
    name: 'network_error',
    pattern: /(Failed to load|net::ERR_|NetworkError|fetch.*failed)/i,
    category: 'network_error',
    severity: 'error',
    description: 'Network request failure',
    actionRequired: true,
  },
  {
    name: 'uncaught_exception',
    pattern: /Uncaught\s+(TypeError|ReferenceError|SyntaxError|Error)/i,
    category: 'javascript_error',
    severity: 'error',
    description: 'Uncaught JavaScript exception',
    actionRequired: true,
  },
];
