/**
 * Diagnostic Messages with Actionable Suggestions
 *
 * The engine never throws on ingestion, so most failures surface only as
 * log lines. These builders keep those lines consistent:
 * - Clear description of what went wrong
 * - Actionable suggestions for resolution
 */

/**
 * Error message builder options
 */
export interface ErrorMessageOptions {
  /** Main error description */
  message: string;
  /** Suggested actions to resolve the issue */
  suggestions?: string[];
  /** Alternative approaches */
  alternatives?: string[];
}

/**
 * Build a formatted error message with suggestions
 */
export function buildErrorMessage(options: ErrorMessageOptions): string {
  const parts: string[] = [options.message];

  if (options.suggestions && options.suggestions.length > 0) {
    if (options.suggestions.length === 1) {
      parts.push(options.suggestions[0]);
    } else {
      parts.push('Suggestions:');
      options.suggestions.forEach(s => parts.push(`  - ${s}`));
    }
  }

  if (options.alternatives && options.alternatives.length > 0) {
    if (options.alternatives.length === 1) {
      parts.push(`Alternative: ${options.alternatives[0]}`);
    } else {
      parts.push('Alternatives:');
      options.alternatives.forEach(a => parts.push(`  - ${a}`));
    }
  }

  return parts.join('\n');
}

// =============================================================================
// CORRELATION
// =============================================================================

/**
 * A response or failure arrived for a request id that is not pending
 */
export function unknownRequestMessage(kind: 'response' | 'failure', requestId: string): string {
  return buildErrorMessage({
    message: `${kind === 'response' ? 'Response received' : 'Failure reported'} for unknown request: ${requestId}`,
    suggestions: [
      'Events from before monitoring started cannot be correlated',
      'Make sure the same request id is passed to addRequest and the settling call',
    ],
  });
}

// =============================================================================
// PERFORMANCE SNAPSHOTS
// =============================================================================

/**
 * The performance probe rejected
 */
export function snapshotFailedMessage(reason: string): string {
  return buildErrorMessage({
    message: `Failed to collect performance metrics: ${reason}`,
    suggestions: [
      'The page may have navigated or closed while the snapshot was taken',
      'The snapshot is recorded with every metric absent',
    ],
  });
}

/**
 * The performance probe did not settle in time
 */
export function snapshotTimeoutMessage(timeoutMs: number): string {
  return buildErrorMessage({
    message: `Performance snapshot timed out after ${timeoutMs}ms`,
    suggestions: [
      'Raise PAGEWATCH_SNAPSHOT_TIMEOUT_MS if the page is slow to respond',
    ],
  });
}

// =============================================================================
// SESSION LIFECYCLE
// =============================================================================

/**
 * Ingestion was attempted after the session stopped
 */
export function sessionStoppedMessage(sessionId: string, signal: string): string {
  return buildErrorMessage({
    message: `Ignoring ${signal} for stopped session ${sessionId}`,
    alternatives: ['Create a new session to keep monitoring'],
  });
}

/**
 * An event type outside the known set was recorded
 */
export function invalidEventTypeMessage(eventType: string): string {
  return buildErrorMessage({
    message: `Dropping event with invalid type "${eventType}"`,
    suggestions: ['Use one of: console, network, performance, error, interaction, navigation'],
  });
}
