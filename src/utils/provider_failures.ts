/**
 * Classification of provider diagnostics (stderr, error envelopes) into a
 * small set of reasons. The retry policy and the remediation hints both key
 * off the reason, never off the raw text.
 */

export type ProviderFailureReason =
  | 'rate_limit'
  | 'quota_exceeded'
  | 'auth_failed'
  | 'timeout'
  | 'network_error'
  | 'overloaded'
  | 'invalid_response'
  | 'unavailable'
  | 'unknown';

const TRANSIENT_REASONS: ReadonlySet<ProviderFailureReason> = new Set([
  'rate_limit',
  'timeout',
  'network_error',
  'overloaded',
]);

export function classifyProviderFailure(message: string): ProviderFailureReason {
  const normalized = message.toLowerCase();
  if (
    normalized.includes('inside another claude code session')
    || normalized.includes('cannot be launched inside another')
    || normalized.includes('nested session')
  ) {
    return 'unavailable';
  }
  if (
    normalized.includes('rate limit')
    || normalized.includes('rate_limit')
    || normalized.includes('rate-limit')
    || normalized.includes('too many requests')
    || /\b429\b/.test(normalized)
    || normalized.includes('limit reached')
  ) {
    return 'rate_limit';
  }
  if (normalized.includes('quota') || normalized.includes('insufficient credit')) {
    return 'quota_exceeded';
  }
  if (
    normalized.includes('overloaded')
    || /\b529\b/.test(normalized)
    || /\b503\b/.test(normalized)
    || normalized.includes('temporarily unavailable')
  ) {
    return 'overloaded';
  }
  if (
    normalized.includes('unauthorized')
    || normalized.includes('not authenticated')
    || normalized.includes('not logged in')
    || normalized.includes('authentication')
    || normalized.includes('api key')
    || /\b401\b/.test(normalized)
  ) {
    return 'auth_failed';
  }
  if (normalized.includes('timeout') || normalized.includes('timed out')) {
    return 'timeout';
  }
  if (
    normalized.includes('network')
    || normalized.includes('econnreset')
    || normalized.includes('econnrefused')
    || normalized.includes('etimedout')
    || normalized.includes('enotfound')
    || normalized.includes('socket hang up')
  ) {
    return 'network_error';
  }
  if (normalized.includes('invalid') || normalized.includes('schema')) {
    return 'invalid_response';
  }
  if (normalized.includes('unavailable')) {
    return 'unavailable';
  }
  return 'unknown';
}

/** Rate-limit-like failures that a later attempt can plausibly clear. */
export function isTransientFailureReason(reason: ProviderFailureReason): boolean {
  return TRANSIENT_REASONS.has(reason);
}
