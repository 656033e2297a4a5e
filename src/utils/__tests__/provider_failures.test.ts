import { describe, expect, it } from 'vitest';
import { classifyProviderFailure, isTransientFailureReason } from '../provider_failures.js';

describe('classifyProviderFailure', () => {
  it.each([
    ['Error: rate limited', 'rate_limit'],
    ['HTTP 429 Too Many Requests', 'rate_limit'],
    ['You have exceeded your quota', 'quota_exceeded'],
    ['API overloaded (529)', 'overloaded'],
    ['401 Unauthorized', 'auth_failed'],
    ['request timed out', 'timeout'],
    ['read ECONNRESET', 'network_error'],
    ['output schema validation failed', 'invalid_response'],
    ['cannot be launched inside another Claude Code session', 'unavailable'],
    ['segfault', 'unknown'],
  ])('classifies %j as %s', (message, reason) => {
    expect(classifyProviderFailure(message)).toBe(reason);
  });
});

describe('isTransientFailureReason', () => {
  it('treats only rate-limit-like reasons as transient', () => {
    expect(isTransientFailureReason('rate_limit')).toBe(true);
    expect(isTransientFailureReason('overloaded')).toBe(true);
    expect(isTransientFailureReason('auth_failed')).toBe(false);
    expect(isTransientFailureReason('invalid_response')).toBe(false);
  });

  it('does not retry an exhausted quota', () => {
    expect(isTransientFailureReason(classifyProviderFailure('You have exceeded your quota'))).toBe(false);
    expect(isTransientFailureReason(classifyProviderFailure('insufficient credit balance'))).toBe(false);
  });
});
