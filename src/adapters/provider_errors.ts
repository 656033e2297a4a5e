/**
 * Error taxonomy for provider calls.
 *
 * Provider-level failures are values (`ProviderFailure`) wrapped in a
 * `ProviderError`; they are recovered by retry or fallback. Only
 * `AllProvidersFailedError` and `GenerationCancelledError` reach the caller.
 */

import type { Provider } from './providers.js';
import { PROVIDER_PROFILES, providerDisplayName } from './providers.js';
import {
  classifyProviderFailure,
  isTransientFailureReason,
  type ProviderFailureReason,
} from '../utils/provider_failures.js';
import { clipLine } from '../utils/text_truncation.js';

export type ProviderFailure =
  | { kind: 'not_installed' }
  | { kind: 'spawn_failed'; reason: string }
  | { kind: 'timeout'; timeoutMs: number }
  | { kind: 'non_zero_exit'; code: number; stderr: string }
  | { kind: 'invalid_json'; reason: string }
  | { kind: 'execution_failed'; message: string }
  | { kind: 'cancelled' }
  | { kind: 'retries_exhausted'; attempts: number; lastError: ProviderError };

export type ProviderFailureKind = ProviderFailure['kind'];

export type ProviderResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ProviderError };

export function formatDuration(ms: number): string {
  return ms % 1000 === 0 ? `${ms / 1000}s` : `${ms}ms`;
}

function summarize(provider: Provider, failure: ProviderFailure): string {
  const name = providerDisplayName(provider);
  switch (failure.kind) {
    case 'not_installed':
      return `${name} CLI not found`;
    case 'spawn_failed':
      return `Failed to start ${name} CLI`;
    case 'timeout':
      return `${name} timed out after ${formatDuration(failure.timeoutMs)}`;
    case 'non_zero_exit':
      return `${name} CLI exited with code ${failure.code}`;
    case 'invalid_json':
      return `${name} returned invalid JSON`;
    case 'execution_failed':
      return `${name} CLI reported an error`;
    case 'cancelled':
      return `${name} call was cancelled`;
    case 'retries_exhausted':
      return `${name} failed after ${failure.attempts} attempts (${failure.lastError.summary()})`;
  }
}

function describe(provider: Provider, failure: ProviderFailure): string {
  const name = providerDisplayName(provider);
  switch (failure.kind) {
    case 'not_installed':
      return `${name} CLI not found. ${PROVIDER_PROFILES[provider].installHint}`;
    case 'spawn_failed':
      return `Failed to spawn ${name} process: ${failure.reason}`;
    case 'timeout':
      return `${name} process timed out after ${formatDuration(failure.timeoutMs)}`;
    case 'non_zero_exit':
      return `${name} CLI exited with code ${failure.code}: ${failure.stderr.trim() || '<no stderr>'}`;
    case 'invalid_json':
      return `${name} returned invalid JSON: ${failure.reason}`;
    case 'execution_failed':
      return `${name} CLI failed to execute: ${failure.message}`;
    case 'cancelled':
      return `${name} call was cancelled before completion`;
    case 'retries_exhausted':
      return `${name} failed after ${failure.attempts} attempts: ${failure.lastError.detail()}`;
  }
}

export class ProviderError extends Error {
  readonly provider: Provider;
  readonly failure: ProviderFailure;

  constructor(provider: Provider, failure: ProviderFailure) {
    super(summarize(provider, failure));
    this.name = 'ProviderError';
    this.provider = provider;
    this.failure = failure;
  }

  get kind(): ProviderFailureKind {
    return this.failure.kind;
  }

  /** Concise, stderr-free description. */
  summary(): string {
    return summarize(this.provider, this.failure);
  }

  /** Verbose description including raw stderr or parse reasons. */
  detail(): string {
    return describe(this.provider, this.failure);
  }

  /** The underlying failure when this error wraps exhausted retries. */
  rootCause(): ProviderError {
    return this.failure.kind === 'retries_exhausted' ? this.failure.lastError.rootCause() : this;
  }

  failureReason(): ProviderFailureReason {
    const failure = this.failure;
    switch (failure.kind) {
      case 'timeout':
        return 'timeout';
      case 'non_zero_exit':
        return classifyProviderFailure(failure.stderr);
      case 'execution_failed':
        return classifyProviderFailure(failure.message);
      case 'invalid_json':
        return 'invalid_response';
      case 'not_installed':
      case 'spawn_failed':
        return 'unavailable';
      case 'retries_exhausted':
        return failure.lastError.failureReason();
      case 'cancelled':
        return 'unknown';
    }
  }

  /**
   * Whether another attempt can help. Missing binaries and malformed output
   * are never retried; exhausted retries are final by definition.
   */
  isTransient(): boolean {
    switch (this.failure.kind) {
      case 'timeout':
        return true;
      case 'non_zero_exit':
      case 'execution_failed':
        return isTransientFailureReason(this.failureReason());
      default:
        return false;
    }
  }

  remediationHint(): string | null {
    const root = this.rootCause();
    const profile = PROVIDER_PROFILES[root.provider];
    if (root.kind === 'not_installed') return profile.installHint;
    if (root.kind === 'cancelled') return null;
    switch (root.failureReason()) {
      case 'auth_failed':
        return profile.authHint;
      case 'rate_limit':
        return `${profile.displayName} is rate limited; wait before retrying or select the other provider as primary`;
      case 'quota_exceeded':
        return `${profile.displayName} has no quota left; top up the account or select the other provider as primary`;
      case 'timeout': {
        const variable = `RELEASE_SCRIBE_${root.provider.toUpperCase()}_TIMEOUT_MS`;
        return `Raise ${variable} if ${profile.displayName} needs longer to respond`;
      }
      default:
        return null;
    }
  }
}

export class AllProvidersFailedError extends Error {
  readonly primary: Provider;
  readonly primaryError: ProviderError;
  readonly fallback: Provider;
  readonly fallbackError: ProviderError;

  constructor(params: {
    primary: Provider;
    primaryError: ProviderError;
    fallback: Provider;
    fallbackError: ProviderError;
  }) {
    super(
      `Both LLM providers failed. ${providerDisplayName(params.primary)} error: ${params.primaryError.summary()}. `
      + `${providerDisplayName(params.fallback)} error: ${params.fallbackError.summary()}.`
    );
    this.name = 'AllProvidersFailedError';
    this.primary = params.primary;
    this.primaryError = params.primaryError;
    this.fallback = params.fallback;
    this.fallbackError = params.fallbackError;
  }

  summary(): string {
    return this.message;
  }

  detail(): string {
    return `Both LLM providers failed. ${providerDisplayName(this.primary)} error: ${this.primaryError.detail()}. `
      + `${providerDisplayName(this.fallback)} error: ${this.fallbackError.detail()}.`;
  }

  remediationHints(): string[] {
    const hints = [this.primaryError.remediationHint(), this.fallbackError.remediationHint()];
    return [...new Set(hints.filter((hint): hint is string => hint !== null))];
  }
}

export class GenerationCancelledError extends Error {
  readonly provider: Provider | null;

  constructor(provider: Provider | null) {
    super(
      provider
        ? `Generation cancelled while waiting on ${providerDisplayName(provider)}`
        : 'Generation cancelled before any provider was called'
    );
    this.name = 'GenerationCancelledError';
    this.provider = provider;
  }
}

/**
 * User-facing text for a generation failure. Raw stderr and parse details
 * only appear under `verbose`.
 */
export function describeGenerationFailure(error: unknown, options: { verbose?: boolean } = {}): string {
  if (error instanceof AllProvidersFailedError) {
    const lines = [options.verbose ? error.detail() : error.summary()];
    for (const hint of error.remediationHints()) {
      lines.push(`hint: ${hint}`);
    }
    return lines.join('\n');
  }
  if (error instanceof ProviderError) {
    const lines = [options.verbose ? error.detail() : error.summary()];
    const hint = error.remediationHint();
    if (hint) lines.push(`hint: ${hint}`);
    return lines.join('\n');
  }
  if (error instanceof Error) {
    return options.verbose ? (error.stack ?? error.message) : clipLine(error.message, 220);
  }
  return clipLine(String(error), 220);
}
