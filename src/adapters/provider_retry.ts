import { setTimeout as sleepFor } from 'node:timers/promises';
import { logDebug, logInfo } from '../telemetry/logger.js';
import type { RetrySettings } from '../config/settings.js';
import { formatDuration, ProviderError, type ProviderResult } from './provider_errors.js';
import type { Provider } from './providers.js';

export type RetryState = 'not_started' | 'attempting' | 'succeeded' | 'failed';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions extends RetrySettings {
  provider: Provider;
  signal?: AbortSignal;
  sleep?: SleepFn;
  random?: () => number;
}

const defaultSleep: SleepFn = async (ms, signal) => {
  await sleepFor(ms, undefined, { signal });
};

/**
 * Delay before retry number `retry` (1-based): `base * 2^(retry-1)`, capped at
 * `maxDelayMs`. Jitter scales the capped delay into [50%, 100%].
 */
export function computeBackoffDelay(
  retry: number,
  settings: Pick<RetrySettings, 'baseDelayMs' | 'maxDelayMs' | 'jitter'>,
  random: () => number = Math.random
): number {
  const exponent = Math.max(0, retry - 1);
  const delay = Math.min(settings.baseDelayMs * 2 ** exponent, settings.maxDelayMs);
  if (!settings.jitter) return delay;
  return Math.round(delay * (0.5 + random() / 2));
}

/** Transient failures are retried; everything else is returned immediately. */
export function shouldRetry(error: ProviderError): boolean {
  return error.isTransient();
}

/**
 * Runs `attempt` up to `maxRetries + 1` times. A transient failure on the
 * last attempt becomes `retries_exhausted`; a cancelled wait becomes
 * `cancelled`.
 */
export async function withRetry<T>(
  attempt: (attemptNumber: number) => Promise<ProviderResult<T>>,
  options: RetryOptions
): Promise<ProviderResult<T>> {
  const sleep = options.sleep ?? defaultSleep;
  const maxAttempts = options.maxRetries + 1;
  let state: RetryState = 'not_started';
  const transition = (next: RetryState, attemptNumber: number): void => {
    logDebug('Retry state change', { provider: options.provider, from: state, to: next, attempt: attemptNumber });
    state = next;
  };

  for (let attemptNumber = 1; ; attemptNumber += 1) {
    if (options.signal?.aborted) {
      transition('failed', attemptNumber);
      return { ok: false, error: new ProviderError(options.provider, { kind: 'cancelled' }) };
    }
    transition('attempting', attemptNumber);
    const result = await attempt(attemptNumber);
    if (result.ok) {
      transition('succeeded', attemptNumber);
      return result;
    }

    const error = result.error;
    if (!shouldRetry(error)) {
      transition('failed', attemptNumber);
      return result;
    }
    if (attemptNumber >= maxAttempts) {
      transition('failed', attemptNumber);
      return {
        ok: false,
        error: new ProviderError(options.provider, {
          kind: 'retries_exhausted',
          attempts: attemptNumber,
          lastError: error,
        }),
      };
    }

    const delayMs = computeBackoffDelay(attemptNumber, options, options.random);
    logInfo(`Retrying ${options.provider} in ${formatDuration(delayMs)}`, {
      attempt: attemptNumber,
      maxAttempts,
      reason: error.failureReason(),
    });
    try {
      await sleep(delayMs, options.signal);
    } catch (sleepError) {
      if (options.signal?.aborted) {
        transition('failed', attemptNumber);
        return { ok: false, error: new ProviderError(options.provider, { kind: 'cancelled' }) };
      }
      throw sleepError;
    }
  }
}
