import { logInfo, logWarning } from '../telemetry/logger.js';
import { defaultSettings, type ReleaseScribeSettings } from '../config/settings.js';
import type { ChangelogOutput } from './changelog_output.js';
import { CliProviderInvoker, type GenerationAttempt, type InvokeOptions, type ProviderInvoker } from './cli_provider_invoker.js';
import {
  AllProvidersFailedError,
  GenerationCancelledError,
  ProviderError,
  type ProviderResult,
} from './provider_errors.js';
import { withRetry, type SleepFn } from './provider_retry.js';
import { providerDisplayName, type Provider, type ProviderSelection } from './providers.js';

export interface GenerationOptions {
  signal?: AbortSignal;
  modelId?: string;
}

export interface GenerationCompletion<T> {
  output: T;
  provider: Provider;
  /** Set when the primary failed and the fallback produced `output`. */
  primaryError?: ProviderError;
  fallbackUsed: boolean;
  warnings: string[];
  attempts: GenerationAttempt[];
}

export interface ProviderRouterOptions {
  invoker?: ProviderInvoker;
  settings?: ReleaseScribeSettings;
  sleep?: SleepFn;
}

type InvokeFn<T> = (provider: Provider, options: InvokeOptions) => Promise<ProviderResult<T>>;

/**
 * Primary-then-fallback generation. The router keeps no selection of its
 * own: callers pass the run's `ProviderSelection` and the router swaps it in
 * place when the fallback succeeds, so later calls start with the provider
 * that last worked.
 */
export class ProviderRouter {
  private readonly invoker: ProviderInvoker;
  private readonly settings: ReleaseScribeSettings;
  private readonly sleep?: SleepFn;

  constructor(options: ProviderRouterOptions = {}) {
    this.settings = options.settings ?? defaultSettings();
    this.invoker = options.invoker ?? new CliProviderInvoker({ timeouts: this.settings.timeouts });
    this.sleep = options.sleep;
  }

  generateWithFallback(
    prompt: string,
    selection: ProviderSelection,
    options: GenerationOptions = {}
  ): Promise<GenerationCompletion<ChangelogOutput>> {
    return this.route(selection, options, (provider, invokeOptions) =>
      this.invoker.invoke(provider, prompt, invokeOptions));
  }

  generateRawWithFallback(
    prompt: string,
    selection: ProviderSelection,
    options: GenerationOptions = {}
  ): Promise<GenerationCompletion<string>> {
    return this.route(selection, options, (provider, invokeOptions) =>
      this.invoker.invokeRaw(provider, prompt, invokeOptions));
  }

  private attemptWithRetry<T>(
    provider: Provider,
    invoke: InvokeFn<T>,
    options: GenerationOptions,
    attempts: GenerationAttempt[]
  ): Promise<ProviderResult<T>> {
    return withRetry(
      () => invoke(provider, {
        timeoutMs: this.settings.timeouts[provider],
        signal: options.signal,
        modelId: options.modelId,
        onAttempt: (attempt) => attempts.push(attempt),
      }),
      {
        ...this.settings.retry,
        provider,
        signal: options.signal,
        sleep: this.sleep,
      }
    );
  }

  private async route<T>(
    selection: ProviderSelection,
    options: GenerationOptions,
    invoke: InvokeFn<T>
  ): Promise<GenerationCompletion<T>> {
    if (options.signal?.aborted) {
      throw new GenerationCancelledError(null);
    }
    const attempts: GenerationAttempt[] = [];
    const { primary, fallback } = selection;

    const primaryResult = await this.attemptWithRetry(primary, invoke, options, attempts);
    if (primaryResult.ok) {
      return { output: primaryResult.value, provider: primary, fallbackUsed: false, warnings: [], attempts };
    }
    const primaryError = primaryResult.error;
    if (primaryError.kind === 'cancelled' || options.signal?.aborted) {
      throw new GenerationCancelledError(primary);
    }

    logInfo(`Primary provider ${primary} failed, trying ${fallback}`, { reason: primaryError.failureReason() });
    const fallbackResult = await this.attemptWithRetry(fallback, invoke, options, attempts);
    if (fallbackResult.ok) {
      selection.primary = fallback;
      selection.fallback = primary;
      const warning = `${providerDisplayName(primary)} failed (${primaryError.summary()}); `
        + `used ${providerDisplayName(fallback)} instead. ${providerDisplayName(fallback)} is now the primary provider for this run.`;
      logWarning('Provider fallback used', { failed: primary, used: fallback, reason: primaryError.summary() });
      return {
        output: fallbackResult.value,
        provider: fallback,
        primaryError,
        fallbackUsed: true,
        warnings: [warning],
        attempts,
      };
    }
    const fallbackError = fallbackResult.error;
    if (fallbackError.kind === 'cancelled' || options.signal?.aborted) {
      throw new GenerationCancelledError(fallback);
    }

    throw new AllProvidersFailedError({ primary, primaryError, fallback, fallbackError });
  }
}
