import { logError, logWarning } from '../telemetry/logger.js';
import type { ChangelogOutput } from '../adapters/changelog_output.js';
import { AllProvidersFailedError, describeGenerationFailure, type ProviderError } from '../adapters/provider_errors.js';
import { ProviderRouter, type GenerationCompletion } from '../adapters/provider_router.js';
import type { Provider, ProviderSelection } from '../adapters/providers.js';
import { loadSettingsFromEnv, type ReleaseScribeSettings } from '../config/settings.js';
import type { RepositorySearcher } from '../verification/repository_search.js';
import type { VerificationReport } from '../verification/types.js';
import { verify } from '../verification/verify.js';

export interface ReleaseNotesRequest {
  prompt: string;
  /** Mutated in place when a fallback succeeds; reuse it for the rest of the run. */
  selection: ProviderSelection;
  repoRoot: string;
  /** Defaults to `settings.verify`. */
  verify?: boolean;
  /** Defaults to `settings.verbose`. */
  verbose?: boolean;
  signal?: AbortSignal;
  settings?: ReleaseScribeSettings;
  router?: ProviderRouter;
  searcher?: RepositorySearcher;
}

export interface ReleaseNotesResult {
  output: ChangelogOutput;
  provider: Provider;
  fallbackUsed: boolean;
  primaryError: ProviderError | null;
  /** Null when verification was disabled or there was nothing to verify. */
  report: VerificationReport | null;
  warnings: string[];
  /** Every entry was unverifiable; a simpler generation mode is the safer choice. */
  recommendFallbackMode: boolean;
}

/**
 * Generates changelog entries with provider fallback, then checks them
 * against the repository.
 */
export async function generateReleaseNotes(request: ReleaseNotesRequest): Promise<ReleaseNotesResult> {
  const settings = request.settings ?? loadSettingsFromEnv();
  const verbose = request.verbose ?? settings.verbose;
  const router = request.router ?? new ProviderRouter({ settings });

  let completion: GenerationCompletion<ChangelogOutput>;
  try {
    completion = await router.generateWithFallback(request.prompt, request.selection, { signal: request.signal });
  } catch (error) {
    if (error instanceof AllProvidersFailedError) {
      logError(describeGenerationFailure(error, { verbose }));
    }
    throw error;
  }

  const warnings = [...completion.warnings];
  const shouldVerify = (request.verify ?? settings.verify) && completion.output.entries.length > 0;
  const report = shouldVerify
    ? await verify(completion.output.entries, request.repoRoot, {
      settings,
      signal: request.signal,
      searcher: request.searcher,
    })
    : null;

  const recommendFallbackMode = report?.status === 'all_unverifiable';
  if (recommendFallbackMode) {
    const message = 'No generated entry could be verified against the repository; consider a simpler generation mode';
    warnings.push(message);
    logWarning(message, { entries: completion.output.entries.length });
  } else if (report && report.lowConfidenceEntries.length > 0) {
    warnings.push(`${report.lowConfidenceEntries.length} of ${report.entries.length} entries have low confidence`);
  }

  return {
    output: completion.output,
    provider: completion.provider,
    fallbackUsed: completion.fallbackUsed,
    primaryError: completion.primaryError ?? null,
    report,
    warnings,
    recommendFallbackMode,
  };
}
