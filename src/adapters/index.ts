export type { Provider, ProviderSelection } from './providers.js';
export {
  PROVIDERS,
  PROVIDER_PROFILES,
  defaultSelection,
  isProvider,
  otherProvider,
  parseProvider,
  providerDisplayName,
  selectionFromPrimary,
} from './providers.js';
export type { ChangelogCategory, ChangelogEntry, ChangelogOutput, ChangelogParseResult } from './changelog_output.js';
export {
  CHANGELOG_CATEGORIES,
  CHANGELOG_OUTPUT_JSON_SCHEMA,
  ChangelogEntrySchema,
  ChangelogOutputSchema,
  parseChangelogOutput,
} from './changelog_output.js';
export type { ProviderFailure, ProviderFailureKind, ProviderResult } from './provider_errors.js';
export {
  AllProvidersFailedError,
  GenerationCancelledError,
  ProviderError,
  describeGenerationFailure,
  formatDuration,
} from './provider_errors.js';
export type { CliProviderInvokerOptions, GenerationAttempt, InvokeOptions, ProviderInvoker } from './cli_provider_invoker.js';
export { CliProviderInvoker, checkProviderInstalled, unwrapClaudeEnvelope } from './cli_provider_invoker.js';
export type { RetryOptions, RetryState, SleepFn } from './provider_retry.js';
export { computeBackoffDelay, shouldRetry, withRetry } from './provider_retry.js';
export type { GenerationCompletion, GenerationOptions, ProviderRouterOptions } from './provider_router.js';
export { ProviderRouter } from './provider_router.js';
