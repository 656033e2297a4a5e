/**
 * Release-note generation with provider fallback and evidence-based
 * verification of the generated changelog entries.
 */

export * from './adapters/index.js';
export * from './verification/index.js';
export type { ReleaseNotesRequest, ReleaseNotesResult } from './api/release_notes.js';
export { generateReleaseNotes } from './api/release_notes.js';
export type {
  PenaltySettings,
  ReleaseScribeSettings,
  RetrySettings,
  SearchEngine,
  SettingsOverrides,
  TimeoutSettings,
} from './config/settings.js';
export {
  DEFAULT_PENALTIES,
  DEFAULT_PROVIDER_TIMEOUT_MS,
  DEFAULT_RETRY_SETTINGS,
  ReleaseScribeSettingsSchema,
  defaultSettings,
  loadSettingsFromEnv,
  resolveSettings,
} from './config/settings.js';
export { logDebug, logError, logInfo, logWarning } from './telemetry/logger.js';
export { TRUNCATION_MARKER, excerptUtf8, truncateUtf8 } from './utils/text_truncation.js';
export { extractJson } from './utils/json_extract.js';
