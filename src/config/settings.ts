import { z } from 'zod';
import { logWarning } from '../telemetry/logger.js';
import { defaultParallelism } from '../utils/async_semaphore.js';
import { isTruthyFlag, isVerboseModeEnabled, isVerificationEnabled } from '../utils/runtime_controls.js';

const positiveInt = z.number().int().positive();

export const TimeoutSettingsSchema = z.object({
  claude: positiveInt,
  codex: positiveInt,
}).strict();

export const RetrySettingsSchema = z.object({
  maxRetries: z.number().int().min(0).max(10),
  baseDelayMs: positiveInt,
  maxDelayMs: positiveInt,
  jitter: z.boolean(),
}).strict().refine((value) => value.maxDelayMs >= value.baseDelayMs, {
  message: 'maxDelayMs must be >= baseDelayMs',
  path: ['maxDelayMs'],
});

/**
 * Confidence penalties. Every value is a positive integer so that any applied
 * penalty lowers the score and comes with a warning.
 */
export const PenaltySettingsSchema = z.object({
  failedSearch: positiveInt,
  zeroResultSearch: positiveInt,
  unverifiableClaim: positiveInt,
  stubFinding: positiveInt,
  completionContradicted: positiveInt,
  countMismatch: positiveInt,
}).strict();

export const SearchEngineSchema = z.enum(['fs', 'ripgrep']);

export const ReleaseScribeSettingsSchema = z.object({
  timeouts: TimeoutSettingsSchema,
  retry: RetrySettingsSchema,
  penalties: PenaltySettingsSchema,
  scanConcurrency: positiveInt,
  searchEngine: SearchEngineSchema,
  verify: z.boolean(),
  verbose: z.boolean(),
}).strict();

export type TimeoutSettings = z.infer<typeof TimeoutSettingsSchema>;
export type RetrySettings = z.infer<typeof RetrySettingsSchema>;
export type PenaltySettings = z.infer<typeof PenaltySettingsSchema>;
export type SearchEngine = z.infer<typeof SearchEngineSchema>;
export type ReleaseScribeSettings = z.infer<typeof ReleaseScribeSettingsSchema>;

export const DEFAULT_PROVIDER_TIMEOUT_MS = 300_000;

export const DEFAULT_RETRY_SETTINGS: RetrySettings = {
  maxRetries: 2,
  baseDelayMs: 1_000,
  maxDelayMs: 30_000,
  jitter: false,
};

export const DEFAULT_PENALTIES: PenaltySettings = {
  failedSearch: 10,
  zeroResultSearch: 5,
  unverifiableClaim: 30,
  stubFinding: 15,
  completionContradicted: 20,
  countMismatch: 20,
};

export function defaultSettings(): ReleaseScribeSettings {
  return {
    timeouts: { claude: DEFAULT_PROVIDER_TIMEOUT_MS, codex: DEFAULT_PROVIDER_TIMEOUT_MS },
    retry: { ...DEFAULT_RETRY_SETTINGS },
    penalties: { ...DEFAULT_PENALTIES },
    scanConcurrency: defaultParallelism(),
    searchEngine: 'fs',
    verify: true,
    verbose: false,
  };
}

export interface SettingsOverrides {
  timeouts?: Partial<TimeoutSettings>;
  retry?: Partial<RetrySettings>;
  penalties?: Partial<PenaltySettings>;
  scanConcurrency?: number;
  searchEngine?: SearchEngine;
  verify?: boolean;
  verbose?: boolean;
}

/** Merges overrides onto `base` and validates the result. */
export function resolveSettings(
  overrides: SettingsOverrides = {},
  base: ReleaseScribeSettings = defaultSettings()
): ReleaseScribeSettings {
  return ReleaseScribeSettingsSchema.parse({
    timeouts: { ...base.timeouts, ...overrides.timeouts },
    retry: { ...base.retry, ...overrides.retry },
    penalties: { ...base.penalties, ...overrides.penalties },
    scanConcurrency: overrides.scanConcurrency ?? base.scanConcurrency,
    searchEngine: overrides.searchEngine ?? base.searchEngine,
    verify: overrides.verify ?? base.verify,
    verbose: overrides.verbose ?? base.verbose,
  });
}

function readInteger(
  env: NodeJS.ProcessEnv,
  name: string,
  options: { min: number; max?: number }
): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;
  const trimmed = raw.trim();
  const parsed = /^\d+$/.test(trimmed) ? Number.parseInt(trimmed, 10) : Number.NaN;
  if (!Number.isSafeInteger(parsed) || parsed < options.min || parsed > (options.max ?? Number.MAX_SAFE_INTEGER)) {
    logWarning(`Invalid ${name} value, using default`, { value: raw });
    return undefined;
  }
  return parsed;
}

const PENALTY_ENV = [
  ['failedSearch', 'RELEASE_SCRIBE_PENALTY_FAILED_SEARCH'],
  ['zeroResultSearch', 'RELEASE_SCRIBE_PENALTY_ZERO_RESULT_SEARCH'],
  ['unverifiableClaim', 'RELEASE_SCRIBE_PENALTY_UNVERIFIABLE_CLAIM'],
  ['stubFinding', 'RELEASE_SCRIBE_PENALTY_STUB_FINDING'],
  ['completionContradicted', 'RELEASE_SCRIBE_PENALTY_COMPLETION_CONTRADICTED'],
  ['countMismatch', 'RELEASE_SCRIBE_PENALTY_COUNT_MISMATCH'],
] as const satisfies ReadonlyArray<readonly [keyof PenaltySettings, string]>;

/**
 * Reads settings from the environment. Malformed values are logged and
 * replaced by their defaults rather than failing the run.
 */
export function loadSettingsFromEnv(env: NodeJS.ProcessEnv = process.env): ReleaseScribeSettings {
  const base = defaultSettings();
  const penalties: Partial<PenaltySettings> = {};
  for (const [key, name] of PENALTY_ENV) {
    const value = readInteger(env, name, { min: 1 });
    if (value !== undefined) penalties[key] = value;
  }

  const rawEngine = env.RELEASE_SCRIBE_SEARCH_ENGINE?.trim().toLowerCase();
  const engine = rawEngine ? SearchEngineSchema.safeParse(rawEngine) : undefined;
  if (engine && !engine.success) {
    logWarning('Invalid RELEASE_SCRIBE_SEARCH_ENGINE value, using default', { value: rawEngine });
  }

  const baseDelayMs = readInteger(env, 'RELEASE_SCRIBE_RETRY_BASE_DELAY_MS', { min: 1 }) ?? base.retry.baseDelayMs;
  const maxDelayMs = readInteger(env, 'RELEASE_SCRIBE_RETRY_MAX_DELAY_MS', { min: 1 }) ?? base.retry.maxDelayMs;

  return resolveSettings({
    timeouts: {
      claude: readInteger(env, 'RELEASE_SCRIBE_CLAUDE_TIMEOUT_MS', { min: 1 }) ?? base.timeouts.claude,
      codex: readInteger(env, 'RELEASE_SCRIBE_CODEX_TIMEOUT_MS', { min: 1 }) ?? base.timeouts.codex,
    },
    retry: {
      maxRetries: readInteger(env, 'RELEASE_SCRIBE_MAX_RETRIES', { min: 0, max: 10 }) ?? base.retry.maxRetries,
      baseDelayMs,
      maxDelayMs: Math.max(maxDelayMs, baseDelayMs),
      jitter: isTruthyFlag(env.RELEASE_SCRIBE_RETRY_JITTER),
    },
    penalties,
    scanConcurrency: readInteger(env, 'RELEASE_SCRIBE_SCAN_CONCURRENCY', { min: 1 }) ?? base.scanConcurrency,
    searchEngine: engine?.success ? engine.data : base.searchEngine,
    verify: isVerificationEnabled(env),
    verbose: isVerboseModeEnabled(env),
  }, base);
}
