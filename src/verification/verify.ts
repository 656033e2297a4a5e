import { logInfo } from '../telemetry/logger.js';
import type { ChangelogEntry } from '../adapters/changelog_output.js';
import { defaultSettings, type ReleaseScribeSettings } from '../config/settings.js';
import { mapWithConcurrency } from '../utils/async_semaphore.js';
import { aggregate } from './aggregator.js';
import { scoreEvidence } from './confidence_scorer.js';
import { throwIfCancelled } from './errors.js';
import { scanEntry } from './evidence_scanner.js';
import { createRepositorySearcher, type RepositorySearcher } from './repository_search.js';
import type { EntryEvidence, VerificationReport } from './types.js';

export interface VerifyOptions {
  settings?: ReleaseScribeSettings;
  /** Run deadline; aborting discards every partial result. */
  signal?: AbortSignal;
  /** Overrides the engine chosen by `settings.searchEngine`. */
  searcher?: RepositorySearcher;
}

export async function buildEntryEvidence(
  entry: ChangelogEntry,
  index: number,
  searcher: RepositorySearcher,
  settings: ReleaseScribeSettings,
  signal?: AbortSignal
): Promise<EntryEvidence> {
  const scan = await scanEntry(entry, searcher, { signal });
  const score = scoreEvidence(
    {
      description: entry.description,
      scanSummary: scan.scanSummary,
      stubFindings: scan.stubFindings,
      countChecks: scan.countChecks,
    },
    settings.penalties
  );
  const warnings = [...scan.warnings, ...score.warnings];
  return {
    index,
    entry,
    keywordMatches: scan.keywordMatches,
    scanSummary: scan.scanSummary,
    stubFindings: scan.stubFindings,
    countChecks: scan.countChecks,
    confidence: score.confidence,
    level: score.level,
    warnings,
    degraded: warnings.length > 0,
    unverifiable: score.unverifiable,
  };
}

/**
 * Scores every entry against the repository at `repoRoot`. Entries are
 * scanned in parallel, bounded by `settings.scanConcurrency`, and folded into
 * one report. Throws `VerificationCancelledError` if `signal` aborts.
 */
export async function verify(
  entries: readonly ChangelogEntry[],
  repoRoot: string,
  options: VerifyOptions = {}
): Promise<VerificationReport> {
  const settings = options.settings ?? defaultSettings();
  const { signal } = options;
  throwIfCancelled(signal);
  if (entries.length === 0) {
    return aggregate([], []);
  }

  const searcher = options.searcher ?? createRepositorySearcher(repoRoot, settings.searchEngine);
  const started = Date.now();
  const evidence = await mapWithConcurrency(entries, settings.scanConcurrency, async (entry, index) => {
    throwIfCancelled(signal);
    return buildEntryEvidence(entry, index, searcher, settings, signal);
  });
  throwIfCancelled(signal);

  const report = aggregate(entries, evidence);
  logInfo('Verification complete', {
    entries: entries.length,
    status: report.status,
    lowConfidence: report.lowConfidenceEntries.length,
    engine: searcher.engine,
    durationMs: Date.now() - started,
  });
  return report;
}
