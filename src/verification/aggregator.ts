import type { ChangelogEntry } from '../adapters/changelog_output.js';
import type { EntryEvidence, ReportStatus, VerificationReport } from './types.js';

function reportStatus(entries: readonly EntryEvidence[], unverifiableCount: number, degraded: boolean): ReportStatus {
  if (entries.length === 0) return 'empty';
  if (unverifiableCount === entries.length) return 'all_unverifiable';
  return degraded ? 'degraded' : 'ok';
}

/**
 * Folds per-entry evidence into a frozen report. Evidence may arrive in any
 * order; it is placed by `index`, so the report does not depend on which scan
 * finished first.
 */
export function aggregate(
  entries: readonly ChangelogEntry[],
  evidence: readonly EntryEvidence[]
): VerificationReport {
  if (evidence.length !== entries.length) {
    throw new RangeError(`expected evidence for ${entries.length} entries, got ${evidence.length}`);
  }
  const byIndex = new Map(evidence.map((item) => [item.index, item]));
  const ordered = entries.map((_entry, index) => {
    const item = byIndex.get(index);
    if (!item) {
      throw new RangeError(`missing evidence for entry ${index}`);
    }
    return Object.freeze({ ...item });
  });

  const degraded = ordered.some((item) => item.warnings.length > 0);
  const unverifiableCount = ordered.filter((item) => item.unverifiable).length;
  return Object.freeze({
    entries: Object.freeze(ordered),
    status: reportStatus(ordered, unverifiableCount, degraded),
    degraded,
    unverifiableCount,
    lowConfidenceEntries: Object.freeze(ordered.filter((item) => item.level === 'low').map((item) => item.index)),
  });
}
