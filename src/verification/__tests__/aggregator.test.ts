import { describe, expect, it } from 'vitest';
import type { ChangelogEntry } from '../../adapters/changelog_output.js';
import { aggregate } from '../aggregator.js';
import type { ConfidenceLevel, EntryEvidence } from '../types.js';

const ENTRIES: ChangelogEntry[] = [
  { category: 'Added', description: 'Added CSV exporter' },
  { category: 'Fixed', description: 'Fixed tag ordering' },
  { category: 'Changed', description: 'Changed default template' },
];

function evidence(
  index: number,
  options: { level?: ConfidenceLevel; warnings?: string[]; unverifiable?: boolean } = {}
): EntryEvidence {
  const warnings = options.warnings ?? [];
  return {
    index,
    entry: ENTRIES[index],
    keywordMatches: [],
    scanSummary: { totalKeywords: 1, successfulSearches: 1, failedSearches: 0, matchedKeywords: 1 },
    stubFindings: [],
    countChecks: [],
    confidence: 100,
    level: options.level ?? 'high',
    warnings,
    degraded: warnings.length > 0,
    unverifiable: options.unverifiable ?? false,
  };
}

describe('aggregate', () => {
  it('orders evidence by entry index regardless of arrival order', () => {
    const inOrder = aggregate(ENTRIES, [evidence(0), evidence(1), evidence(2, { level: 'low' })]);
    const shuffled = aggregate(ENTRIES, [evidence(2, { level: 'low' }), evidence(0), evidence(1)]);

    expect(shuffled).toEqual(inOrder);
    expect(shuffled.entries.map((item) => item.index)).toEqual([0, 1, 2]);
    expect(shuffled.lowConfidenceEntries).toEqual([2]);
  });

  it('reports ok when no entry carries warnings', () => {
    const report = aggregate(ENTRIES, [evidence(0), evidence(1), evidence(2)]);

    expect(report.status).toBe('ok');
    expect(report.degraded).toBe(false);
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.entries)).toBe(true);
  });

  it('reports degraded when any entry carries warnings', () => {
    const report = aggregate(ENTRIES, [evidence(0), evidence(1, { warnings: ['1 keyword had no matches in the repository'] }), evidence(2)]);

    expect(report.status).toBe('degraded');
    expect(report.degraded).toBe(true);
  });

  it('distinguishes all-unverifiable from empty', () => {
    const unverifiable = { unverifiable: true, warnings: ['No supporting evidence found in the repository'] };
    const report = aggregate(ENTRIES, [evidence(0, unverifiable), evidence(1, unverifiable), evidence(2, unverifiable)]);

    expect(report.status).toBe('all_unverifiable');
    expect(report.unverifiableCount).toBe(3);
    expect(aggregate([], []).status).toBe('empty');
  });

  it('rejects evidence that does not cover every entry', () => {
    expect(() => aggregate(ENTRIES, [evidence(0), evidence(1)])).toThrow('expected evidence for 3 entries, got 2');
    expect(() => aggregate(ENTRIES, [evidence(0), evidence(1), evidence(1)])).toThrow('missing evidence for entry 2');
  });
});
