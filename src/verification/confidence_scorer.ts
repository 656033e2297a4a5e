import { DEFAULT_PENALTIES, type PenaltySettings } from '../config/settings.js';
import type { ConfidenceLevel, CountCheck, ScanSummary, StubFinding } from './types.js';

export const MAX_CONFIDENCE = 100;

const COMPLETION_CLAIM = /\b(?:implement(?:s|ed)?|complete[sd]?|completely|fully|full|finish(?:es|ed)?|done|working|ready)\b/i;

export interface ScoreInput {
  description: string;
  scanSummary: ScanSummary;
  stubFindings: readonly StubFinding[];
  countChecks?: readonly CountCheck[];
}

export interface ConfidenceScore {
  confidence: number;
  level: ConfidenceLevel;
  /** One line per penalty source; empty iff nothing was deducted. */
  warnings: string[];
  unverifiable: boolean;
}

export function confidenceLevel(confidence: number): ConfidenceLevel {
  if (confidence >= 70) return 'high';
  if (confidence >= 40) return 'medium';
  return 'low';
}

function plural(count: number, singular: string, pluralForm = `${singular}s`): string {
  return count === 1 ? singular : pluralForm;
}

export function claimsCompletion(description: string): boolean {
  return COMPLETION_CLAIM.test(description);
}

/**
 * Starts at 100 and subtracts one positive penalty per source, clamped to
 * [0, 100]. Adding a source can only lower the result.
 */
export function scoreEvidence(input: ScoreInput, penalties: PenaltySettings = DEFAULT_PENALTIES): ConfidenceScore {
  const { scanSummary, stubFindings } = input;
  const warnings: string[] = [];
  let deducted = 0;
  const penalize = (amount: number, warning: string): void => {
    deducted += amount;
    warnings.push(warning);
  };

  if (scanSummary.failedSearches > 0) {
    const n = scanSummary.failedSearches;
    penalize(n * penalties.failedSearch, `${n} keyword ${plural(n, 'search', 'searches')} failed; evidence is incomplete`);
  }

  const zeroResult = Math.max(0, scanSummary.successfulSearches - scanSummary.matchedKeywords);
  if (zeroResult > 0) {
    penalize(zeroResult * penalties.zeroResultSearch, `${zeroResult} ${plural(zeroResult, 'keyword')} had no matches in the repository`);
  }

  const unverifiable = scanSummary.matchedKeywords === 0;
  if (unverifiable) {
    penalize(penalties.unverifiableClaim, 'No supporting evidence found in the repository');
  }

  for (const finding of stubFindings) {
    penalize(penalties.stubFinding, `Stub marker (${finding.kind}) at ${finding.file}:${finding.line}`);
  }

  if (stubFindings.length > 0 && claimsCompletion(input.description)) {
    const n = stubFindings.length;
    penalize(
      penalties.completionContradicted,
      `Entry claims completed work but ${n} stub ${plural(n, 'marker')} ${n === 1 ? 'was' : 'were'} found`
    );
  }

  for (const check of input.countChecks ?? []) {
    if (check.searchFailed) {
      penalize(penalties.failedSearch, `Count check for "${check.claimedText}" could not search the repository; evidence is incomplete`);
      continue;
    }
    if (check.matches) continue;
    const found = `found ${check.actualCount ?? 'an unknown number'} in ${check.sourceLocation ?? 'the repository'}`;
    // The mismatch stands even when a line repeats the claim; the note points at it.
    const stale = check.supportedByText ? '; a repository line repeats the claimed count' : '';
    penalize(penalties.countMismatch, `Claimed "${check.claimedText}" but ${found}${stale}`);
  }

  const confidence = Math.min(MAX_CONFIDENCE, Math.max(0, MAX_CONFIDENCE - deducted));
  return { confidence, level: confidenceLevel(confidence), warnings, unverifiable };
}
