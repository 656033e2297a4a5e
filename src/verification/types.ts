import type { ChangelogEntry } from '../adapters/changelog_output.js';
import type { StubCategory } from './stub_classifier.js';

export type SearchStatus = 'found' | 'not_found' | 'failed';

export interface KeywordMatch {
  keyword: string;
  status: SearchStatus;
  /** At most 10 repository-relative paths. */
  filesFound: string[];
  occurrenceCount: number;
  /** At most 3 lines, each clipped at a character boundary. */
  sampleLines: string[];
  /** False when stub markers sit near any occurrence. */
  appearsComplete: boolean;
  error?: string;
}

/** Invariant: successfulSearches + failedSearches === totalKeywords. */
export interface ScanSummary {
  totalKeywords: number;
  successfulSearches: number;
  failedSearches: number;
  /** Successful searches that returned at least one match. */
  matchedKeywords: number;
}

export interface StubFinding {
  kind: StubCategory;
  file: string;
  /** 1-based. */
  line: number;
  context: string;
}

export interface CountCheck {
  claimedText: string;
  claimedCount: number;
  subject: string;
  actualCount: number | null;
  sourceLocation: string | null;
  /** True when the counts agree or the actual count is unknown. */
  matches: boolean;
  /** A repository line repeats the same count and subject. */
  supportedByText: boolean;
  /** The search behind this check failed, so the count was never looked up. */
  searchFailed: boolean;
}

export type ConfidenceLevel = 'high' | 'medium' | 'low';

export interface EntryEvidence {
  index: number;
  entry: ChangelogEntry;
  keywordMatches: KeywordMatch[];
  scanSummary: ScanSummary;
  stubFindings: StubFinding[];
  countChecks: CountCheck[];
  confidence: number;
  level: ConfidenceLevel;
  warnings: string[];
  degraded: boolean;
  /** No keyword found any match. */
  unverifiable: boolean;
}

/**
 * `empty`: nothing was verified. `all_unverifiable`: entries exist but none
 * had supporting evidence. `degraded`: some entry carries warnings.
 */
export type ReportStatus = 'ok' | 'degraded' | 'all_unverifiable' | 'empty';

export interface VerificationReport {
  entries: readonly EntryEvidence[];
  status: ReportStatus;
  degraded: boolean;
  unverifiableCount: number;
  /** Indices of entries whose level is `low`. */
  lowConfidenceEntries: readonly number[];
}
