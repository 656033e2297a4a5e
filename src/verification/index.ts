export type {
  ConfidenceLevel,
  CountCheck,
  EntryEvidence,
  KeywordMatch,
  ReportStatus,
  ScanSummary,
  SearchStatus,
  StubFinding,
  VerificationReport,
} from './types.js';
export { SearchFailedError, VerificationCancelledError } from './errors.js';
export { extractKeywords } from './keywords.js';
export type { NumericClaim } from './numeric_claims.js';
export { countArrayElements, extractNumericClaims, findArrayCount, textSupportsClaim } from './numeric_claims.js';
export type { StubCategory } from './stub_classifier.js';
export { STUB_CATEGORIES, classifyLine, classifyStubs, dedupeStubFindings } from './stub_classifier.js';
export type { KeywordSearchResult, RepositorySearcher, SearchHit } from './repository_search.js';
export { FsRepositorySearcher, RipgrepRepositorySearcher, createRepositorySearcher } from './repository_search.js';
export type { EntryScan, ScanOptions } from './evidence_scanner.js';
export { scanEntry } from './evidence_scanner.js';
export type { ConfidenceScore, ScoreInput } from './confidence_scorer.js';
export { confidenceLevel, scoreEvidence } from './confidence_scorer.js';
export { aggregate } from './aggregator.js';
export type { KeyFileContent, ProjectContext } from './project_context.js';
export { formatProjectContext, gatherProjectContext } from './project_context.js';
export type { VerifyOptions } from './verify.js';
export { buildEntryEvidence, verify } from './verify.js';
