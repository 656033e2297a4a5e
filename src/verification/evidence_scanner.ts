import type { ChangelogEntry } from '../adapters/changelog_output.js';
import { clipLine, excerptUtf8 } from '../utils/text_truncation.js';
import { SearchFailedError, VerificationCancelledError, throwIfCancelled } from './errors.js';
import { extractKeywords } from './keywords.js';
import {
  arrayNamesFor,
  extractNumericClaims,
  findArrayCount,
  pluralize,
  singularize,
  textSupportsClaim,
  type NumericClaim,
} from './numeric_claims.js';
import type { KeywordSearchResult, RepositorySearcher } from './repository_search.js';
import { classifyStubs, dedupeStubFindings } from './stub_classifier.js';
import type { CountCheck, KeywordMatch, ScanSummary, StubFinding } from './types.js';

export const MAX_FILES_PER_KEYWORD = 10;
export const MAX_SAMPLE_LINES = 3;
export const SAMPLE_LINE_MAX_BYTES = 200;
export const STUB_FILES_PER_KEYWORD = 5;
export const STUB_WINDOW_LINES = 10;
const COUNT_CHECK_MAX_FILES = 20;

export interface EntryScan {
  keywords: string[];
  keywordMatches: KeywordMatch[];
  scanSummary: ScanSummary;
  /** Deduplicated by (file, line) across all keywords. */
  stubFindings: StubFinding[];
  countChecks: CountCheck[];
  /** One line per failed search, count-check searches included. */
  warnings: string[];
}

export interface ScanOptions {
  signal?: AbortSignal;
}

async function searchOrFail(
  searcher: RepositorySearcher,
  keyword: string,
  signal: AbortSignal | undefined
): Promise<KeywordSearchResult | SearchFailedError> {
  try {
    return await searcher.search(keyword, signal);
  } catch (error) {
    if (signal?.aborted) throw new VerificationCancelledError();
    if (error instanceof SearchFailedError) return error;
    throw error;
  }
}

async function findStubsNearHits(result: KeywordSearchResult, searcher: RepositorySearcher): Promise<StubFinding[]> {
  const findings: StubFinding[] = [];
  for (const file of result.files.slice(0, STUB_FILES_PER_KEYWORD)) {
    const hitLines = result.hits.filter((hit) => hit.file === file).map((hit) => hit.line);
    if (hitLines.length === 0) continue;
    const content = await searcher.readFile(file);
    if (content === null) continue;
    const nearHit = (line: number): boolean => hitLines.some((hit) => Math.abs(hit - line) <= STUB_WINDOW_LINES);
    findings.push(...classifyStubs(content, file, nearHit));
  }
  return findings;
}

function sampleLines(result: KeywordSearchResult): string[] {
  return result.hits
    .slice(0, MAX_SAMPLE_LINES)
    .map((hit) => `${hit.file}:${hit.line}: ${excerptUtf8(hit.text.trim(), SAMPLE_LINE_MAX_BYTES)}`);
}

async function checkClaim(
  claim: NumericClaim,
  searcher: RepositorySearcher,
  signal: AbortSignal | undefined
): Promise<CountCheck & { error?: string }> {
  const unknown: CountCheck = {
    claimedText: claim.text,
    claimedCount: claim.count,
    subject: claim.subject,
    actualCount: null,
    sourceLocation: null,
    matches: true,
    supportedByText: false,
    searchFailed: false,
  };
  const result = await searchOrFail(searcher, pluralize(singularize(claim.subject)), signal);
  if (result instanceof SearchFailedError) {
    return { ...unknown, searchFailed: true, error: result.message };
  }

  const names = arrayNamesFor(claim.subject);
  for (const file of result.files.slice(0, COUNT_CHECK_MAX_FILES)) {
    const content = await searcher.readFile(file);
    if (content === null) continue;
    const found = findArrayCount(content, names);
    if (found) {
      return {
        ...unknown,
        actualCount: found.count,
        sourceLocation: `${file}:${found.line}`,
        matches: found.count === claim.count,
        supportedByText: result.hits.some((hit) => textSupportsClaim(hit.text, claim)),
      };
    }
  }
  return { ...unknown, supportedByText: result.hits.some((hit) => textSupportsClaim(hit.text, claim)) };
}

/**
 * Searches the repository for every keyword of one entry, collects stub
 * markers near the matches and checks numeric claims. Search failures are
 * counted, never thrown; only cancellation escapes.
 */
export async function scanEntry(
  entry: ChangelogEntry,
  searcher: RepositorySearcher,
  options: ScanOptions = {}
): Promise<EntryScan> {
  const { signal } = options;
  const keywords = extractKeywords(entry.description);
  const keywordMatches: KeywordMatch[] = [];
  const stubFindings: StubFinding[] = [];
  const warnings: string[] = [];
  let successfulSearches = 0;
  let failedSearches = 0;
  let matchedKeywords = 0;

  for (const keyword of keywords) {
    throwIfCancelled(signal);
    const result = await searchOrFail(searcher, keyword, signal);
    if (result instanceof SearchFailedError) {
      failedSearches += 1;
      warnings.push(clipLine(result.message, 240));
      keywordMatches.push({
        keyword,
        status: 'failed',
        filesFound: [],
        occurrenceCount: 0,
        sampleLines: [],
        appearsComplete: true,
        error: result.message,
      });
      continue;
    }
    successfulSearches += 1;
    if (result.files.length === 0) {
      keywordMatches.push({
        keyword,
        status: 'not_found',
        filesFound: [],
        occurrenceCount: 0,
        sampleLines: [],
        appearsComplete: true,
      });
      continue;
    }
    matchedKeywords += 1;
    const stubs = await findStubsNearHits(result, searcher);
    stubFindings.push(...stubs);
    keywordMatches.push({
      keyword,
      status: 'found',
      filesFound: result.files.slice(0, MAX_FILES_PER_KEYWORD),
      occurrenceCount: result.occurrenceCount,
      sampleLines: sampleLines(result),
      appearsComplete: stubs.length === 0,
    });
  }

  const countChecks: CountCheck[] = [];
  for (const claim of extractNumericClaims(entry.description)) {
    throwIfCancelled(signal);
    const { error, ...check } = await checkClaim(claim, searcher, signal);
    if (error) warnings.push(clipLine(error, 240));
    countChecks.push(check);
  }

  return {
    keywords,
    keywordMatches,
    scanSummary: {
      totalKeywords: keywords.length,
      successfulSearches,
      failedSearches,
      matchedKeywords,
    },
    stubFindings: dedupeStubFindings(stubFindings),
    countChecks,
    warnings,
  };
}
