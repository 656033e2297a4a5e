/**
 * Character-safe truncation helpers.
 *
 * Every function here is total: any budget (negative, fractional, NaN) yields
 * a valid string, and a cut never lands inside a multi-byte character or a
 * surrogate pair.
 */

export const TRUNCATION_MARKER = '...[truncated]';

function normalizeBudget(value: number): number {
  if (!Number.isFinite(value) || value <= 0) return 0;
  return Math.floor(value);
}

export function utf8ByteLength(codePoint: number): number {
  if (codePoint < 0x80) return 1;
  if (codePoint < 0x800) return 2;
  if (codePoint < 0x10000) return 3;
  return 4;
}

/**
 * Longest prefix of `text` whose UTF-8 encoding fits in `maxBytes`.
 */
export function truncateUtf8(text: string, maxBytes: number): string {
  const budget = normalizeBudget(maxBytes);
  if (Buffer.byteLength(text, 'utf8') <= budget) return text;

  let used = 0;
  let end = 0;
  for (const char of text) {
    const size = utf8ByteLength(char.codePointAt(0) ?? 0);
    if (used + size > budget) break;
    used += size;
    end += char.length;
  }
  return text.slice(0, end);
}

/** Keeps at most `maxChars` code points. */
export function truncateChars(text: string, maxChars: number): string {
  const budget = normalizeBudget(maxChars);
  let count = 0;
  let end = 0;
  for (const char of text) {
    if (count === budget) return text.slice(0, end);
    count += 1;
    end += char.length;
  }
  return text;
}

/**
 * Byte-budgeted excerpt with a trailing marker when anything was cut. The
 * marker is appended after the budget, matching how key-file excerpts are
 * rendered for prompts.
 */
export function excerptUtf8(text: string, maxBytes: number, marker: string = TRUNCATION_MARKER): string {
  const truncated = truncateUtf8(text, maxBytes);
  return truncated.length < text.length ? `${truncated}${marker}` : text;
}

/** Single-line clip for log lines and warnings. */
export function clipLine(text: string, maxChars: number): string {
  const compact = text.replace(/\s+/g, ' ').trim();
  const budget = normalizeBudget(maxChars);
  const clipped = truncateChars(compact, budget);
  if (clipped.length === compact.length) return compact;
  if (budget <= 3) return clipped;
  return `${truncateChars(compact, budget - 3)}...`;
}
