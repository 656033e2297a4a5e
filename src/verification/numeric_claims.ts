import { loadKeywordLexicon } from './lexicon.js';

export interface NumericClaim {
  count: number;
  /** Lowercased noun as written ("templates"). */
  subject: string;
  /** The claim as it reads in the description ("8 new templates"). */
  text: string;
}

const MAX_CLAIMED_COUNT = 1000;
// A count is a whole token: "(3" qualifies, "UTF-8" and "3.5" do not.
const COUNT_TOKEN = /^[("'`[]*(\d+)$/;
const SUBJECT_WORD = /^[a-z][a-z_]*$/;
// "2 to 4 providers" states a range, not a count.
const RANGE_CONNECTORS: ReadonlySet<string> = new Set(['to', 'or', 'and']);

function trimPunctuation(token: string): string {
  return token.replace(/^[("'`[{]+/, '').replace(/[)"'`\]},.;:!?]+$/, '');
}

/**
 * Finds "N subject" claims. Numbers that belong to a flag (`--jobs 4`), sit
 * inside a hyphenated token, bound a range, or count a generic noun or a stop
 * word are not claims.
 */
export function extractNumericClaims(text: string): NumericClaim[] {
  const lexicon = loadKeywordLexicon();
  const tokens = text.split(/\s+/).filter((token) => token.length > 0);
  const claims: NumericClaim[] = [];

  for (let i = 0; i < tokens.length; i += 1) {
    const countMatch = COUNT_TOKEN.exec(tokens[i]);
    if (!countMatch) continue;
    if (i > 0 && tokens[i - 1].startsWith('-')) continue;
    const count = Number.parseInt(countMatch[1], 10);
    const following = tokens[i + 1]?.toLowerCase();
    if (following !== undefined && RANGE_CONNECTORS.has(following) && COUNT_TOKEN.test(tokens[i + 2] ?? '')) {
      i += 2;
      continue;
    }
    if (count < 1 || count > MAX_CLAIMED_COUNT) continue;

    let j = i + 1;
    const qualifiers: string[] = [];
    while (j < tokens.length && lexicon.countAdjectives.has(trimPunctuation(tokens[j]).toLowerCase())) {
      qualifiers.push(trimPunctuation(tokens[j]));
      j += 1;
    }
    if (j >= tokens.length) continue;

    const rawSubject = tokens[j];
    if (rawSubject.startsWith('-')) continue;
    const subjectWord = trimPunctuation(rawSubject);
    const subject = subjectWord.toLowerCase();
    // "3 of 5 exchanges": the stop word disqualifies 3, and 5 is read as its own claim.
    if (!SUBJECT_WORD.test(subject) || lexicon.genericNouns.has(subject) || lexicon.stopWords.has(subject)) continue;

    claims.push({ count, subject, text: [countMatch[1], ...qualifiers, subjectWord].join(' ') });
  }
  return claims;
}

export function singularize(noun: string): string {
  if (noun.endsWith('ies') && noun.length > 3) return `${noun.slice(0, -3)}y`;
  if (/(?:ches|shes|sses|xes|zes)$/.test(noun)) return noun.slice(0, -2);
  if (noun.endsWith('s') && !noun.endsWith('ss')) return noun.slice(0, -1);
  return noun;
}

export function pluralize(noun: string): string {
  if (/[^aeiou]y$/.test(noun)) return `${noun.slice(0, -1)}ies`;
  if (/(?:ch|sh|s|x|z)$/.test(noun)) return `${noun}es`;
  return `${noun}s`;
}

/** True when `text` makes the same claim: equal count, same noun. */
export function textSupportsClaim(text: string, claim: NumericClaim): boolean {
  const subject = singularize(claim.subject);
  return extractNumericClaims(text).some(
    (candidate) => candidate.count === claim.count && singularize(candidate.subject) === subject
  );
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Names an array literal for `subject` is likely declared under. */
export function arrayNamesFor(subject: string): string[] {
  const plural = pluralize(singularize(subject));
  return [...new Set([plural.toUpperCase(), plural])];
}

/**
 * Counts the top-level elements of the array literal whose `[` is at
 * `openIndex`. Strings and `//` comments are skipped; a trailing comma does
 * not add an element. Returns null when the literal is not closed.
 */
export function countArrayElements(content: string, openIndex: number): number | null {
  let depth = 0;
  let count = 0;
  let sawElement = false;
  let lastWasComma = false;
  let quote: string | null = null;
  let escaped = false;

  for (let i = openIndex; i < content.length; i += 1) {
    const ch = content[i];
    if (quote !== null) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === quote) quote = null;
      continue;
    }
    if (ch === '/' && content[i + 1] === '/') {
      const newline = content.indexOf('\n', i);
      if (newline === -1) return null;
      i = newline;
      continue;
    }
    if (ch === '"' || ch === "'" || ch === '`') {
      quote = ch;
      sawElement = true;
      lastWasComma = false;
      continue;
    }
    if (ch === '[' || ch === '{' || ch === '(') {
      depth += 1;
      if (depth > 1) {
        sawElement = true;
        lastWasComma = false;
      }
      continue;
    }
    if (ch === ']' || ch === '}' || ch === ')') {
      depth -= 1;
      if (depth === 0) {
        return sawElement && !lastWasComma ? count + 1 : count;
      }
      continue;
    }
    if (depth === 1) {
      if (ch === ',') {
        count += 1;
        lastWasComma = true;
      } else if (!/\s/.test(ch)) {
        sawElement = true;
        lastWasComma = false;
      }
    }
  }
  return null;
}

/**
 * Finds `NAME = [`, `NAME: Type[] = [` or `name: [` for any of `names` and
 * counts the literal's elements.
 */
export function findArrayCount(content: string, names: readonly string[]): { count: number; line: number } | null {
  if (names.length === 0) return null;
  const alternatives = names.map(escapeRegExp).join('|');
  const pattern = new RegExp(`\\b(?:${alternatives})\\b(?:\\s*:\\s*[\\w.<>[\\]|&, ]+?)?\\s*[=:]\\s*&?\\[`, 'g');
  for (const match of content.matchAll(pattern)) {
    const openIndex = (match.index ?? 0) + match[0].length - 1;
    const count = countArrayElements(content, openIndex);
    if (count !== null) {
      const line = content.slice(0, match.index ?? 0).split('\n').length;
      return { count, line };
    }
  }
  return null;
}
