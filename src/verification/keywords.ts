import { loadKeywordLexicon } from './lexicon.js';

// CamelCase, snake_case, or any word of four letters or more.
const WORD_PATTERN = /[A-Z][a-z]+(?:[A-Z][a-z]+)*|[a-z]+(?:_[a-z]+)+|[A-Za-z]{4,}/g;
const QUOTED_PATTERN = /["'`]([^"'`]+)["'`]/g;
const TECH_NAME_PATTERN = /\b([A-Z][a-zA-Z0-9]+(?:\s+[A-Z][a-zA-Z0-9]+)?)\b/g;
const FLAG_TOKEN_PATTERN = /(^|\s)-{1,2}[A-Za-z][\w-]*/g;

/** Removes `--flag` and `-f` tokens so their words are not searched for. */
export function stripFlagTokens(text: string): string {
  return text.replace(FLAG_TOKEN_PATTERN, '$1');
}

/**
 * Searchable terms for a changelog description, lowercased and in first-seen
 * order: identifiers and long words, quoted names, then technology names.
 */
export function extractKeywords(description: string): string[] {
  const lexicon = loadKeywordLexicon();
  const text = stripFlagTokens(description);
  const keywords = new Set<string>();

  for (const match of text.matchAll(WORD_PATTERN)) {
    const word = match[0].toLowerCase();
    if (lexicon.stopWords.has(word)) continue;
    if (word.length < 4 || word.length > 30) continue;
    keywords.add(word);
  }

  for (const match of description.matchAll(QUOTED_PATTERN)) {
    const term = match[1].trim().toLowerCase();
    if (term.startsWith('-')) continue;
    if (term.length >= 3 && term.length <= 50) {
      keywords.add(term);
    }
  }

  for (const match of text.matchAll(TECH_NAME_PATTERN)) {
    const words = match[1]
      .split(/\s+/)
      .filter((word) => !lexicon.categoryWords.has(word) && !lexicon.stopWords.has(word.toLowerCase()));
    if (words.length === 0) continue;
    keywords.add(words.join(' ').toLowerCase());
  }

  return [...keywords];
}
