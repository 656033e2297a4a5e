import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const KeywordLexiconFileSchema = z.object({
  stopWords: z.array(z.string()),
  categoryWords: z.array(z.string()),
  genericNouns: z.array(z.string()),
  countAdjectives: z.array(z.string()),
});

export interface KeywordLexicon {
  stopWords: ReadonlySet<string>;
  /** Capitalised words that name a changelog section rather than a technology. */
  categoryWords: ReadonlySet<string>;
  /** Nouns that never name a countable feature ("8 bytes", "3 retries"). */
  genericNouns: ReadonlySet<string>;
  /** Words allowed between a count and its subject ("3 new templates"). */
  countAdjectives: ReadonlySet<string>;
}

let cached: KeywordLexicon | null = null;

export function loadKeywordLexicon(): KeywordLexicon {
  if (cached) return cached;
  const moduleDir = path.dirname(fileURLToPath(import.meta.url));
  const dataPath = path.resolve(moduleDir, '../../data/keyword_lexicon.json');
  const raw: unknown = JSON.parse(fs.readFileSync(dataPath, 'utf8'));
  const parsed = KeywordLexiconFileSchema.parse(raw);
  cached = {
    stopWords: new Set(parsed.stopWords.map((word) => word.toLowerCase())),
    categoryWords: new Set(parsed.categoryWords),
    genericNouns: new Set(parsed.genericNouns.map((word) => word.toLowerCase())),
    countAdjectives: new Set(parsed.countAdjectives.map((word) => word.toLowerCase())),
  };
  return cached;
}
