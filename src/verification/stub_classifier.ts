import { clipLine } from '../utils/text_truncation.js';
import type { StubFinding } from './types.js';

export const STUB_CATEGORIES = [
  'todo_marker',
  'fixme_marker',
  'hack_marker',
  'xxx_marker',
  'unimplemented_macro',
  'todo_macro',
  'panic_placeholder',
  'throw_not_implemented',
  'not_implemented_error',
  'not_implemented_phrase',
  'stub_comment',
  'placeholder_comment',
  'empty_body',
  'pass_placeholder',
  'coming_soon',
  'placeholder_text',
] as const;

export type StubCategory = (typeof STUB_CATEGORIES)[number];

interface StubRule {
  kind: StubCategory;
  pattern: RegExp;
}

// Evaluated in order; the first rule that matches a line names it.
const STUB_RULES: readonly StubRule[] = [
  { kind: 'todo_marker', pattern: /\bTODO\b/ },
  { kind: 'fixme_marker', pattern: /\bFIXME\b/ },
  { kind: 'hack_marker', pattern: /\bHACK\b/ },
  { kind: 'xxx_marker', pattern: /\bXXX\b/ },
  { kind: 'unimplemented_macro', pattern: /\bunimplemented!\s*\(/ },
  { kind: 'todo_macro', pattern: /\btodo!\s*\(/ },
  { kind: 'panic_placeholder', pattern: /\bpanic!\s*\(\s*"(?:not implemented|unimplemented)/i },
  { kind: 'throw_not_implemented', pattern: /\bthrow\s+new\s+\w*Error\s*\(\s*['"`]not (?:yet )?implemented/i },
  { kind: 'not_implemented_error', pattern: /\bNotImplemented(?:Error|Exception)?\b/ },
  { kind: 'not_implemented_phrase', pattern: /\bnot (?:yet )?implemented\b/i },
  { kind: 'stub_comment', pattern: /(?:\/\/|#|\/\*)\s*stub\b/i },
  { kind: 'placeholder_comment', pattern: /(?:\/\/|#|\/\*)\s*placeholder\b/i },
  { kind: 'empty_body', pattern: /\bfn\s+\w+[^{]*\{\s*\}|\bfunction\b[^{]*\{\s*\}|=>\s*\{\s*\}/ },
  { kind: 'pass_placeholder', pattern: /^\s*pass\s*(?:#.*)?$/ },
  { kind: 'coming_soon', pattern: /\bcoming soon\b/i },
  { kind: 'placeholder_text', pattern: /\blorem ipsum\b/i },
];

const CONTEXT_MAX_CHARS = 160;

export function classifyLine(line: string): StubCategory | null {
  for (const rule of STUB_RULES) {
    if (rule.pattern.test(line)) return rule.kind;
  }
  return null;
}

/**
 * Stub markers in `text`, at most one per line. `includeLine` restricts the
 * scan to selected 1-based line numbers.
 */
export function classifyStubs(
  text: string,
  file: string,
  includeLine: (line: number) => boolean = () => true
): StubFinding[] {
  const findings: StubFinding[] = [];
  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const line = index + 1;
    if (!includeLine(line)) continue;
    const kind = classifyLine(lines[index]);
    if (kind) {
      findings.push({ kind, file, line, context: clipLine(lines[index], CONTEXT_MAX_CHARS) });
    }
  }
  return findings;
}

export function stubFindingKey(finding: Pick<StubFinding, 'file' | 'line'>): string {
  return `${finding.file}:${finding.line}`;
}

/** Keeps the first finding for each (file, line). */
export function dedupeStubFindings(findings: Iterable<StubFinding>): StubFinding[] {
  const seen = new Map<string, StubFinding>();
  for (const finding of findings) {
    const key = stubFindingKey(finding);
    if (!seen.has(key)) seen.set(key, finding);
  }
  return [...seen.values()];
}
