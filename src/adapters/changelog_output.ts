import { z } from 'zod';
import { extractJson } from '../utils/json_extract.js';
import { clipLine } from '../utils/text_truncation.js';

export const CHANGELOG_CATEGORIES = ['Added', 'Changed', 'Deprecated', 'Removed', 'Fixed', 'Security'] as const;

export const ChangelogCategorySchema = z.enum(CHANGELOG_CATEGORIES);

export const ChangelogEntrySchema = z.object({
  category: ChangelogCategorySchema,
  description: z.string().trim().min(1),
}).strict();

export const ChangelogOutputSchema = z.object({
  entries: z.array(ChangelogEntrySchema),
}).strict();

export type ChangelogCategory = z.infer<typeof ChangelogCategorySchema>;
export type ChangelogEntry = z.infer<typeof ChangelogEntrySchema>;
export type ChangelogOutput = z.infer<typeof ChangelogOutputSchema>;

/** JSON Schema handed to `codex exec --output-schema`. */
export const CHANGELOG_OUTPUT_JSON_SCHEMA = {
  type: 'object',
  properties: {
    entries: {
      type: 'array',
      items: {
        type: 'object',
        properties: {
          category: { type: 'string', enum: [...CHANGELOG_CATEGORIES] },
          description: { type: 'string' },
        },
        required: ['category', 'description'],
        additionalProperties: false,
      },
    },
  },
  required: ['entries'],
  additionalProperties: false,
} as const;

export type ChangelogParseResult =
  | { ok: true; value: ChangelogOutput }
  | { ok: false; error: string };

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

export function parseChangelogOutput(text: string): ChangelogParseResult {
  const candidate = extractJson(text);
  let raw: unknown;
  try {
    raw = JSON.parse(candidate);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `${message}. Content: ${clipLine(text, 200)}` };
  }
  const parsed = ChangelogOutputSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: `schema mismatch: ${formatIssues(parsed.error)}` };
  }
  return { ok: true, value: parsed.data };
}
