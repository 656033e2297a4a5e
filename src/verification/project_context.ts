import { glob } from 'glob';
import fs from 'node:fs';
import path from 'node:path';
import { logWarning } from '../telemetry/logger.js';
import { TRUNCATION_MARKER, excerptUtf8 } from '../utils/text_truncation.js';
import { EXCLUDED_DIRECTORIES } from './repository_search.js';

export const KEY_FILES = ['package.json', 'Cargo.toml', 'pyproject.toml', 'go.mod', 'README.md'] as const;
export const KEY_FILE_MAX_BYTES = 5000;
export const STRUCTURE_MAX_DEPTH = 3;
export const STRUCTURE_MAX_LINES = 50;

export interface KeyFileContent {
  path: string;
  content: string;
  truncated: boolean;
}

export interface ProjectContext {
  structure: string | null;
  keyFiles: KeyFileContent[];
}

/** Indented listing, directories marked with a trailing slash. */
export async function describeProjectStructure(repoRoot: string): Promise<string | null> {
  const paths = await glob('**/*', {
    cwd: repoRoot,
    mark: true,
    maxDepth: STRUCTURE_MAX_DEPTH,
    ignore: EXCLUDED_DIRECTORIES.flatMap((dir) => [dir, `**/${dir}`, `**/${dir}/**`]),
  });
  if (paths.length === 0) return null;

  const lines = paths
    .map((entry) => entry.split(path.sep).join('/'))
    .sort()
    .map((entry) => {
      const isDirectory = entry.endsWith('/');
      const segments = entry.replace(/\/$/, '').split('/');
      const name = segments[segments.length - 1];
      return `${'  '.repeat(segments.length - 1)}${name}${isDirectory ? '/' : ''}`;
    });
  if (lines.length <= STRUCTURE_MAX_LINES) return lines.join('\n');
  const omitted = lines.length - STRUCTURE_MAX_LINES;
  return [...lines.slice(0, STRUCTURE_MAX_LINES), `... (${omitted} more)`].join('\n');
}

export async function readKeyFiles(repoRoot: string, maxBytes: number = KEY_FILE_MAX_BYTES): Promise<KeyFileContent[]> {
  const keyFiles: KeyFileContent[] = [];
  for (const file of KEY_FILES) {
    const absolute = path.join(repoRoot, file);
    if (!fs.existsSync(absolute)) continue;
    let content: string;
    try {
      content = await fs.promises.readFile(absolute, 'utf8');
    } catch (error) {
      logWarning('Key file unreadable', { file, error: String(error) });
      continue;
    }
    const excerpt = excerptUtf8(content, maxBytes, TRUNCATION_MARKER);
    keyFiles.push({ path: file, content: excerpt, truncated: excerpt !== content });
  }
  return keyFiles;
}

/**
 * Structure listing and key manifest files, used to ground prompts in what
 * the repository actually contains.
 */
export async function gatherProjectContext(repoRoot: string): Promise<ProjectContext> {
  const root = path.resolve(repoRoot);
  try {
    const stat = await fs.promises.stat(root);
    if (!stat.isDirectory()) {
      logWarning('Project context skipped: not a directory', { root });
      return { structure: null, keyFiles: [] };
    }
  } catch (error) {
    logWarning('Project context skipped: repository root unreadable', { root, error: String(error) });
    return { structure: null, keyFiles: [] };
  }
  const [structure, keyFiles] = await Promise.all([describeProjectStructure(root), readKeyFiles(root)]);
  return { structure, keyFiles };
}

export function formatProjectContext(context: ProjectContext): string {
  const sections: string[] = [];
  if (context.structure) {
    sections.push(`Project structure:\n${context.structure}`);
  }
  for (const file of context.keyFiles) {
    sections.push(`File: ${file.path}\n${file.content}`);
  }
  return sections.join('\n\n');
}
