import { execa } from 'execa';
import { glob } from 'glob';
import fs from 'node:fs';
import path from 'node:path';
import { logDebug } from '../telemetry/logger.js';
import type { SearchEngine } from '../config/settings.js';
import { mapWithConcurrency } from '../utils/async_semaphore.js';
import { SearchFailedError } from './errors.js';

export interface SearchHit {
  file: string;
  /** 1-based. */
  line: number;
  text: string;
}

export interface KeywordSearchResult {
  /** Every matching file, sorted. */
  files: string[];
  occurrenceCount: number;
  /** Matching lines in file order, capped at `MAX_HITS_PER_SEARCH`. */
  hits: SearchHit[];
}

/**
 * Case-insensitive literal search over source files of one repository.
 * `search` throws `SearchFailedError` when the mechanism itself fails;
 * zero matches is an ordinary result.
 */
export interface RepositorySearcher {
  readonly engine: SearchEngine;
  readonly root: string;
  search(keyword: string, signal?: AbortSignal): Promise<KeywordSearchResult>;
  readFile(relativePath: string): Promise<string | null>;
}

export const SOURCE_EXTENSIONS = [
  'rs', 'ts', 'tsx', 'mts', 'cts', 'js', 'jsx', 'mjs', 'cjs', 'py', 'go', 'java',
  'kt', 'swift', 'rb', 'php', 'cs', 'scala', 'c', 'cc', 'cpp', 'h', 'hpp',
] as const;

export const EXCLUDED_DIRECTORIES = [
  'node_modules', 'dist', 'build', 'target', '.git', 'coverage', 'vendor', '__pycache__',
] as const;

export const MAX_HITS_PER_SEARCH = 500;
const MAX_SNAPSHOT_FILE_BYTES = 1024 * 1024;
const SNAPSHOT_READ_CONCURRENCY = 16;

function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

function resolveInside(root: string, relativePath: string): string | null {
  const resolved = path.resolve(root, relativePath);
  const relative = path.relative(root, resolved);
  if (relative.startsWith('..') || path.isAbsolute(relative)) return null;
  return resolved;
}

async function readRepositoryFile(root: string, relativePath: string): Promise<string | null> {
  const absolute = resolveInside(root, relativePath);
  if (!absolute) return null;
  try {
    return await fs.promises.readFile(absolute, 'utf8');
  } catch (error) {
    logDebug('Repository file unreadable', { file: relativePath, error: String(error) });
    return null;
  }
}

/**
 * In-process engine. The first search loads a snapshot of every source file;
 * all later searches, including concurrent ones, share it read-only.
 */
export class FsRepositorySearcher implements RepositorySearcher {
  readonly engine = 'fs' as const;
  readonly root: string;
  private snapshot: Promise<ReadonlyMap<string, string>> | null = null;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  private loadSnapshot(): Promise<ReadonlyMap<string, string>> {
    if (!this.snapshot) {
      this.snapshot = this.buildSnapshot();
    }
    return this.snapshot;
  }

  private async buildSnapshot(): Promise<ReadonlyMap<string, string>> {
    const stat = await fs.promises.stat(this.root);
    if (!stat.isDirectory()) {
      throw new Error(`${this.root} is not a directory`);
    }
    const files = await glob(`**/*.{${SOURCE_EXTENSIONS.join(',')}}`, {
      cwd: this.root,
      nodir: true,
      ignore: EXCLUDED_DIRECTORIES.map((dir) => `**/${dir}/**`),
    });
    files.sort();
    const entries = await mapWithConcurrency(files, SNAPSHOT_READ_CONCURRENCY, async (file) => {
      let size: number;
      try {
        size = (await fs.promises.stat(path.join(this.root, file))).size;
      } catch (error) {
        logDebug('Repository file vanished during snapshot', { file, error: String(error) });
        return null;
      }
      if (size > MAX_SNAPSHOT_FILE_BYTES) return null;
      const content = await readRepositoryFile(this.root, file);
      return content === null ? null : ([file.split(path.sep).join('/'), content] as const);
    });
    const snapshot = new Map<string, string>();
    for (const entry of entries) {
      if (entry) snapshot.set(entry[0], entry[1]);
    }
    logDebug('Repository snapshot loaded', { root: this.root, files: snapshot.size });
    return snapshot;
  }

  async search(keyword: string): Promise<KeywordSearchResult> {
    let snapshot: ReadonlyMap<string, string>;
    try {
      snapshot = await this.loadSnapshot();
    } catch (error) {
      throw new SearchFailedError(keyword, error instanceof Error ? error.message : String(error));
    }
    const needle = keyword.toLowerCase();
    const files: string[] = [];
    const hits: SearchHit[] = [];
    let occurrenceCount = 0;
    for (const [file, content] of snapshot) {
      if (!content.toLowerCase().includes(needle)) continue;
      files.push(file);
      const lines = content.split(/\r?\n/);
      for (let index = 0; index < lines.length; index += 1) {
        const occurrences = countOccurrences(lines[index].toLowerCase(), needle);
        if (occurrences === 0) continue;
        occurrenceCount += occurrences;
        if (hits.length < MAX_HITS_PER_SEARCH) {
          hits.push({ file, line: index + 1, text: lines[index] });
        }
      }
    }
    return { files, occurrenceCount, hits };
  }

  async readFile(relativePath: string): Promise<string | null> {
    try {
      const cached = (await this.loadSnapshot()).get(relativePath);
      if (cached !== undefined) return cached;
    } catch (error) {
      logDebug('Repository snapshot unavailable, reading from disk', { file: relativePath, error: String(error) });
    }
    return readRepositoryFile(this.root, relativePath);
  }
}

const RG_LINE = /^(.+?):(\d+):(.*)$/;

/** `rg` subprocess engine. Exit code 1 means no matches. */
export class RipgrepRepositorySearcher implements RepositorySearcher {
  readonly engine = 'ripgrep' as const;
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  static buildArgs(keyword: string): string[] {
    const args = [
      '--ignore-case',
      '--fixed-strings',
      '--line-number',
      '--no-heading',
      '--sort', 'path',
      '--color', 'never',
      '--type-add', `code:*.{${SOURCE_EXTENSIONS.join(',')}}`,
      '--type', 'code',
    ];
    for (const dir of EXCLUDED_DIRECTORIES) {
      args.push('-g', `!${dir}`);
    }
    args.push('-e', keyword, '.');
    return args;
  }

  async search(keyword: string, signal?: AbortSignal): Promise<KeywordSearchResult> {
    const result = await execa('rg', RipgrepRepositorySearcher.buildArgs(keyword), {
      cwd: this.root,
      cancelSignal: signal,
      reject: false,
    });
    if (result.exitCode === 1) {
      return { files: [], occurrenceCount: 0, hits: [] };
    }
    if (result.exitCode !== 0) {
      const reason = String(result.stderr ?? '').trim()
        || (typeof result.exitCode === 'number' ? `rg exited with code ${result.exitCode}` : 'rg could not be started');
      throw new SearchFailedError(keyword, reason);
    }

    const needle = keyword.toLowerCase();
    const files = new Set<string>();
    const hits: SearchHit[] = [];
    let occurrenceCount = 0;
    for (const line of String(result.stdout ?? '').split('\n')) {
      const match = RG_LINE.exec(line);
      if (!match) continue;
      const file = match[1].replace(/^\.\//, '');
      const text = match[3];
      files.add(file);
      occurrenceCount += Math.max(1, countOccurrences(text.toLowerCase(), needle));
      if (hits.length < MAX_HITS_PER_SEARCH) {
        hits.push({ file, line: Number.parseInt(match[2], 10), text });
      }
    }
    return { files: [...files].sort(), occurrenceCount, hits };
  }

  readFile(relativePath: string): Promise<string | null> {
    return readRepositoryFile(this.root, relativePath);
  }
}

export function createRepositorySearcher(root: string, engine: SearchEngine): RepositorySearcher {
  return engine === 'ripgrep' ? new RipgrepRepositorySearcher(root) : new FsRepositorySearcher(root);
}
