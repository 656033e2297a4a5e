import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  describeProjectStructure,
  formatProjectContext,
  gatherProjectContext,
  readKeyFiles,
} from '../project_context.js';

describe('project context', () => {
  let root: string;

  const write = (relativePath: string, content: string): void => {
    const absolute = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(absolute), { recursive: true });
    fs.writeFileSync(absolute, content);
  };

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'release-scribe-context-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('lists the tree with directories marked and dependencies left out', async () => {
    write('src/index.ts', 'export {};\n');
    write('README.md', 'Hello\n');
    write('package.json', '{}\n');
    write('node_modules/lib/index.js', '');

    await expect(describeProjectStructure(root)).resolves.toBe(['README.md', 'package.json', 'src/', '  index.ts'].join('\n'));
  });

  it('caps the listing and says how much was left out', async () => {
    for (let i = 0; i < 60; i += 1) {
      write(`f${String(i).padStart(2, '0')}.ts`, '');
    }

    const lines = (await describeProjectStructure(root))?.split('\n') ?? [];

    expect(lines).toHaveLength(51);
    expect(lines[49]).toBe('f49.ts');
    expect(lines[50]).toBe('... (10 more)');
  });

  it('truncates key files on a character boundary', async () => {
    write('package.json', `${'a'.repeat(4999)}é`);
    write('README.md', 'Hello\n');

    await expect(readKeyFiles(root)).resolves.toEqual([
      { path: 'package.json', content: `${'a'.repeat(4999)}...[truncated]`, truncated: true },
      { path: 'README.md', content: 'Hello\n', truncated: false },
    ]);
  });

  it('formats structure and key files as prompt sections', async () => {
    write('README.md', 'Hello\n');

    const context = await gatherProjectContext(root);

    expect(formatProjectContext(context)).toBe('Project structure:\nREADME.md\n\nFile: README.md\nHello\n');
  });

  it('returns an empty context for a missing root', async () => {
    const context = await gatherProjectContext(path.join(root, 'missing'));

    expect(context).toEqual({ structure: null, keyFiles: [] });
    expect(formatProjectContext(context)).toBe('');
  });
});
