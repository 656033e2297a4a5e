import { mkdirSync } from 'node:fs';
import path from 'node:path';
import { defineConfig, type UserConfig } from 'vitest/config';

// Keep vitest temp files on a predictable, writable directory. Scanner tests
// build throwaway repositories under TMPDIR, so it must not sit inside this
// repo or the snapshot would pick up our own sources.
const fallbackTmpDir = path.resolve(process.cwd(), '..', '.tmp', 'release-scribe');
const resolvedTmpDir =
  process.env.TMPDIR && process.env.TMPDIR.trim().length > 0
    ? process.env.TMPDIR
    : fallbackTmpDir;
process.env.TMPDIR = resolvedTmpDir;
process.env.TMP = resolvedTmpDir;
process.env.TEMP = resolvedTmpDir;
try {
  mkdirSync(resolvedTmpDir, { recursive: true });
} catch {
  // If we cannot create it, let vitest surface the error normally.
}

/**
 * Test tiers controlled by RELEASE_SCRIBE_TEST_MODE:
 * - 'unit' (default): provider CLIs are mocked, no subprocess leaves the test
 * - 'integration': real `claude` / `codex` / `rg` binaries on PATH
 */
export default defineConfig((): UserConfig => {
  const mode = process.env.RELEASE_SCRIBE_TEST_MODE ?? 'unit';
  const excluded: string[] = ['node_modules/**', 'dist/**'];
  if (mode === 'unit') {
    excluded.push('**/*.integration.test.ts', '**/*.live.test.ts');
  } else if (mode === 'integration') {
    excluded.push('**/*.live.test.ts');
  }

  return {
    test: {
      globals: true,
      environment: 'node',
      include: ['src/**/*.test.ts'],
      exclude: excluded,
      setupFiles: ['./vitest.setup.ts'],
      testTimeout: mode === 'unit' ? 30000 : 300000,
      hookTimeout: 10000,
      pool: 'forks',
      coverage: {
        provider: 'v8',
        reporter: ['text', 'json', 'html'],
        exclude: [
          'node_modules/',
          'dist/',
          '**/*.test.ts',
          'vitest.config.ts',
          'vitest.setup.ts',
        ],
      },
    },
  };
});
