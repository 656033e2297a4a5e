import { describe, expect, it } from 'vitest';
import type { ChangelogOutput } from '../../adapters/changelog_output.js';
import type { InvokeOptions, ProviderInvoker } from '../../adapters/cli_provider_invoker.js';
import { AllProvidersFailedError, ProviderError, type ProviderResult } from '../../adapters/provider_errors.js';
import { ProviderRouter } from '../../adapters/provider_router.js';
import { selectionFromPrimary, type Provider } from '../../adapters/providers.js';
import { resolveSettings } from '../../config/settings.js';
import { MemorySearcher } from '../../verification/__tests__/memory_searcher.js';
import { generateReleaseNotes } from '../release_notes.js';

const settings = resolveSettings({ retry: { maxRetries: 0 }, scanConcurrency: 2 });

class FixedInvoker implements ProviderInvoker {
  constructor(private readonly results: Record<Provider, ProviderResult<ChangelogOutput>>) {}

  async invoke(provider: Provider, _prompt: string, _options?: InvokeOptions): Promise<ProviderResult<ChangelogOutput>> {
    return this.results[provider];
  }

  async invokeRaw(provider: Provider): Promise<ProviderResult<string>> {
    const result = this.results[provider];
    return result.ok ? { ok: true, value: JSON.stringify(result.value) } : result;
  }
}

function routerFor(results: Record<Provider, ProviderResult<ChangelogOutput>>): ProviderRouter {
  return new ProviderRouter({ invoker: new FixedInvoker(results), settings, sleep: async () => undefined });
}

function output(...descriptions: string[]): ProviderResult<ChangelogOutput> {
  return { ok: true, value: { entries: descriptions.map((description) => ({ category: 'Added', description })) } };
}

const notInstalled = (provider: Provider): ProviderResult<ChangelogOutput> => ({
  ok: false,
  error: new ProviderError(provider, { kind: 'not_installed' }),
});

const searcher = new MemorySearcher({
  'src/export/csv_exporter.ts': '// CSV exporter for report rows\nexport function exportCsv(): string {\n  return "";\n}\n',
  'src/auth/oauth2.ts': [
    'export function startOAuth2Flow() {',
    '  // TODO: refresh tokens',
    '  // TODO: revoke tokens',
    '  // TODO: persist state',
    '}',
  ].join('\n'),
});

describe('generateReleaseNotes', () => {
  it('returns verified entries from the primary provider', async () => {
    const result = await generateReleaseNotes({
      prompt: 'summarize commits',
      selection: selectionFromPrimary('claude'),
      repoRoot: '/memory',
      settings,
      router: routerFor({ claude: output('Added CSV exporter'), codex: notInstalled('codex') }),
      searcher,
    });

    expect(result.provider).toBe('claude');
    expect(result.fallbackUsed).toBe(false);
    expect(result.primaryError).toBeNull();
    expect(result.report?.status).toBe('ok');
    expect(result.report?.entries[0].confidence).toBe(100);
    expect(result.warnings).toEqual([]);
    expect(result.recommendFallbackMode).toBe(false);
  });

  it('reports the fallback and skips verification when disabled', async () => {
    const selection = selectionFromPrimary('claude');

    const result = await generateReleaseNotes({
      prompt: 'summarize commits',
      selection,
      repoRoot: '/memory',
      verify: false,
      settings,
      router: routerFor({ claude: notInstalled('claude'), codex: output('Added CSV exporter') }),
      searcher,
    });

    expect(result.provider).toBe('codex');
    expect(result.fallbackUsed).toBe(true);
    expect(result.primaryError?.kind).toBe('not_installed');
    expect(result.report).toBeNull();
    expect(result.warnings).toEqual([
      'Claude failed (Claude CLI not found); used Codex instead. Codex is now the primary provider for this run.',
    ]);
    expect(selection).toEqual({ primary: 'codex', fallback: 'claude' });
  });

  it('recommends a simpler mode when no entry can be verified', async () => {
    const result = await generateReleaseNotes({
      prompt: 'summarize commits',
      selection: selectionFromPrimary('claude'),
      repoRoot: '/memory',
      settings,
      router: routerFor({ claude: output('Added Kubernetes operator'), codex: notInstalled('codex') }),
      searcher,
    });

    expect(result.report?.status).toBe('all_unverifiable');
    expect(result.recommendFallbackMode).toBe(true);
    expect(result.warnings).toEqual([
      'No generated entry could be verified against the repository; consider a simpler generation mode',
    ]);
  });

  it('counts low-confidence entries', async () => {
    const result = await generateReleaseNotes({
      prompt: 'summarize commits',
      selection: selectionFromPrimary('claude'),
      repoRoot: '/memory',
      settings,
      router: routerFor({ claude: output('Implemented full OAuth2 flow', 'Added CSV exporter'), codex: notInstalled('codex') }),
      searcher,
    });

    expect(result.report?.entries.map((entry) => entry.confidence)).toEqual([35, 100]);
    expect(result.report?.lowConfidenceEntries).toEqual([0]);
    expect(result.warnings).toEqual(['1 of 2 entries have low confidence']);
  });

  it('skips verification when nothing was generated', async () => {
    const result = await generateReleaseNotes({
      prompt: 'summarize commits',
      selection: selectionFromPrimary('claude'),
      repoRoot: '/memory',
      settings,
      router: routerFor({ claude: output(), codex: notInstalled('codex') }),
      searcher,
    });

    expect(result.output.entries).toEqual([]);
    expect(result.report).toBeNull();
  });

  it('rethrows when both providers fail', async () => {
    await expect(
      generateReleaseNotes({
        prompt: 'summarize commits',
        selection: selectionFromPrimary('claude'),
        repoRoot: '/memory',
        settings,
        router: routerFor({ claude: notInstalled('claude'), codex: notInstalled('codex') }),
        searcher,
      })
    ).rejects.toBeInstanceOf(AllProvidersFailedError);
  });
});
