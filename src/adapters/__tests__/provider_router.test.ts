import { beforeEach, describe, expect, it, vi } from 'vitest';
import { logWarning } from '../../telemetry/logger.js';
import { resolveSettings } from '../../config/settings.js';
import type { ChangelogOutput } from '../changelog_output.js';
import type { InvokeOptions, ProviderInvoker } from '../cli_provider_invoker.js';
import {
  AllProvidersFailedError,
  GenerationCancelledError,
  ProviderError,
  type ProviderResult,
} from '../provider_errors.js';
import { ProviderRouter } from '../provider_router.js';
import { selectionFromPrimary, type Provider } from '../providers.js';

vi.mock('../../telemetry/logger.js', () => ({
  logDebug: vi.fn(),
  logInfo: vi.fn(),
  logWarning: vi.fn(),
  logError: vi.fn(),
}));

type Scripted = ProviderResult<ChangelogOutput> | ProviderError;

const OUTPUT_A: ChangelogOutput = { entries: [{ category: 'Added', description: 'Output from A' }] };
const OUTPUT_B: ChangelogOutput = { entries: [{ category: 'Fixed', description: 'Output from B' }] };

class ScriptedInvoker implements ProviderInvoker {
  readonly calls: Provider[] = [];
  private readonly scripts: Record<Provider, Scripted[]> = { claude: [], codex: [] };

  script(provider: Provider, ...results: Scripted[]): this {
    this.scripts[provider].push(...results);
    return this;
  }

  private next(provider: Provider, options: InvokeOptions = {}): ProviderResult<ChangelogOutput> {
    this.calls.push(provider);
    const scripted = this.scripts[provider].shift();
    if (scripted === undefined) {
      throw new Error(`no scripted result left for ${provider}`);
    }
    const result: ProviderResult<ChangelogOutput> = scripted instanceof ProviderError
      ? { ok: false, error: scripted }
      : scripted;
    options.onAttempt?.({
      provider,
      startedAt: '2026-01-01T00:00:00.000Z',
      durationMs: 0,
      outcome: result.ok ? 'success' : result.error.kind,
    });
    return result;
  }

  async invoke(provider: Provider, _prompt: string, options?: InvokeOptions): Promise<ProviderResult<ChangelogOutput>> {
    return this.next(provider, options);
  }

  async invokeRaw(provider: Provider, _prompt: string, options?: InvokeOptions): Promise<ProviderResult<string>> {
    const result = this.next(provider, options);
    return result.ok ? { ok: true, value: result.value.entries.map((entry) => entry.description).join('\n') } : result;
  }
}

function router(invoker: ProviderInvoker, maxRetries = 2): ProviderRouter {
  return new ProviderRouter({
    invoker,
    settings: resolveSettings({ retry: { maxRetries } }),
    sleep: async () => undefined,
  });
}

const rateLimited = new ProviderError('claude', { kind: 'non_zero_exit', code: 1, stderr: 'rate limited' });

describe('ProviderRouter', () => {
  beforeEach(() => {
    vi.mocked(logWarning).mockClear();
  });

  it('returns the primary result and never calls the fallback when the primary succeeds', async () => {
    const invoker = new ScriptedInvoker().script('claude', { ok: true, value: OUTPUT_A });
    const selection = selectionFromPrimary('claude');

    const completion = await router(invoker).generateWithFallback('prompt', selection);

    expect(completion.output).toEqual(OUTPUT_A);
    expect(completion.provider).toBe('claude');
    expect(completion.fallbackUsed).toBe(false);
    expect(completion.warnings).toEqual([]);
    expect(invoker.calls).toEqual(['claude']);
    expect(selection).toEqual({ primary: 'claude', fallback: 'codex' });
  });

  it('falls back on a rate-limited primary and makes the fallback sticky', async () => {
    const invoker = new ScriptedInvoker()
      .script('claude', rateLimited, rateLimited, rateLimited)
      .script('codex', { ok: true, value: OUTPUT_B }, { ok: true, value: OUTPUT_A });
    const selection = selectionFromPrimary('claude');
    const scribe = router(invoker);

    const completion = await scribe.generateWithFallback('prompt', selection);

    expect(completion.output).toEqual(OUTPUT_B);
    expect(completion.provider).toBe('codex');
    expect(completion.fallbackUsed).toBe(true);
    expect(completion.primaryError?.rootCause()).toBe(rateLimited);
    expect(completion.warnings).toEqual([
      'Claude failed (Claude failed after 3 attempts (Claude CLI exited with code 1)); '
        + 'used Codex instead. Codex is now the primary provider for this run.',
    ]);
    expect(completion.attempts.map((attempt) => `${attempt.provider}:${attempt.outcome}`)).toEqual([
      'claude:non_zero_exit',
      'claude:non_zero_exit',
      'claude:non_zero_exit',
      'codex:success',
    ]);
    expect(logWarning).toHaveBeenCalledWith('Provider fallback used', {
      failed: 'claude',
      used: 'codex',
      reason: 'Claude failed after 3 attempts (Claude CLI exited with code 1)',
    });
    expect(selection).toEqual({ primary: 'codex', fallback: 'claude' });

    const next = await scribe.generateWithFallback('prompt', selection);

    expect(next.provider).toBe('codex');
    expect(next.fallbackUsed).toBe(false);
    expect(invoker.calls).toEqual(['claude', 'claude', 'claude', 'codex', 'codex']);
  });

  it('reports both providers and both reasons when everything fails', async () => {
    const invoker = new ScriptedInvoker()
      .script('claude', new ProviderError('claude', { kind: 'not_installed' }))
      .script('codex', new ProviderError('codex', { kind: 'invalid_json', reason: 'Unexpected token' }));
    const selection = selectionFromPrimary('claude');

    const error = await router(invoker).generateWithFallback('prompt', selection).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AllProvidersFailedError);
    if (!(error instanceof AllProvidersFailedError)) return;
    expect(error.primary).toBe('claude');
    expect(error.fallback).toBe('codex');
    expect(error.primaryError.kind).toBe('not_installed');
    expect(error.fallbackError.kind).toBe('invalid_json');
    expect(error.message).toBe(
      'Both LLM providers failed. Claude error: Claude CLI not found. Codex error: Codex returned invalid JSON.'
    );
    expect(error.remediationHints()).toEqual(['Install with: npm install -g @anthropic-ai/claude-code']);
    expect(selection).toEqual({ primary: 'claude', fallback: 'codex' });
    expect(logWarning).not.toHaveBeenCalledWith('Provider fallback used', expect.anything());
  });

  it('applies the same stickiness to raw generation', async () => {
    const invoker = new ScriptedInvoker()
      .script('codex', new ProviderError('codex', { kind: 'not_installed' }))
      .script('claude', { ok: true, value: OUTPUT_A });
    const selection = selectionFromPrimary('codex');

    const completion = await router(invoker).generateRawWithFallback('prompt', selection);

    expect(completion.output).toBe('Output from A');
    expect(completion.provider).toBe('claude');
    expect(selection).toEqual({ primary: 'claude', fallback: 'codex' });
  });

  it('throws GenerationCancelledError before calling anything when already aborted', async () => {
    const invoker = new ScriptedInvoker();
    const controller = new AbortController();
    controller.abort();

    await expect(
      router(invoker).generateWithFallback('prompt', selectionFromPrimary('claude'), { signal: controller.signal })
    ).rejects.toBeInstanceOf(GenerationCancelledError);
    expect(invoker.calls).toEqual([]);
  });

  it('does not fall back when the primary call is cancelled', async () => {
    const invoker = new ScriptedInvoker().script('claude', new ProviderError('claude', { kind: 'cancelled' }));
    const selection = selectionFromPrimary('claude');

    const error = await router(invoker).generateWithFallback('prompt', selection).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationCancelledError);
    if (!(error instanceof GenerationCancelledError)) return;
    expect(error.provider).toBe('claude');
    expect(invoker.calls).toEqual(['claude']);
    expect(selection.primary).toBe('claude');
  });
});
