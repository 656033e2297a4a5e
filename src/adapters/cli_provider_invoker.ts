import { execa } from 'execa';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { DEFAULT_PROVIDER_TIMEOUT_MS, type TimeoutSettings } from '../config/settings.js';
import { extractJson } from '../utils/json_extract.js';
import { clipLine } from '../utils/text_truncation.js';
import {
  CHANGELOG_OUTPUT_JSON_SCHEMA,
  parseChangelogOutput,
  type ChangelogOutput,
} from './changelog_output.js';
import { ProviderError, type ProviderFailureKind, type ProviderResult } from './provider_errors.js';
import { PROVIDER_PROFILES, type Provider } from './providers.js';

/** One invocation of one backend, kept for logging and the completion record. */
export interface GenerationAttempt {
  provider: Provider;
  startedAt: string;
  durationMs: number;
  outcome: 'success' | ProviderFailureKind;
}

export interface InvokeOptions {
  /** Hard deadline for the child process; defaults to the provider's configured timeout. */
  timeoutMs?: number;
  /** Run-level cancellation; aborting kills the child. */
  signal?: AbortSignal;
  modelId?: string;
  onAttempt?: (attempt: GenerationAttempt) => void;
}

export interface ProviderInvoker {
  invoke(provider: Provider, prompt: string, options?: InvokeOptions): Promise<ProviderResult<ChangelogOutput>>;
  invokeRaw(provider: Provider, prompt: string, options?: InvokeOptions): Promise<ProviderResult<string>>;
}

type OutputMode = 'structured' | 'raw';

interface ProcessOutcome {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  cancelled: boolean;
  spawnErrorCode: string | null;
  spawnErrorMessage: string | null;
}

const ClaudeEnvelopeSchema = z.object({
  result: z.string(),
  is_error: z.boolean().optional(),
});

function readStringProperty(value: object, key: string): string | undefined {
  const candidate: unknown = Reflect.get(value, key);
  return typeof candidate === 'string' ? candidate : undefined;
}

function withCliPath(env: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const home = process.env.HOME || '';
  const prefix = home ? path.join(home, '.local', 'bin') : '';
  if (!prefix) return env;
  const currentPath = env.PATH ?? '';
  const parts = currentPath.split(path.delimiter).filter(Boolean);
  if (parts.includes(prefix)) return env;
  return { ...env, PATH: `${prefix}${path.delimiter}${currentPath}` };
}

async function runCli(
  command: string,
  args: string[],
  options: { input: string; timeoutMs: number; signal?: AbortSignal }
): Promise<ProcessOutcome> {
  const result = await execa(command, args, {
    input: options.input,
    env: withCliPath({ ...process.env }),
    timeout: options.timeoutMs,
    cancelSignal: options.signal,
    reject: false,
  });
  const exitCode = typeof result.exitCode === 'number' ? result.exitCode : null;
  const spawnFailed = exitCode === null && !result.timedOut && !result.isCanceled;
  return {
    exitCode,
    stdout: String(result.stdout ?? ''),
    stderr: String(result.stderr ?? ''),
    timedOut: Boolean(result.timedOut),
    cancelled: Boolean(result.isCanceled) || Boolean(options.signal?.aborted),
    spawnErrorCode: spawnFailed ? (readStringProperty(result, 'code') ?? null) : null,
    spawnErrorMessage: spawnFailed
      ? (readStringProperty(result, 'originalMessage') ?? readStringProperty(result, 'message') ?? 'unknown spawn error')
      : null,
  };
}

/**
 * Maps process-level outcomes to typed failures. Returns null when the
 * process ran to a zero exit and its stdout should be parsed.
 */
function classifyProcessOutcome(provider: Provider, outcome: ProcessOutcome, timeoutMs: number): ProviderError | null {
  if (outcome.cancelled) {
    return new ProviderError(provider, { kind: 'cancelled' });
  }
  if (outcome.timedOut) {
    return new ProviderError(provider, { kind: 'timeout', timeoutMs });
  }
  if (outcome.exitCode === null) {
    if (outcome.spawnErrorCode === 'ENOENT') {
      return new ProviderError(provider, { kind: 'not_installed' });
    }
    const reason = outcome.spawnErrorCode
      ? `${outcome.spawnErrorCode}: ${outcome.spawnErrorMessage ?? ''}`.trim()
      : (outcome.spawnErrorMessage ?? 'unknown spawn error');
    return new ProviderError(provider, { kind: 'spawn_failed', reason });
  }
  if (outcome.exitCode !== 0) {
    return new ProviderError(provider, {
      kind: 'non_zero_exit',
      code: outcome.exitCode,
      stderr: outcome.stderr || outcome.stdout,
    });
  }
  return null;
}

/**
 * Unwraps the `claude --output-format json` envelope. Noisy output (hook
 * chatter around the JSON) goes through JSON extraction; output that is not
 * an envelope at all is passed through as the raw response.
 */
export function unwrapClaudeEnvelope(stdout: string): ProviderResult<string> {
  for (const candidate of [stdout, extractJson(stdout)]) {
    let raw: unknown;
    try {
      raw = JSON.parse(candidate);
    } catch {
      continue;
    }
    const envelope = ClaudeEnvelopeSchema.safeParse(raw);
    if (!envelope.success) continue;
    if (envelope.data.is_error) {
      return { ok: false, error: new ProviderError('claude', { kind: 'execution_failed', message: envelope.data.result }) };
    }
    return { ok: true, value: envelope.data.result };
  }
  logWarning('Claude output is not a CLI envelope; treating it as a raw response', {
    hint: 'check `claude --version` for a CLI version mismatch',
  });
  return { ok: true, value: stdout };
}

function parseStructured(provider: Provider, content: string): ProviderResult<ChangelogOutput> {
  const parsed = parseChangelogOutput(content);
  if (!parsed.ok) {
    return { ok: false, error: new ProviderError(provider, { kind: 'invalid_json', reason: parsed.error }) };
  }
  return { ok: true, value: parsed.value };
}

export interface CliProviderInvokerOptions {
  timeouts?: Partial<TimeoutSettings>;
}

/**
 * Spawns the `claude` or `codex` CLI once per call. Prompts go over stdin,
 * stdout and stderr are captured separately, and the child is killed on
 * timeout or cancellation.
 */
export class CliProviderInvoker implements ProviderInvoker {
  private readonly timeouts: TimeoutSettings;

  constructor(options: CliProviderInvokerOptions = {}) {
    this.timeouts = {
      claude: options.timeouts?.claude ?? DEFAULT_PROVIDER_TIMEOUT_MS,
      codex: options.timeouts?.codex ?? DEFAULT_PROVIDER_TIMEOUT_MS,
    };
  }

  invoke(provider: Provider, prompt: string, options: InvokeOptions = {}): Promise<ProviderResult<ChangelogOutput>> {
    return this.run(provider, prompt, 'structured', options, (content) => parseStructured(provider, content));
  }

  invokeRaw(provider: Provider, prompt: string, options: InvokeOptions = {}): Promise<ProviderResult<string>> {
    return this.run(provider, prompt, 'raw', options, (content) => ({ ok: true, value: content }));
  }

  private resolveTimeout(provider: Provider, requested: number | undefined): number {
    if (requested !== undefined && Number.isFinite(requested) && requested > 0) return requested;
    return this.timeouts[provider];
  }

  private async run<T>(
    provider: Provider,
    prompt: string,
    mode: OutputMode,
    options: InvokeOptions,
    parse: (content: string) => ProviderResult<T>
  ): Promise<ProviderResult<T>> {
    if (prompt.trim().length === 0) {
      throw new RangeError('prompt must be non-empty');
    }
    const timeoutMs = this.resolveTimeout(provider, options.timeoutMs);
    const started = Date.now();
    logInfo(`Provider call: ${provider}`, { mode, promptLength: prompt.length, timeoutMs });

    const result = provider === 'claude'
      ? await this.callClaude(prompt, mode, timeoutMs, options, parse)
      : await this.callCodex(prompt, mode, timeoutMs, options, parse);

    const attempt: GenerationAttempt = {
      provider,
      startedAt: new Date(started).toISOString(),
      durationMs: Date.now() - started,
      outcome: result.ok ? 'success' : result.error.kind,
    };
    if (!result.ok) {
      logWarning(`Provider call failed: ${provider}`, { kind: result.error.kind, error: clipLine(result.error.summary(), 220) });
    }
    options.onAttempt?.(attempt);
    return result;
  }

  private async callClaude<T>(
    prompt: string,
    mode: OutputMode,
    timeoutMs: number,
    options: InvokeOptions,
    parse: (content: string) => ProviderResult<T>
  ): Promise<ProviderResult<T>> {
    const args = ['--print', '--output-format', 'json'];
    if (options.modelId) {
      args.push('--model', options.modelId);
    }
    const outcome = await runCli(PROVIDER_PROFILES.claude.command, args, {
      input: prompt,
      timeoutMs,
      signal: options.signal,
    });
    const failure = classifyProcessOutcome('claude', outcome, timeoutMs);
    if (failure) return { ok: false, error: failure };

    const content = unwrapClaudeEnvelope(outcome.stdout);
    if (!content.ok) return content;
    logDebug('Claude response received', { mode, length: content.value.length });
    return parse(content.value);
  }

  private async callCodex<T>(
    prompt: string,
    mode: OutputMode,
    timeoutMs: number,
    options: InvokeOptions,
    parse: (content: string) => ProviderResult<T>
  ): Promise<ProviderResult<T>> {
    const args = ['exec'];
    let tempDir: string | null = null;
    let outputPath: string | null = null;
    try {
      if (mode === 'structured') {
        tempDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'release-scribe-codex-'));
        const schemaPath = path.join(tempDir, 'output_schema.json');
        outputPath = path.join(tempDir, 'last_message.txt');
        await fs.promises.writeFile(schemaPath, JSON.stringify(CHANGELOG_OUTPUT_JSON_SCHEMA, null, 2), 'utf8');
        args.push('--output-schema', schemaPath, '--output-last-message', outputPath);
      }
      if (options.modelId) {
        args.push('--model', options.modelId);
      }
      args.push('-');

      const outcome = await runCli(PROVIDER_PROFILES.codex.command, args, {
        input: prompt,
        timeoutMs,
        signal: options.signal,
      });
      const failure = classifyProcessOutcome('codex', outcome, timeoutMs);
      if (failure) return { ok: false, error: failure };

      let content = outcome.stdout;
      if (outputPath) {
        try {
          content = await fs.promises.readFile(outputPath, 'utf8');
        } catch (error) {
          logWarning('Codex output file missing, using stdout', { error: String(error) });
        }
      }
      logDebug('Codex response received', { mode, length: content.length });
      return parse(content);
    } finally {
      if (tempDir) {
        await fs.promises.rm(tempDir, { recursive: true, force: true });
      }
    }
  }
}

/**
 * `--version` check. A missing binary and a binary that cannot report its
 * version are both treated as not installed.
 */
export async function checkProviderInstalled(provider: Provider): Promise<ProviderResult<string>> {
  const result = await execa(PROVIDER_PROFILES[provider].command, ['--version'], {
    env: withCliPath({ ...process.env }),
    timeout: 5000,
    reject: false,
  });
  if (result.exitCode !== 0) {
    return { ok: false, error: new ProviderError(provider, { kind: 'not_installed' }) };
  }
  return { ok: true, value: String(result.stdout ?? '').trim() };
}
