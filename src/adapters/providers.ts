/**
 * The closed set of generation backends and the per-run primary/fallback pair.
 */

export const PROVIDERS = ['claude', 'codex'] as const;

export type Provider = (typeof PROVIDERS)[number];

export interface ProviderSelection {
  primary: Provider;
  fallback: Provider;
}

interface ProviderProfile {
  displayName: string;
  command: string;
  installHint: string;
  authHint: string;
}

export const PROVIDER_PROFILES: Record<Provider, ProviderProfile> = {
  claude: {
    displayName: 'Claude',
    command: 'claude',
    installHint: 'Install with: npm install -g @anthropic-ai/claude-code',
    authHint: 'Run "claude setup-token" or start "claude" once to authenticate',
  },
  codex: {
    displayName: 'Codex',
    command: 'codex',
    installHint: 'Install with: npm install -g @openai/codex',
    authHint: 'Run "codex login" or set CODEX_API_KEY',
  },
};

export function isProvider(value: unknown): value is Provider {
  return value === 'claude' || value === 'codex';
}

export function parseProvider(value: string | undefined): Provider | undefined {
  const normalized = value?.trim().toLowerCase();
  return isProvider(normalized) ? normalized : undefined;
}

export function otherProvider(provider: Provider): Provider {
  return provider === 'claude' ? 'codex' : 'claude';
}

export function selectionFromPrimary(primary: Provider): ProviderSelection {
  return { primary, fallback: otherProvider(primary) };
}

export function defaultSelection(): ProviderSelection {
  return selectionFromPrimary('claude');
}

export function providerDisplayName(provider: Provider): string {
  return PROVIDER_PROFILES[provider].displayName;
}
