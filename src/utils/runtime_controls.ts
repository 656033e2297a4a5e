export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes' || normalized === 'on';
}

export function isFalsyFlag(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === '0' || normalized === 'false' || normalized === 'no' || normalized === 'off';
}

export function isTelemetryDisabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.RELEASE_SCRIBE_NO_TELEMETRY);
}

export function isVerboseModeEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return isTruthyFlag(env.RELEASE_SCRIBE_VERBOSE);
}

/** Verification is on unless explicitly switched off. */
export function isVerificationEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return !isFalsyFlag(env.RELEASE_SCRIBE_VERIFY) && !isTruthyFlag(env.RELEASE_SCRIBE_NO_VERIFY);
}
