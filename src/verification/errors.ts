export class SearchFailedError extends Error {
  readonly keyword: string;

  constructor(keyword: string, reason: string) {
    super(`Search for "${keyword}" failed: ${reason}`);
    this.name = 'SearchFailedError';
    this.keyword = keyword;
  }
}

export class VerificationCancelledError extends Error {
  constructor() {
    super('Verification cancelled; partial results were discarded');
    this.name = 'VerificationCancelledError';
  }
}

export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new VerificationCancelledError();
  }
}
