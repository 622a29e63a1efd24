export class AlreadyHeldError extends Error {
  constructor(public readonly mint: string) {
    super(`position already open for ${mint}`);
    this.name = "AlreadyHeldError";
  }
}

export class NotFoundError extends Error {
  constructor(public readonly mint: string) {
    super(`no position for ${mint}`);
    this.name = "NotFoundError";
  }
}

export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string
  ) {
    super(`${field}: ${message}`);
    this.name = "ValidationError";
  }
}

export class QuoteExpiredError extends Error {
  constructor(message = "quote expired before submission") {
    super(message);
    this.name = "QuoteExpiredError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

const STALE_QUOTE_PATTERNS = [/blockhash not found/i, /block height exceeded/i, /expired/i];

export function isStaleQuoteError(err: unknown): boolean {
  if (err instanceof QuoteExpiredError) return true;
  const message = err instanceof Error ? err.message : String(err);
  return STALE_QUOTE_PATTERNS.some((re) => re.test(message));
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
