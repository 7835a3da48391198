export type ScraperErrorCode =
  | 'CONFIGURATION'
  | 'TRANSIENT_FETCH'
  | 'FATAL_FETCH'
  | 'RUN_ABORTED';

export abstract class ScraperError extends Error {
  abstract readonly code: ScraperErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad scope or filter input. Raised before the first fetch and never retried. */
export class ConfigurationError extends ScraperError {
  readonly code = 'CONFIGURATION';

  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, options);
  }
}

export class TransientFetchError extends ScraperError {
  readonly code = 'TRANSIENT_FETCH';

  constructor(message: string, readonly retryAfterMs?: number, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class FatalFetchError extends ScraperError {
  readonly code = 'FATAL_FETCH';
}

export class RunAborted extends ScraperError {
  readonly code = 'RUN_ABORTED';
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
