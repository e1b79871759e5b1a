/**
 * Error types shared across the scanner
 */

/** Fatal misconfiguration; raised before any scan work starts */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly retryable: boolean,
    public readonly retryAfterMs: number | null = null
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

// Postgres lock/serialization failures worth another attempt
const CONTENTION_CODES = new Set(['40001', '40P01', '55P03']);

export class StoreWriteError extends Error {
  constructor(
    message: string,
    public readonly code: string | null
  ) {
    super(message);
    this.name = 'StoreWriteError';
  }

  get retryable(): boolean {
    return this.code !== null && CONTENTION_CODES.has(this.code);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
