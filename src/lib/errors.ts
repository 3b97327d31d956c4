/**
 * Error taxonomy for the ingestion path
 * Source-level errors (fetch/parse) are contained per source; store and
 * config errors carry the failing operation for operators.
 */

export type IngestErrorKind = 'config' | 'fetch' | 'parse' | 'store' | 'concurrency';

export abstract class IngestError extends Error {
  abstract readonly kind: IngestErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Invalid or unreadable configuration. Fatal at startup. */
export class ConfigError extends IngestError {
  readonly kind = 'config' as const;
}

/** Transport failure, timeout or non-2xx status for one source. */
export class FetchError extends IngestError {
  readonly kind = 'fetch' as const;

  constructor(
    readonly sourceId: string,
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Payload retrieved but could not be parsed as a feed. */
export class ParseError extends IngestError {
  readonly kind = 'parse' as const;

  constructor(readonly sourceId: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class StoreError extends IngestError {
  readonly kind = 'store' as const;

  constructor(readonly operation: string, message: string, options?: { cause?: unknown }) {
    super(`${operation}: ${message}`, options);
  }
}

/** Raised when starting an engine that is already running. */
export class ConcurrencyError extends IngestError {
  readonly kind = 'concurrency' as const;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
