/**
 * Failure taxonomy for upstream sources. Everything a source can throw is
 * normalized to a `SourceError` before it reaches the fallback adapter.
 */
export class SourceError extends Error {
  readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SourceError';
    this.source = source;
  }
}

/** Network error, timeout or non-2xx response. */
export class FetchError extends SourceError {
  readonly url: string;
  readonly status?: number;

  constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
    super(message, undefined, options);
    this.name = 'FetchError';
    this.url = url;
    this.status = status;
  }
}

/** Expected pattern, field or structure not found in a fetched body. */
export class ParseError extends SourceError {
  constructor(message: string, source?: string) {
    super(message, source);
    this.name = 'ParseError';
  }
}

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} timed out after ${ms}ms`);
    this.name = 'TimeoutError';
  }
}

export function toSourceError(err: unknown, source?: string): SourceError {
  if (err instanceof SourceError) return err;
  if (err instanceof Error) return new SourceError(err.message, source, { cause: err });
  return new SourceError(String(err), source);
}
