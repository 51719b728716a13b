export type ErrorKind =
  | 'validation'
  | 'unsupported_format'
  | 'extraction'
  | 'embedding_unavailable'
  | 'synthesis_unavailable'
  | 'permission_denied'
  | 'rate_limited'
  | 'not_found'
  | 'timeout';

export const HTTP_STATUS: Record<ErrorKind, number> = {
  validation: 400,
  unsupported_format: 415,
  extraction: 422,
  embedding_unavailable: 503,
  synthesis_unavailable: 503,
  permission_denied: 403,
  rate_limited: 429,
  not_found: 404,
  timeout: 504
};

/**
 * Base class for every failure the Q&A core reports to its callers.
 * `kind` is stable and safe to expose; `httpStatus` is what the HTTP glue answers with.
 */
export class DocQAError extends Error {
  readonly kind: ErrorKind;
  readonly httpStatus: number;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.httpStatus = HTTP_STATUS[kind];
  }
}

export class ValidationError extends DocQAError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super('validation', message);
    this.details = details;
  }
}

export class UnsupportedFormatError extends DocQAError {
  constructor(format: string) {
    super('unsupported_format', `Unsupported document format: ${format}`);
  }
}

export class ExtractionError extends DocQAError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extraction', message, options);
  }
}

export class EmbeddingUnavailableError extends DocQAError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('embedding_unavailable', message, options);
  }
}

export class SynthesisUnavailableError extends DocQAError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('synthesis_unavailable', message, options);
  }
}

// Same message whether or not the document exists.
export class PermissionDeniedError extends DocQAError {
  constructor() {
    super('permission_denied', 'You do not have access to this document');
  }
}

export class NotFoundError extends DocQAError {
  constructor(what: string) {
    super('not_found', `${what} not found`);
  }
}

export class RateLimitedError extends DocQAError {
  readonly retryAfterMs: number;

  constructor(retryAfterMs: number) {
    super('rate_limited', `Rate limit exceeded, retry in ${Math.ceil(retryAfterMs / 1000)}s`);
    this.retryAfterMs = retryAfterMs;
  }
}

export class TimeoutError extends DocQAError {
  constructor(label: string, timeoutMs: number) {
    super('timeout', `${label} timed out after ${timeoutMs}ms`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
