export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UPSTREAM_TRANSIENT'
  | 'UPSTREAM_PERMANENT'
  | 'MALFORMED_AGENT_OUTPUT'
  | 'CIRCUIT_OPEN'
  | 'DEADLINE_EXCEEDED'
  | 'SEARCH_UNAVAILABLE'
  | 'UNAUTHORIZED'
  | 'RATE_LIMITED'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

export interface ErrorEnvelope {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
}

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly statusCode: number,
    readonly details?: unknown
  ) {
    super(message);
    this.name = new.target.name;
  }

  toEnvelope(): ErrorEnvelope {
    return {
      error: {
        code: this.code,
        message: this.message,
        ...(this.details === undefined ? {} : { details: this.details })
      }
    };
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/** Timeouts, 5xx, 429 and connection failures from a dependency. Retried. */
export class UpstreamTransientError extends AppError {
  constructor(
    message: string,
    readonly dependency: string,
    readonly status?: number
  ) {
    super(message, 'UPSTREAM_TRANSIENT', 502);
  }
}

/** 4xx-equivalent answers and unusable bodies. Never retried. */
export class UpstreamPermanentError extends AppError {
  constructor(
    message: string,
    readonly dependency: string,
    readonly status?: number
  ) {
    super(message, 'UPSTREAM_PERMANENT', 502);
  }
}

export class MalformedAgentOutputError extends AppError {
  constructor(
    message: string,
    readonly stage: string,
    readonly raw?: string
  ) {
    super(message, 'MALFORMED_AGENT_OUTPUT', 502);
  }
}

export class CircuitOpenError extends AppError {
  constructor(readonly dependency: string) {
    super(`Circuit breaker open for ${dependency}`, 'CIRCUIT_OPEN', 503);
  }
}

export class DeadlineExceededError extends AppError {
  constructor(readonly dependency: string) {
    super(`Deadline exceeded while calling ${dependency}`, 'DEADLINE_EXCEEDED', 504);
  }
}

export class SearchUnavailableError extends AppError {
  constructor(message = 'Search service is unavailable', details?: unknown) {
    super(message, 'SEARCH_UNAVAILABLE', 503, details);
  }
}

export class UnauthorizedError extends AppError {
  constructor() {
    super('Missing or invalid API key', 'UNAUTHORIZED', 401);
  }
}

export function isTransient(err: unknown): boolean {
  return err instanceof UpstreamTransientError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
