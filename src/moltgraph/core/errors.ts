/**
 * Error taxonomy shared by the transport, the graph stores and the orchestrator.
 */

export class CrawlerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure, timeout, or an unexpected redirect chain. */
export class TransportError extends CrawlerError {
  constructor(message: string, readonly url: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Non-2xx response that is not retried (404, 400, 500, ...). */
export class HttpStatusError extends CrawlerError {
  constructor(readonly status: number, readonly url: string, readonly body: string) {
    super(`HTTP ${status} for ${url}${body ? `: ${body.slice(0, 200)}` : ''}`);
  }
}

/** 401 from the upstream; callers may retry once with credentials. */
export class AuthRequiredError extends HttpStatusError {}

/** Retryable 5xx that persisted through every attempt. */
export class ServerUnavailableError extends HttpStatusError {}

/** 429 that persisted through the rate-limit wait budget. */
export class RateLimitedError extends HttpStatusError {}

export class PersistenceError extends CrawlerError {
  constructor(readonly operation: string, options?: { cause?: unknown }) {
    super(`Graph write failed during ${operation}: ${describeError(options?.cause)}`, options);
  }
}

export class ConfigurationError extends CrawlerError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
