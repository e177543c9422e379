/**
 * Paced, retrying JSON-over-HTTP executor.
 *
 * Redirects are never followed by fetch itself: undici drops the Authorization
 * header when a redirect crosses hosts, which would silently turn an
 * authenticated call into an anonymous one. A 3xx is followed exactly once by
 * hand with the original headers.
 */

import { TransportConfig } from '../../core/config.js';
import {
  AuthRequiredError,
  CrawlerError,
  HttpStatusError,
  RateLimitedError,
  ServerUnavailableError,
  TransportError,
  describeError,
} from '../../core/errors.js';
import { Logger, silentLogger } from '../../core/logger.js';
import { HttpMethod, JsonValue, QueryParams } from '../../core/types.js';
import { Clock, RateLimiter, Sleep, realClock, realSleep } from './rate-limiter.js';
import { HeaderLookup, RETRYABLE_STATUSES, decideRetry } from './retry-policy.js';

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

export type TransportResult =
  | { ok: true; value: JsonValue }
  | { ok: false; error: CrawlerError };

export interface HttpTransportOptions {
  config: TransportConfig;
  limiter?: RateLimiter;
  fetch?: FetchFn;
  sleep?: Sleep;
  clock?: Clock;
  logger?: Logger;
}

// Outcome of a single attempt, redirect included
type AttemptOutcome =
  | { kind: 'response'; status: number; headers: HeaderLookup; body: string; url: string }
  | { kind: 'network'; error: TransportError }
  | { kind: 'fatal'; error: CrawlerError };

export class HttpTransport {
  private readonly config: TransportConfig;
  private readonly limiter: RateLimiter;
  private readonly fetchFn: FetchFn;
  private readonly sleep: Sleep;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: HttpTransportOptions) {
    this.config = options.config;
    this.sleep = options.sleep ?? realSleep;
    this.clock = options.clock ?? realClock;
    this.limiter = options.limiter ?? new RateLimiter(options.config.requestsPerMinute, this.sleep, this.clock);
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Send a request and return the parsed JSON body, throwing the typed error on failure.
   */
  async send(method: HttpMethod, path: string, params: QueryParams = {}, useAuth = true): Promise<JsonValue> {
    const result = await this.execute(method, path, params, useAuth);
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  async execute(method: HttpMethod, path: string, params: QueryParams = {}, useAuth = true): Promise<TransportResult> {
    const url = this.buildUrl(path, params);
    const headers = this.buildHeaders(useAuth);

    let attempt = 0;
    let rateLimitWaits = 0;
    for (;;) {
      const outcome = await this.attempt(method, url, headers);

      if (outcome.kind === 'fatal') {
        return { ok: false, error: outcome.error };
      }
      if (outcome.kind === 'response') {
        if (outcome.status >= 200 && outcome.status < 300) {
          return { ok: true, value: this.parseBody(outcome.body, outcome.url) };
        }
        if (outcome.status === 401) {
          return { ok: false, error: new AuthRequiredError(401, outcome.url, outcome.body) };
        }
      }

      const status = outcome.kind === 'response' ? outcome.status : null;
      if (status !== 429) attempt++;

      const decision = decideRetry(
        status,
        outcome.kind === 'response' ? outcome.headers : null,
        { attempt, rateLimitWaits, now: this.clock() },
        this.config
      );
      if (decision.kind === 'give-up') {
        return { ok: false, error: toError(outcome) };
      }
      if (decision.reason === 'rate-limited') rateLimitWaits++;

      this.logger.warn(
        `${method} ${url} ${status === null ? 'network failure' : `HTTP ${status}`}; ` +
          `retrying in ${Math.round(decision.waitMs)}ms (attempt ${attempt}, rate-limit waits ${rateLimitWaits})`,
        outcome.kind === 'network' ? outcome.error : undefined
      );
      await this.sleep(decision.waitMs);
    }
  }

  private async attempt(method: HttpMethod, url: string, headers: Record<string, string>): Promise<AttemptOutcome> {
    const first = await this.request(method, url, headers);
    if (first.kind !== 'response' || !isRedirect(first.status)) {
      return first;
    }

    const location = first.headers.get('location');
    if (!location) {
      return { kind: 'fatal', error: new HttpStatusError(first.status, url, 'redirect without Location') };
    }

    let target: string;
    try {
      target = new URL(location, url).toString();
    } catch (error) {
      return { kind: 'fatal', error: new TransportError(`Invalid redirect Location "${location}"`, url, { cause: error }) };
    }

    const followed = await this.request(method, target, headers);
    if (followed.kind === 'response' && isRedirect(followed.status)) {
      return { kind: 'fatal', error: new TransportError(`Redirected more than once (${url} -> ${target})`, target) };
    }
    return followed;
  }

  private async request(method: HttpMethod, url: string, headers: Record<string, string>): Promise<AttemptOutcome> {
    await this.limiter.acquire();
    try {
      const response = await this.fetchFn(url, {
        method,
        headers,
        redirect: 'manual',
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
      const body = await response.text();
      return { kind: 'response', status: response.status, headers: response.headers, body, url };
    } catch (error) {
      return {
        kind: 'network',
        error: new TransportError(`${method} ${url} failed: ${describeError(error)}`, url, { cause: error }),
      };
    }
  }

  private parseBody(body: string, url: string): JsonValue {
    if (body.trim() === '') {
      return {};
    }
    try {
      const value: JsonValue = JSON.parse(body);
      return value;
    } catch {
      this.logger.warn(`non-JSON body from ${url} (${body.length} chars); treating as empty`);
      return {};
    }
  }

  private buildUrl(path: string, params: QueryParams): string {
    const search = new URLSearchParams();
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined && value !== null) {
        search.append(key, String(value));
      }
    }
    const query = search.toString();
    return `${this.config.baseUrl}${path}${query ? `?${query}` : ''}`;
  }

  private buildHeaders(useAuth: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.config.userAgent,
      Accept: 'application/json',
    };
    if (useAuth) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    } else {
      // CDN caching of public listings defeats offset pagination
      headers['Cache-Control'] = 'no-cache';
      headers.Pragma = 'no-cache';
    }
    return headers;
  }
}

function isRedirect(status: number): boolean {
  return status >= 300 && status < 400 && status !== 304;
}

function toError(outcome: AttemptOutcome): CrawlerError {
  if (outcome.kind !== 'response') {
    return outcome.error;
  }
  const { status, url, body } = outcome;
  if (status === 429) return new RateLimitedError(status, url, body);
  if (RETRYABLE_STATUSES.has(status)) return new ServerUnavailableError(status, url, body);
  return new HttpStatusError(status, url, body);
}
