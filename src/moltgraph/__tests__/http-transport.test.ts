import { describe, it, expect } from 'vitest';
import {
  AuthRequiredError,
  HttpStatusError,
  RateLimitedError,
  ServerUnavailableError,
  TransportError,
} from '../core/errors.js';
import { TransportConfig } from '../core/config.js';
import { HttpTransport } from '../lib/transport/http-transport.js';
import { RateLimiter } from '../lib/transport/rate-limiter.js';
import {
  DEFAULT_TEST_VALUES,
  ScriptedResponse,
  createTransportConfig,
  fakeTime,
  headerOf,
  scriptedFetch,
} from './test-helpers.js';

function setup(script: Array<ScriptedResponse | Error>, overrides: Partial<TransportConfig> = {}) {
  const time = fakeTime();
  const fetch = scriptedFetch(script);
  const transport = new HttpTransport({
    config: createTransportConfig(overrides),
    fetch: fetch.fetch,
    sleep: time.sleep,
    clock: time.clock,
  });
  return { transport, calls: fetch.calls, sleeps: time.sleeps };
}

describe('HttpTransport', () => {
  describe('rate limiting (429)', () => {
    it('should honor Retry-After and then succeed', async () => {
      const { transport, calls, sleeps } = setup([
        { status: 429, headers: { 'Retry-After': '2' } },
        { status: 200, body: { ok: true } },
      ]);

      await expect(transport.send('GET', '/posts')).resolves.toEqual({ ok: true });
      expect(calls).toHaveLength(2);
      expect(sleeps).toEqual([2_000]);
    });

    it('should not spend the attempt budget on 429s', async () => {
      const { transport, calls } = setup(
        [{ status: 429 }, { status: 429 }, { status: 503 }, { status: 200, body: [] }],
        { maxAttempts: 2, rateLimitCooldownMs: 1_000 }
      );

      await expect(transport.send('GET', '/posts')).resolves.toEqual([]);
      expect(calls).toHaveLength(4);
    });

    it('should give up with RateLimitedError once the wait budget is spent', async () => {
      const { transport, calls, sleeps } = setup([{ status: 429 }, { status: 429 }, { status: 429 }, { status: 429 }], {
        maxRateLimitWaits: 3,
      });

      const result = await transport.execute('GET', '/posts');
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(RateLimitedError);
      }
      expect(calls).toHaveLength(4);
      expect(sleeps).toEqual([30_000, 30_000, 30_000]);
    });
  });

  describe('server errors and network failures', () => {
    it('should back off exponentially with a ceiling and surface ServerUnavailableError', async () => {
      const { transport, sleeps } = setup([{ status: 503 }, { status: 503 }, { status: 503 }, { status: 503 }], {
        maxAttempts: 4,
        backoffSeedMs: 1_000,
        backoffCeilingMs: 3_000,
      });

      const error = await transport.send('GET', '/posts').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(ServerUnavailableError);
      expect(error).toHaveProperty('status', 503);
      expect(sleeps).toEqual([1_000, 2_000, 3_000]);
    });

    it('should retry a network failure', async () => {
      const { transport, sleeps } = setup([new Error('socket hang up'), { status: 200, body: { posts: [] } }]);

      await expect(transport.send('GET', '/posts')).resolves.toEqual({ posts: [] });
      expect(sleeps).toEqual([1_000]);
    });

    it('should not retry a 404', async () => {
      const { transport, calls } = setup([{ status: 404, body: 'missing' }]);

      const error = await transport.send('GET', '/posts/p-404').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(HttpStatusError);
      expect(error).toHaveProperty('message', `HTTP 404 for ${DEFAULT_TEST_VALUES.baseUrl}/posts/p-404: missing`);
      expect(calls).toHaveLength(1);
    });
  });

  describe('redirects', () => {
    it('should follow one redirect manually with the original Authorization header', async () => {
      const { transport, calls } = setup([
        { status: 307, headers: { Location: 'https://edge.test/api/v1/agents/me' } },
        { status: 200, body: { agent: { name: 'self' } } },
      ]);

      await expect(transport.send('GET', '/agents/me', {}, true)).resolves.toEqual({ agent: { name: 'self' } });
      expect(calls.map(call => call.url)).toEqual([
        `${DEFAULT_TEST_VALUES.baseUrl}/agents/me`,
        'https://edge.test/api/v1/agents/me',
      ]);
      expect(calls.map(call => call.init.redirect)).toEqual(['manual', 'manual']);
      expect(headerOf(calls[1], 'Authorization')).toBe('Bearer test-secret');
    });

    it('should resolve a relative Location against the request URL', async () => {
      const { transport, calls } = setup([
        { status: 301, headers: { Location: '/api/v2/posts' } },
        { status: 200, body: [] },
      ]);

      await transport.send('GET', '/posts');
      expect(calls[1].url).toBe('https://api.test/api/v2/posts');
    });

    it('should reject a second redirect', async () => {
      const { transport, calls } = setup([
        { status: 302, headers: { Location: 'https://edge.test/a' } },
        { status: 302, headers: { Location: 'https://edge.test/b' } },
      ]);

      const error = await transport.send('GET', '/posts').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(TransportError);
      expect(calls).toHaveLength(2);
    });
  });

  describe('responses', () => {
    it('should surface 401 as AuthRequiredError without retrying', async () => {
      const { transport, calls } = setup([{ status: 401, body: { error: 'unauthorized' } }]);

      const error = await transport.send('GET', '/posts', {}, false).catch((e: unknown) => e);
      expect(error).toBeInstanceOf(AuthRequiredError);
      expect(calls).toHaveLength(1);
    });

    it('should read an empty or non-JSON body as an empty object', async () => {
      const { transport } = setup([{ status: 200 }, { status: 200, body: '<html>oops</html>' }]);

      await expect(transport.send('GET', '/posts')).resolves.toEqual({});
      await expect(transport.send('GET', '/posts')).resolves.toEqual({});
    });

    it('should build the query string and pick headers by auth mode', async () => {
      const { transport, calls } = setup([{ status: 200, body: {} }, { status: 200, body: {} }]);

      await transport.send('GET', '/posts', { sort: 'new', limit: 50, time: null, submolt: undefined }, false);
      await transport.send('GET', '/feed', { sort: 'hot' }, true);

      expect(calls[0].url).toBe(`${DEFAULT_TEST_VALUES.baseUrl}/posts?sort=new&limit=50`);
      expect(headerOf(calls[0], 'Authorization')).toBeNull();
      expect(headerOf(calls[0], 'Cache-Control')).toBe('no-cache');
      expect(headerOf(calls[0], 'Pragma')).toBe('no-cache');
      expect(headerOf(calls[1], 'Authorization')).toBe('Bearer test-secret');
      expect(headerOf(calls[1], 'User-Agent')).toBe(DEFAULT_TEST_VALUES.userAgent);
      expect(headerOf(calls[1], 'Accept')).toBe('application/json');
    });
  });
});

describe('RateLimiter', () => {
  it('should space requests by the per-minute budget', async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(120, time.sleep, time.clock);

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(limiter.minIntervalMs).toBe(500);
    expect(time.sleeps).toEqual([500, 500]);
  });
});
