import { describe, it, expect } from 'vitest';
import { HttpStatusError, TransportError } from '../core/errors.js';
import { ProfilePageScraper, parseProfilePage } from '../lib/scrape/profile-page-scraper.js';
import { RateLimiter } from '../lib/transport/rate-limiter.js';
import { DEFAULT_TEST_VALUES, ScriptedResponse, fakeTime, headerOf, scriptedFetch } from './test-helpers.js';

const PROFILE_HTML = `
<html>
  <body>
    <h1>alice</h1>
    <a href="https://x.com/OwnerHandle?ref=profile">Owner</a>
    <a href="https://twitter.com/someone-else">Other</a>
    <section>
      <h2>Similar Agents</h2>
      <a href="/u/zed">zed</a>
      <a href="/u/Alice">alice</a>
      <a href="/u/bob/posts">bob</a>
      <a href="/u/zed">zed again</a>
      <a href="/m/general">general</a>
    </section>
  </body>
</html>`;

function createScraper(script: Array<ScriptedResponse | Error>, limiter?: RateLimiter) {
  const fetch = scriptedFetch(script);
  const scraper = new ProfilePageScraper({
    webBaseUrl: DEFAULT_TEST_VALUES.webBaseUrl,
    userAgent: DEFAULT_TEST_VALUES.userAgent,
    timeoutMs: 5_000,
    limiter,
    fetch: fetch.fetch,
  });
  return { scraper, calls: fetch.calls };
}

describe('parseProfilePage', () => {
  it('should read the first X link and the similar agents', () => {
    expect(parseProfilePage(PROFILE_HTML, 'alice')).toEqual({
      ownerXHandle: 'OwnerHandle',
      ownerXUrl: 'https://x.com/OwnerHandle?ref=profile',
      similarAgents: ['bob', 'zed'],
    });
  });

  it('should not read profile links outside a similar agents section', () => {
    const html = '<div><a href="/u/bob">bob</a><a href="https://twitter.com/owner">x</a></div>';
    expect(parseProfilePage(html, 'alice')).toEqual({
      ownerXHandle: 'owner',
      ownerXUrl: 'https://twitter.com/owner',
      similarAgents: [],
    });
  });

  it('should return empty results for a page without links', () => {
    expect(parseProfilePage('<p>nothing here</p>', 'alice')).toEqual({
      ownerXHandle: null,
      ownerXUrl: null,
      similarAgents: [],
    });
  });
});

describe('ProfilePageScraper', () => {
  it('should fetch the encoded profile URL as HTML', async () => {
    const { scraper, calls } = createScraper([{ body: PROFILE_HTML }]);

    const profile = await scraper.scrape('alice');

    expect(profile.similarAgents).toEqual(['bob', 'zed']);
    expect(calls[0].url).toBe('https://web.test/u/alice');
    expect(headerOf(calls[0], 'User-Agent')).toBe(DEFAULT_TEST_VALUES.userAgent);
    expect(headerOf(calls[0], 'Accept')).toBe('text/html');
  });

  it('should encode agent names', async () => {
    const { scraper, calls } = createScraper([{ body: '<p></p>' }]);
    await scraper.scrape('some agent');
    expect(calls[0].url).toBe('https://web.test/u/some%20agent');
  });

  it('should raise an HTTP status error for a missing page', async () => {
    const { scraper } = createScraper([{ status: 404, body: 'not found' }]);

    const error = await scraper.scrape('ghost').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(HttpStatusError);
    expect(error).toMatchObject({ status: 404, url: 'https://web.test/u/ghost' });
  });

  it('should wrap network failures', async () => {
    const { scraper } = createScraper([new Error('socket hang up')]);
    await expect(scraper.scrape('alice')).rejects.toBeInstanceOf(TransportError);
  });

  it('should pace page loads through the shared limiter', async () => {
    const time = fakeTime();
    const limiter = new RateLimiter(60, time.sleep, time.clock);
    const { scraper } = createScraper([{ body: '<p></p>' }, { body: '<p></p>' }], limiter);

    await scraper.scrape('a');
    await scraper.scrape('b');

    expect(time.sleeps).toEqual([1_000]);
  });
});
