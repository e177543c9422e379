/**
 * Agent profile page scraper
 *
 * Reads what the JSON API does not expose from the public `/u/<name>` page: the
 * owner's X link and the "Similar Agents" list. Page markup is not a contract,
 * so this stays behind SCRAPE_AGENT_HTML.
 */

import { parse } from 'node-html-parser';
import { HttpStatusError, TransportError } from '../../core/errors.js';
import { FetchFn } from '../transport/http-transport.js';
import { RateLimiter } from '../transport/rate-limiter.js';

export interface ScrapedProfile {
  ownerXHandle: string | null;
  ownerXUrl: string | null;
  /** Sorted, unique, never the agent itself. */
  similarAgents: string[];
}

export interface ProfilePageScraperOptions {
  webBaseUrl: string;
  userAgent: string;
  timeoutMs: number;
  /** Shared with the API transport so page loads count against the same budget. */
  limiter?: RateLimiter;
  fetch?: FetchFn;
}

const X_LINK = /(?:x\.com|twitter\.com)\/([^/?#]+)/;

/** Extract owner link and similar agents from profile page HTML. */
export function parseProfilePage(html: string, agentName: string): ScrapedProfile {
  const root = parse(html);
  const hrefs = root
    .querySelectorAll('a')
    .map(a => a.getAttribute('href'))
    .filter((href): href is string => typeof href === 'string' && href !== '');

  let ownerXHandle: string | null = null;
  let ownerXUrl: string | null = null;
  for (const href of hrefs) {
    const match = X_LINK.exec(href);
    if (match) {
      ownerXHandle = match[1];
      ownerXUrl = href;
      break;
    }
  }

  const similar = new Set<string>();
  if (root.textContent.includes('Similar Agents')) {
    const self = agentName.toLowerCase();
    for (const href of hrefs) {
      if (!href.startsWith('/u/')) continue;
      const name = href.slice('/u/'.length).split('/')[0];
      if (name && name.toLowerCase() !== self) similar.add(name);
    }
  }

  return { ownerXHandle, ownerXUrl, similarAgents: [...similar].sort() };
}

export class ProfilePageScraper {
  private readonly fetchFn: FetchFn;

  constructor(private readonly options: ProfilePageScraperOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async scrape(agentName: string): Promise<ScrapedProfile> {
    const url = `${this.options.webBaseUrl}/u/${encodeURIComponent(agentName)}`;
    await this.options.limiter?.acquire();

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: 'GET',
        headers: { 'User-Agent': this.options.userAgent, Accept: 'text/html' },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new TransportError(`Request to ${url} failed`, url, { cause: error });
    }

    const body = await response.text();
    if (!response.ok) {
      throw new HttpStatusError(response.status, url, body);
    }
    return parseProfilePage(body, agentName);
  }
}
