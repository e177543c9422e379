/**
 * Moltbook API client
 *
 * One method per upstream endpoint. Listing endpoints are called without
 * credentials first (the authenticated variants tend to return personalized or
 * cached first pages) and retried once with the bearer token on a 401.
 */

import { AuthRequiredError } from '../../core/errors.js';
import { HttpMethod, JsonObject, JsonValue, QueryParams } from '../../core/types.js';
import { HttpTransport } from '../transport/http-transport.js';
import { Clock, realClock } from '../transport/rate-limiter.js';
import { LIST_KEYS, OBJECT_KEYS, PageInfo, extractList, extractObject, readPageInfo } from './response-normalizer.js';

export interface Page {
  items: JsonObject[];
  hasMore: PageInfo['hasMore'];
  nextOffset: PageInfo['nextOffset'];
}

export interface ListPostsParams {
  sort?: string;
  limit?: number;
  offset?: number;
  time?: string | null;
  submolt?: string | null;
}

export interface PageParams {
  sort?: string;
  limit?: number;
  offset?: number;
}

export class MoltbookClient {
  constructor(
    private readonly transport: HttpTransport,
    private readonly clock: Clock = realClock
  ) {}

  // === AGENTS ===

  async getMe(): Promise<JsonObject> {
    const resp = await this.transport.send('GET', '/agents/me', {}, true);
    return extractObject(resp, OBJECT_KEYS.agent);
  }

  /** Returns the agent object of the profile envelope (`{ agent, recentPosts, ... }`). */
  async getAgentProfile(name: string): Promise<JsonObject> {
    const resp = await this.publicFirst('GET', '/agents/profile', { name });
    return extractObject(resp, OBJECT_KEYS.agent);
  }

  // === SUBMOLTS ===

  async listSubmolts(params: PageParams = {}): Promise<Page> {
    const resp = await this.publicFirst('GET', '/submolts', {
      sort: params.sort ?? 'popular',
      limit: params.limit ?? 100,
      offset: params.offset ?? 0,
    });
    return toPage(resp, LIST_KEYS.submolts);
  }

  async getSubmolt(name: string): Promise<JsonObject> {
    const resp = await this.publicFirst('GET', `/submolts/${encodeURIComponent(name)}`);
    return extractObject(resp, OBJECT_KEYS.submolt);
  }

  async getModerators(name: string): Promise<JsonObject[]> {
    const resp = await this.publicFirst('GET', `/submolts/${encodeURIComponent(name)}/moderators`);
    return extractList(resp, LIST_KEYS.moderators);
  }

  async getSubmoltFeed(name: string, params: PageParams = {}): Promise<Page> {
    const resp = await this.publicFirst('GET', `/submolts/${encodeURIComponent(name)}/feed`, {
      sort: params.sort ?? 'new',
      limit: params.limit ?? 50,
      offset: params.offset ?? 0,
    });
    return toPage(resp, LIST_KEYS.posts);
  }

  // === POSTS / COMMENTS ===

  async listPosts(params: ListPostsParams = {}): Promise<Page> {
    const resp = await this.publicFirst('GET', '/posts', {
      sort: params.sort ?? 'new',
      limit: params.limit ?? 50,
      offset: params.offset ?? 0,
      time: params.time ?? undefined,
      submolt: params.submolt ?? undefined,
    });
    return toPage(resp, LIST_KEYS.posts);
  }

  async getPost(id: string): Promise<JsonObject> {
    const resp = await this.publicFirst('GET', `/posts/${encodeURIComponent(id)}`);
    return extractObject(resp, OBJECT_KEYS.post);
  }

  /** The endpoint answers with a bare array of root comments, each carrying nested `replies`. */
  async getComments(postId: string, params: { sort?: string; limit?: number } = {}): Promise<JsonObject[]> {
    const resp = await this.publicFirst('GET', `/posts/${encodeURIComponent(postId)}/comments`, {
      sort: params.sort ?? 'new',
      limit: params.limit ?? 200,
    });
    return extractList(resp, LIST_KEYS.comments);
  }

  // === PERSONALIZED FEED ===

  async getFeed(params: PageParams = {}): Promise<Page> {
    const resp = await this.transport.send(
      'GET',
      '/feed',
      { sort: params.sort ?? 'hot', limit: params.limit ?? 100, offset: params.offset ?? 0 },
      true
    );
    return toPage(resp, LIST_KEYS.posts);
  }

  /**
   * Anonymous request with a cache-busting parameter; on 401 the same call is
   * repeated once with credentials.
   */
  private async publicFirst(method: HttpMethod, path: string, params: QueryParams = {}): Promise<JsonValue> {
    try {
      return await this.transport.send(method, path, { ...params, shuffle: this.clock() }, false);
    } catch (error) {
      if (error instanceof AuthRequiredError) {
        return this.transport.send(method, path, params, true);
      }
      throw error;
    }
  }
}

function toPage(resp: JsonValue, keys: readonly string[]): Page {
  const { hasMore, nextOffset } = readPageInfo(resp);
  return { items: extractList(resp, keys), hasMore, nextOffset };
}
