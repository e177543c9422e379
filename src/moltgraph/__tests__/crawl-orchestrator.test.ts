import { describe, it, expect, beforeEach, vi } from 'vitest';
import { CrawlConfig } from '../core/config.js';
import { JsonObject } from '../core/types.js';
import { ListPostsParams, Page, PageParams } from '../lib/api/moltbook-client.js';
import { CrawlOrchestrator, MoltbookApi, ProfileScraper, SIMILAR_SOURCE_HTML } from '../lib/crawl/crawl-orchestrator.js';
import { GraphWriter } from '../lib/graph/graph-writer.js';
import { MemoryGraphStore } from '../lib/graph/memory-graph-store.js';
import { ScrapedProfile } from '../lib/scrape/profile-page-scraper.js';
import { createCommentPayload, createCrawlConfig, createPostPayload, createScanConfig } from './test-helpers.js';

const NOW = '2024-01-20T10:00:00.000Z';

function page(items: JsonObject[], hasMore: boolean | null = false): Page {
  return { items, hasMore, nextOffset: null };
}

/** In-memory stand-in for the Moltbook API; every call is recorded. */
class FakeApi implements MoltbookApi {
  me: JsonObject = { name: 'self-agent' };
  postPages = new Map<string, Page[]>();
  submoltList: JsonObject[] = [];
  submoltDetails = new Map<string, JsonObject>();
  moderators = new Map<string, JsonObject[]>();
  profiles = new Map<string, JsonObject>();
  submoltFeeds = new Map<string, Page[]>();
  details = new Map<string, JsonObject>();
  comments = new Map<string, JsonObject[]>();
  feed: JsonObject[] = [];
  readonly calls: string[] = [];

  async getMe(): Promise<JsonObject> {
    this.calls.push('getMe');
    return this.me;
  }

  async getAgentProfile(name: string): Promise<JsonObject> {
    this.calls.push(`getAgentProfile ${name}`);
    return this.profiles.get(name) ?? { name };
  }

  async listSubmolts(params: PageParams = {}): Promise<Page> {
    this.calls.push(`listSubmolts ${params.sort}:${params.limit}@${params.offset}`);
    return page(this.submoltList);
  }

  async getSubmolt(name: string): Promise<JsonObject> {
    this.calls.push(`getSubmolt ${name}`);
    const detail = this.submoltDetails.get(name);
    if (!detail) throw new Error(`no submolt ${name}`);
    return detail;
  }

  async getModerators(name: string): Promise<JsonObject[]> {
    this.calls.push(`getModerators ${name}`);
    return this.moderators.get(name) ?? [];
  }

  async getSubmoltFeed(name: string, params: PageParams = {}): Promise<Page> {
    this.calls.push(`getSubmoltFeed ${name} ${params.sort}@${params.offset}`);
    return this.submoltFeeds.get(name)?.shift() ?? page([]);
  }

  async listPosts(params: ListPostsParams = {}): Promise<Page> {
    const view = `${params.sort}:${params.time ?? 'na'}`;
    this.calls.push(`listPosts ${view}@${params.offset}`);
    return this.postPages.get(view)?.shift() ?? page([]);
  }

  async getPost(id: string): Promise<JsonObject> {
    this.calls.push(`getPost ${id}`);
    return this.details.get(id) ?? {};
  }

  async getComments(postId: string): Promise<JsonObject[]> {
    this.calls.push(`getComments ${postId}`);
    return this.comments.get(postId) ?? [];
  }

  async getFeed(params: PageParams = {}): Promise<Page> {
    this.calls.push(`getFeed ${params.sort}:${params.limit}@${params.offset}`);
    return page(this.feed);
  }

  callsTo(method: string): string[] {
    return this.calls.filter(call => call.startsWith(`${method} `));
  }
}

class FakeScraper implements ProfileScraper {
  readonly pages = new Map<string, ScrapedProfile>();
  readonly scraped: string[] = [];

  async scrape(agentName: string): Promise<ScrapedProfile> {
    this.scraped.push(agentName);
    return this.pages.get(agentName) ?? { ownerXHandle: null, ownerXUrl: null, similarAgents: [] };
  }
}

describe('CrawlOrchestrator', () => {
  let api: FakeApi;
  let store: MemoryGraphStore;

  beforeEach(() => {
    api = new FakeApi();
    store = new MemoryGraphStore();
  });

  function createOrchestrator(crawl: Partial<CrawlConfig> = {}, scraper?: ProfileScraper) {
    return new CrawlOrchestrator({
      client: api,
      store,
      scan: createScanConfig(),
      crawl: createCrawlConfig(crawl),
      scraper,
      clock: () => Date.parse(NOW),
      generateId: () => 'run-1',
    });
  }

  describe('full crawl', () => {
    beforeEach(() => {
      api.postPages.set('new:na', [page([createPostPayload('p1'), createPostPayload('p2')])]);
      api.comments.set('p1', [createCommentPayload('c1', {}, [createCommentPayload('c2', { author: { name: 'carol' } })])]);
    });

    it('should run every stage and report what it wrote', async () => {
      const summary = await createOrchestrator({ crawlComments: true }).run('full');

      expect(summary).toMatchObject({ crawlId: 'full:run-1', mode: 'full', startedAt: NOW, endedAt: NOW, since: null });
      expect(summary.stages.map(stage => [stage.name, stage.status, stage.records])).toEqual([
        ['open-crawl', 'ok', 1],
        ['self', 'ok', 1],
        ['seed-submolts', 'skipped', 0],
        ['scan-views', 'ok', 2],
        ['submolt-feeds', 'skipped', 0],
        ['upsert-discovered', 'ok', 1],
        ['moderators', 'skipped', 0],
        ['profiles', 'skipped', 0],
        ['feed-snapshot', 'skipped', 0],
        ['html-enrichment', 'skipped', 0],
        ['close-crawl', 'ok', 1],
      ]);
      expect(summary.views).toEqual([{ key: 'posts_offset_new_na', state: 'Exhausted', pages: 1, items: 2 }]);
    });

    it('should write posts, comments and the crawl record', async () => {
      await createOrchestrator({ crawlComments: true }).run('full');

      expect(store.getNode('Crawl', 'full:run-1')).toMatchObject({ mode: 'full', started_at: NOW, ended_at: NOW });
      expect(store.listNodes('Post').map(node => node.key)).toEqual(['p1', 'p2']);
      expect(store.listEdges('REPLY_TO').map(edge => [edge.from.key, edge.to.key])).toEqual([['c2', 'c1']]);
      expect(store.getNode('Agent', 'self-agent')).toBeDefined();
      expect(store.getNode('Submolt', 'general')).toMatchObject({ id: 'sub-general' });
      expect(api.callsTo('getComments')).toEqual(['getComments p1', 'getComments p2']);
    });

    it('should skip comments when comment crawling is off', async () => {
      await createOrchestrator().run('full');

      expect(api.callsTo('getComments')).toEqual([]);
      expect(store.listNodes('Comment')).toEqual([]);
    });
  });

  it('should fetch the comments of a post once per run', async () => {
    api.postPages.set('new:na', [page([createPostPayload('p1')])]);
    api.postPages.set('top:day', [page([createPostPayload('p1'), createPostPayload('p2')])]);

    await createOrchestrator({
      crawlComments: true,
      views: [
        { sort: 'new', time: null },
        { sort: 'top', time: 'day' },
      ],
    }).run('full');

    expect(api.callsTo('getComments')).toEqual(['getComments p1', 'getComments p2']);
  });

  it('should use comment trees embedded in post details', async () => {
    api.postPages.set('new:na', [page([createPostPayload('p1')])]);
    api.details.set('p1', {
      ...createPostPayload('p1', { content: 'full body' }),
      comments: [createCommentPayload('c1')],
    });

    await createOrchestrator({ fetchPostDetails: true, crawlComments: true }).run('full');

    expect(api.callsTo('getComments')).toEqual([]);
    expect(store.getNode('Post', 'p1')?.content).toBe('full body');
    expect(store.getNode('Comment', 'c1')).toMatchObject({ post_id: 'p1', depth: 0 });
  });

  it('should keep going when a stage fails', async () => {
    vi.spyOn(api, 'getMe').mockRejectedValue(new Error('unauthorized'));
    api.postPages.set('new:na', [page([createPostPayload('p1')])]);

    const summary = await createOrchestrator().run('full');

    expect(summary.stages.find(stage => stage.name === 'self')).toEqual({
      name: 'self',
      status: 'failed',
      records: 0,
      failures: 0,
      error: 'unauthorized',
    });
    expect(summary.stages.find(stage => stage.name === 'scan-views')?.records).toBe(1);
    expect(store.getNode('Crawl', 'full:run-1')?.ended_at).toBe(NOW);
  });

  it('should resume a crawl from its checkpoints', async () => {
    await store.beginCrawl('full:resume', 'full', '2024-01-20T09:00:00.000Z', null);
    await store.setCheckpoint('full:resume', 'posts_offset_new_na', 2);
    api.postPages.set('new:na', [page([createPostPayload('p3')])]);

    const summary = await createOrchestrator().run('full', { crawlId: 'full:resume' });

    expect(summary.crawlId).toBe('full:resume');
    expect(api.callsTo('listPosts')).toEqual(['listPosts new:na@2']);
    expect(store.getNode('Crawl', 'full:resume')?.started_at).toBe('2024-01-20T09:00:00.000Z');
  });

  describe('incremental crawl', () => {
    const previousStart = '2024-01-19T00:00:00.000Z';

    beforeEach(async () => {
      await store.beginCrawl('full:old', 'full', previousStart, null);
      await store.endCrawl('full:old', '2024-01-19T02:00:00.000Z');
    });

    it('should stop new posts at the start of the previous completed crawl', async () => {
      api.postPages.set('new:na', [
        page([createPostPayload('p-new'), createPostPayload('p-old', { created_at: '2024-01-18T00:00:00.000Z' })], true),
      ]);

      const summary = await createOrchestrator().run('incremental');

      expect(summary.since).toBe(previousStart);
      expect(summary.views).toEqual([{ key: 'posts_offset_new_na', state: 'CutoffReached', pages: 1, items: 1 }]);
      expect(store.getNode('Post', 'p-new')).toBeDefined();
      expect(store.getNode('Post', 'p-old')).toBeUndefined();
      expect(store.getNode('Crawl', 'incremental:run-1')).toMatchObject({ since: previousStart, cutoff: NOW });
    });

    it('should scan only the incremental views', async () => {
      await createOrchestrator({
        views: [{ sort: 'top', time: 'all' }],
        incrementalViews: [{ sort: 'hot', time: null }],
      }).run('incremental');

      expect(api.callsTo('listPosts')).toEqual(['listPosts hot:na@0']);
    });
  });

  it('should seed and enrich top submolts, counting detail failures', async () => {
    api.submoltList = [{ name: 'general' }, { name: 'news' }];
    api.submoltDetails.set('general', { display_name: 'General' });

    const summary = await createOrchestrator({ submoltTopLimit: 5, enrichSubmolts: true }).run('full');

    expect(summary.stages.find(stage => stage.name === 'seed-submolts')).toEqual({
      name: 'seed-submolts',
      status: 'ok',
      records: 3,
      failures: 1,
    });
    expect(api.callsTo('listSubmolts')).toEqual(['listSubmolts popular:5@0']);
    expect(store.getNode('Submolt', 'general')?.display_name).toBe('General');
  });

  it('should crawl submolt feeds of discovered submolts', async () => {
    api.postPages.set('new:na', [page([createPostPayload('p1')])]);
    api.submoltFeeds.set('general', [page([createPostPayload('s1')], true)]);

    const summary = await createOrchestrator({ crawlSubmoltFeeds: true, submoltFeedMaxPages: 1 }).run('full');

    expect(summary.views[1]).toEqual({ key: 'submolt_feed_offset_general', state: 'PageCapReached', pages: 1, items: 1 });
    expect(api.callsTo('getSubmoltFeed')).toEqual(['getSubmoltFeed general new@0']);
    expect(store.getNode('Post', 's1')).toBeDefined();
  });

  describe('moderators', () => {
    it('should reconcile non-empty lists and leave empty ones alone', async () => {
      api.postPages.set('new:na', [
        page([createPostPayload('p1'), createPostPayload('p2', { submolt: { name: 'news' } })]),
      ]);
      api.moderators.set('general', [{ name: 'mod-a', display_name: 'Mod A' }]);
      await new GraphWriter(store).reconcileModerators('news', [{ name: 'old-mod' }], '2024-01-01T00:00:00.000Z');

      const summary = await createOrchestrator({ refreshModerators: true, moderatorSubmoltsLimit: 10 }).run('full');

      expect(summary.stages.find(stage => stage.name === 'moderators')).toMatchObject({ status: 'ok', records: 1 });
      expect(api.callsTo('getModerators')).toEqual(['getModerators general', 'getModerators news']);
      const open = store.listEdges('MODERATES').filter(edge => edge.props.ended_at === undefined);
      expect(open.map(edge => [edge.from.key, edge.to.key])).toEqual([
        ['old-mod', 'news'],
        ['mod-a', 'general'],
      ]);
      expect(store.getNode('Agent', 'mod-a')?.display_name).toBe('Mod A');
    });
  });

  describe('profiles', () => {
    beforeEach(() => {
      api.postPages.set('new:na', [page([createPostPayload('p1')])]);
      api.profiles.set('alice', {
        name: 'alice',
        karma: 10,
        owner: { x_handle: '@AliceOwner', x_name: 'Alice Owner' },
      });
    });

    it('should fetch discovered agents and link their owner account', async () => {
      const summary = await createOrchestrator({ fetchAgentProfiles: true }).run('full');

      expect(summary.stages.find(stage => stage.name === 'profiles')).toMatchObject({ status: 'ok', records: 1 });
      expect(store.getNode('Agent', 'alice')).toMatchObject({ karma: 10, profile_last_fetched_at: NOW });
      expect(store.getNode('XAccount', 'aliceowner')).toMatchObject({
        url: 'https://x.com/aliceowner',
        name: 'Alice Owner',
      });
      expect(store.listEdges('HAS_OWNER_X').map(edge => [edge.from.key, edge.to.key])).toEqual([['alice', 'aliceowner']]);
    });

    it('should add agents whose profile is missing or stale', async () => {
      await new GraphWriter(store).upsertAgents([{ name: 'zoe' }], '2024-01-01T00:00:00.000Z');

      await createOrchestrator({ fetchAgentProfiles: true, profileRefreshLimit: 10 }).run('full');

      expect(api.callsTo('getAgentProfile')).toEqual([
        'getAgentProfile alice',
        'getAgentProfile self-agent',
        'getAgentProfile zoe',
      ]);
    });
  });

  it('should snapshot the personalized feed', async () => {
    api.feed = [createPostPayload('f1'), createPostPayload('f2')];

    const summary = await createOrchestrator({ feedSnapshot: true, feedSnapshotLimit: 2 }).run('full');

    expect(summary.stages.find(stage => stage.name === 'feed-snapshot')?.records).toBe(2);
    expect(api.callsTo('getFeed')).toEqual(['getFeed hot:2@0']);
    expect(store.getNode('FeedSnapshot', 'full:run-1:hot')).toMatchObject({ observed_at: NOW });
  });

  describe('html enrichment', () => {
    beforeEach(() => {
      api.postPages.set('new:na', [page([createPostPayload('p1')])]);
    });

    it('should record owner links and similar agents from profile pages', async () => {
      const scraper = new FakeScraper();
      scraper.pages.set('alice', {
        ownerXHandle: 'AliceOwner',
        ownerXUrl: 'https://x.com/AliceOwner',
        similarAgents: ['bob', 'carol'],
      });

      const summary = await createOrchestrator({ scrapeAgentHtml: true }, scraper).run('full');

      expect(scraper.scraped).toEqual(['alice']);
      expect(summary.stages.find(stage => stage.name === 'html-enrichment')?.records).toBe(3);
      expect(store.getNode('XAccount', 'aliceowner')?.url).toBe('https://x.com/AliceOwner');
      expect(
        store.listEdges('SIMILAR_TO').map(edge => [edge.from.key, edge.to.key, edge.props.source])
      ).toEqual([
        ['alice', 'bob', SIMILAR_SOURCE_HTML],
        ['alice', 'carol', SIMILAR_SOURCE_HTML],
      ]);
    });

    it('should be skipped without a scraper', async () => {
      const summary = await createOrchestrator({ scrapeAgentHtml: true }).run('full');
      expect(summary.stages.find(stage => stage.name === 'html-enrichment')?.status).toBe('skipped');
    });
  });
});
