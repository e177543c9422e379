/**
 * Crawl Orchestrator
 *
 * A single pipeline for both crawl modes. `full` scans every configured view
 * without a time bound; `incremental` scans the incremental views and stops
 * `new`-sorted views at the start time of the previous completed crawl.
 *
 * Every stage is isolated: a failure is logged and recorded in the summary and
 * the run moves on. `close-crawl` always runs.
 */

import { randomUUID } from 'crypto';
import { CrawlConfig, ScanConfig } from '../../core/config.js';
import { describeError } from '../../core/errors.js';
import { Logger, silentLogger } from '../../core/logger.js';
import { CrawlMode, JsonObject, View } from '../../core/types.js';
import { MoltbookClient } from '../api/moltbook-client.js';
import { LIST_KEYS, extractList, readObject, readString } from '../api/response-normalizer.js';
import { EntityExtractor } from '../extract/entity-extractor.js';
import { GraphStore } from '../graph/graph-store.js';
import { GraphWriter } from '../graph/graph-writer.js';
import { mapSubmolt, mapXAccount } from '../graph/row-mappers.js';
import { ScanRequest, TerminalState, ViewScanner } from '../scanner/view-scanner.js';
import { describeView, submoltFeedKey, supportsCutoff, viewKey } from '../scanner/views.js';
import { ScrapedProfile } from '../scrape/profile-page-scraper.js';
import { Clock, realClock } from '../transport/rate-limiter.js';

export type MoltbookApi = Pick<
  MoltbookClient,
  | 'getMe'
  | 'getAgentProfile'
  | 'listSubmolts'
  | 'getSubmolt'
  | 'getModerators'
  | 'getSubmoltFeed'
  | 'listPosts'
  | 'getPost'
  | 'getComments'
  | 'getFeed'
>;

export interface ProfileScraper {
  scrape(agentName: string): Promise<ScrapedProfile>;
}

export const STAGES = [
  'open-crawl',
  'self',
  'seed-submolts',
  'scan-views',
  'submolt-feeds',
  'upsert-discovered',
  'moderators',
  'profiles',
  'feed-snapshot',
  'html-enrichment',
  'close-crawl',
] as const;

export type StageName = (typeof STAGES)[number];

export const SIMILAR_SOURCE_HTML = 'html_profile';

export interface StageReport {
  name: StageName;
  status: 'ok' | 'failed' | 'skipped';
  /** Records written by the stage. */
  records: number;
  /** Per-item failures the stage logged and stepped over. */
  failures: number;
  error?: string;
}

export interface ViewReport {
  key: string;
  state: TerminalState;
  pages: number;
  items: number;
  error?: string;
}

export interface CrawlSummary {
  crawlId: string;
  mode: CrawlMode;
  startedAt: string;
  endedAt: string;
  /** Lower time bound applied to `new` views, if any. */
  since: string | null;
  stages: StageReport[];
  views: ViewReport[];
}

export interface CrawlOrchestratorOptions {
  client: MoltbookApi;
  store: GraphStore;
  scan: ScanConfig;
  crawl: CrawlConfig;
  writer?: GraphWriter;
  scraper?: ProfileScraper;
  clock?: Clock;
  logger?: Logger;
  generateId?: () => string;
}

export interface RunOptions {
  /** Reuse an existing crawl id to resume from its checkpoints. */
  crawlId?: string;
}

// Mutable state of one run
interface RunContext {
  crawlId: string;
  mode: CrawlMode;
  observedAt: string;
  since: string | null;
  extractor: EntityExtractor;
  seenPostIds: Set<string>;
  commentedPostIds: Set<string>;
  commentCache: Map<string, JsonObject[]>;
  seededSubmolts: string[];
  stages: StageReport[];
  views: ViewReport[];
}

// Result of a stage body; `null` marks the stage as disabled by configuration
type StageOutcome = { records: number; failures?: number } | null;

const PROGRESS_EVERY = 100;

function unique(names: string[]): string[] {
  return [...new Set(names)];
}

/** First `limit` items; 0 means no cap. */
function cap<T>(items: T[], limit: number): T[] {
  return limit > 0 ? items.slice(0, limit) : items;
}

export class CrawlOrchestrator {
  private readonly client: MoltbookApi;
  private readonly store: GraphStore;
  private readonly writer: GraphWriter;
  private readonly scanConfig: ScanConfig;
  private readonly crawl: CrawlConfig;
  private readonly scraper: ProfileScraper | null;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly generateId: () => string;

  constructor(options: CrawlOrchestratorOptions) {
    this.client = options.client;
    this.store = options.store;
    this.writer = options.writer ?? new GraphWriter(options.store);
    this.scanConfig = options.scan;
    this.crawl = options.crawl;
    this.scraper = options.scraper ?? null;
    this.clock = options.clock ?? realClock;
    this.logger = options.logger ?? silentLogger;
    this.generateId = options.generateId ?? randomUUID;
  }

  async run(mode: CrawlMode, options: RunOptions = {}): Promise<CrawlSummary> {
    const startedAt = this.now();
    const ctx: RunContext = {
      crawlId: options.crawlId ?? `${mode}:${this.generateId()}`,
      mode,
      observedAt: startedAt,
      since: null,
      extractor: new EntityExtractor(),
      seenPostIds: new Set(),
      commentedPostIds: new Set(),
      commentCache: new Map(),
      seededSubmolts: [],
      stages: [],
      views: [],
    };
    this.logger.info(`starting ${mode} crawl crawl_id=${ctx.crawlId}`);

    await this.runStage(ctx, 'open-crawl', () => this.openCrawl(ctx, startedAt));
    await this.runStage(ctx, 'self', () => this.upsertSelf(ctx));
    await this.runStage(ctx, 'seed-submolts', () => this.seedSubmolts(ctx));
    await this.runStage(ctx, 'scan-views', () => this.scanViews(ctx));
    await this.runStage(ctx, 'submolt-feeds', () => this.scanSubmoltFeeds(ctx));
    await this.runStage(ctx, 'upsert-discovered', () => this.upsertDiscovered(ctx));
    await this.runStage(ctx, 'moderators', () => this.refreshModerators(ctx));
    await this.runStage(ctx, 'profiles', () => this.refreshProfiles(ctx));
    await this.runStage(ctx, 'feed-snapshot', () => this.snapshotFeed(ctx));
    await this.runStage(ctx, 'html-enrichment', () => this.enrichFromHtml(ctx));

    const endedAt = this.now();
    await this.runStage(ctx, 'close-crawl', async () => {
      await this.store.endCrawl(ctx.crawlId, endedAt);
      return { records: 1 };
    });

    this.logger.info(`${mode} crawl done crawl_id=${ctx.crawlId} since=${ctx.since ?? '-'}`);
    return {
      crawlId: ctx.crawlId,
      mode,
      startedAt,
      endedAt,
      since: ctx.since,
      stages: ctx.stages,
      views: ctx.views,
    };
  }

  // === STAGES ===

  private async openCrawl(ctx: RunContext, startedAt: string): Promise<StageOutcome> {
    ctx.since = ctx.mode === 'incremental' ? await this.store.getLatestCrawlCutoff() : null;
    await this.store.beginCrawl(ctx.crawlId, ctx.mode, startedAt, ctx.since);
    return { records: 1 };
  }

  private async upsertSelf(ctx: RunContext): Promise<StageOutcome> {
    const me = await this.client.getMe();
    const name = readString(me, 'name');
    if (name) this.logger.child('self').info(`authenticated as ${name}`);
    return { records: await this.writer.upsertAgents([me], ctx.observedAt) };
  }

  private async seedSubmolts(ctx: RunContext): Promise<StageOutcome> {
    if (this.crawl.submoltTopLimit <= 0) return null;
    const log = this.logger.child('submolts');

    const page = await this.client.listSubmolts({ sort: 'popular', limit: this.crawl.submoltTopLimit, offset: 0 });
    let records = await this.writer.upsertSubmolts(page.items, ctx.observedAt);
    ctx.seededSubmolts = unique(
      page.items.map(item => mapSubmolt(item)?.name).filter((name): name is string => name !== undefined)
    );
    log.info(`refreshed top slice: ${ctx.seededSubmolts.length}`);

    if (!this.crawl.enrichSubmolts) return { records };

    let failures = 0;
    const names = cap(ctx.seededSubmolts, this.crawl.enrichSubmoltsLimit);
    for (const name of names) {
      try {
        const detail = await this.client.getSubmolt(name);
        records += await this.writer.upsertSubmolts([{ name, ...detail }], ctx.observedAt);
      } catch (error) {
        failures++;
        log.warn(`detail fetch failed for ${name}`, error);
      }
    }
    log.info(`enriched ${names.length - failures}/${names.length} submolts`);
    return { records, failures };
  }

  private async scanViews(ctx: RunContext): Promise<StageOutcome> {
    const views: View[] = ctx.mode === 'full' ? this.crawl.views : this.crawl.incrementalViews;
    const log = this.logger.child('posts');
    const scanner = new ViewScanner(this.scanConfig, this.store, ctx.crawlId, ctx.seenPostIds, log);

    let records = 0;
    for (const view of views) {
      log.info(`view ${describeView(view)}`);
      records += await this.scanOne(ctx, scanner, {
        key: viewKey(view),
        fetchPage: (offset, limit) => this.client.listPosts({ sort: view.sort, time: view.time, limit, offset }),
        handlePage: items => this.processPostPage(ctx, items),
        cutoff: supportsCutoff(view) ? ctx.since : null,
      });
    }
    return { records };
  }

  private async scanSubmoltFeeds(ctx: RunContext): Promise<StageOutcome> {
    const { crawlSubmoltFeeds, submoltFeedMaxPages, submoltFeedSort, submoltFeedLimit } = this.crawl;
    if (!crawlSubmoltFeeds || submoltFeedMaxPages <= 0) return null;
    const log = this.logger.child('submolt-feed');
    const scanner = new ViewScanner(this.scanConfig, this.store, ctx.crawlId, ctx.seenPostIds, log);

    const names = cap(ctx.extractor.submoltNames(), submoltFeedLimit);
    log.info(`crawling feeds for ${names.length} submolts (pages=${submoltFeedMaxPages}, sort=${submoltFeedSort})`);

    let records = 0;
    for (const name of names) {
      records += await this.scanOne(ctx, scanner, {
        key: submoltFeedKey(name),
        fetchPage: (offset, limit) => this.client.getSubmoltFeed(name, { sort: submoltFeedSort, limit, offset }),
        handlePage: async items => {
          await this.writer.upsertPosts(items, ctx.observedAt);
          ctx.extractor.observePosts(items);
        },
        cutoff: submoltFeedSort === 'new' ? ctx.since : null,
        maxPages: submoltFeedMaxPages,
      });
    }
    return { records };
  }

  private async upsertDiscovered(ctx: RunContext): Promise<StageOutcome> {
    const records = await this.writer.upsertSubmolts(ctx.extractor.submolts(), ctx.observedAt);
    this.logger.child('submolts').info(`upserted discovered from posts: ${records}`);
    return { records };
  }

  private async refreshModerators(ctx: RunContext): Promise<StageOutcome> {
    if (!this.crawl.refreshModerators || this.crawl.moderatorSubmoltsLimit <= 0) return null;
    const log = this.logger.child('mods');
    const names = unique([...ctx.extractor.submoltNames(), ...ctx.seededSubmolts]).slice(
      0,
      this.crawl.moderatorSubmoltsLimit
    );
    log.info(`refreshing moderators for ${names.length} submolts (limit=${this.crawl.moderatorSubmoltsLimit})`);

    let records = 0;
    let failures = 0;
    for (const [index, name] of names.entries()) {
      try {
        const entries = await this.client.getModerators(name);
        // An empty list says nothing about who stopped moderating
        if (entries.length > 0) {
          const observed = ctx.extractor.observeModerators(entries);
          records += await this.writer.reconcileModerators(name, entries, ctx.observedAt);
          await this.writer.upsertAgents(observed.agents, ctx.observedAt);
        }
      } catch (error) {
        failures++;
        log.warn(`moderators failed for ${name}`, error);
      }
      if ((index + 1) % PROGRESS_EVERY === 0) log.info(`processed ${index + 1}/${names.length}`);
    }
    return { records, failures };
  }

  private async refreshProfiles(ctx: RunContext): Promise<StageOutcome> {
    if (!this.crawl.fetchAgentProfiles) return null;
    const log = this.logger.child('agents');

    const fresh = cap(ctx.extractor.agentNames().sort(), this.crawl.profileLimit);
    const stale = await this.store.getAgentsNeedingProfileRefresh(
      this.crawl.profileRefreshDays,
      this.crawl.profileRefreshLimit,
      this.now()
    );
    const names = unique([...fresh, ...stale]);
    log.info(`fetching profiles for ${names.length} agents (new=${fresh.length}, stale=${stale.length})`);

    let records = 0;
    let failures = 0;
    for (const [index, name] of names.entries()) {
      try {
        const agent = await this.client.getAgentProfile(name);
        const profile: JsonObject = { ...agent, name: readString(agent, 'name') ?? name };
        records += await this.writer.upsertAgents([profile], ctx.observedAt, { markProfile: true });

        const owner = readObject(agent, 'owner');
        const account = owner ? mapXAccount(owner) : null;
        if (account) {
          await this.writer.upsertOwnerAccount(name, account, ctx.observedAt);
        }
      } catch (error) {
        failures++;
        log.warn(`profile failed for ${name}`, error);
      }
      if ((index + 1) % (PROGRESS_EVERY * 2) === 0) log.info(`profiled ${index + 1}/${names.length}`);
    }
    return { records, failures };
  }

  private async snapshotFeed(ctx: RunContext): Promise<StageOutcome> {
    if (!this.crawl.feedSnapshot) return null;
    const { feedSnapshotSort: sort, feedSnapshotLimit: limit } = this.crawl;
    const page = await this.client.getFeed({ sort, limit, offset: 0 });
    const records = await this.writer.writeFeedSnapshot(ctx.crawlId, sort, page.items, ctx.observedAt);
    this.logger.child('feed').info(`snapshot ${ctx.crawlId}:${sort} posts=${records}`);
    return { records };
  }

  private async enrichFromHtml(ctx: RunContext): Promise<StageOutcome> {
    if (!this.crawl.scrapeAgentHtml || !this.scraper) return null;
    const log = this.logger.child('html');
    const names = ctx.extractor.agentNames().sort();
    log.info(`scraping ${names.length} agents`);

    let records = 0;
    let failures = 0;
    for (const name of names) {
      try {
        const info = await this.scraper.scrape(name);
        const account = info.ownerXHandle
          ? mapXAccount({ x_handle: info.ownerXHandle, x_url: info.ownerXUrl })
          : null;
        if (account) {
          await this.writer.upsertOwnerAccount(name, account, ctx.observedAt);
          records++;
        }
        // A page without the section is not evidence that the list emptied
        if (info.similarAgents.length > 0) {
          records += await this.writer.reconcileSimilarAgents(
            name,
            info.similarAgents,
            SIMILAR_SOURCE_HTML,
            ctx.observedAt
          );
        }
      } catch (error) {
        failures++;
        log.warn(`scrape failed for ${name}`, error);
      }
    }
    return { records, failures };
  }

  // === PAGE PROCESSING ===

  /**
   * Write one page of a post view: optional detail fetch, post upsert, then the
   * comment tree of each post not yet handled in this run.
   */
  private async processPostPage(ctx: RunContext, items: JsonObject[]): Promise<void> {
    const posts = this.crawl.fetchPostDetails ? await this.fetchDetails(ctx, items) : items;
    await this.writer.upsertPosts(posts, ctx.observedAt);
    ctx.extractor.observePosts(posts);

    if (!this.crawl.crawlComments) return;
    for (const post of posts) {
      const id = readString(post, 'id');
      if (!id || ctx.commentedPostIds.has(id)) continue;

      let tree = ctx.commentCache.get(id) ?? null;
      ctx.commentCache.delete(id);
      if (!tree) {
        try {
          tree = await this.client.getComments(id, { sort: 'new', limit: this.crawl.commentsLimitPerPost });
        } catch (error) {
          this.logger.child('comments').warn(`comments fetch failed for post ${id}`, error);
        }
      }
      ctx.commentedPostIds.add(id);

      if (tree && tree.length > 0) {
        await this.writer.upsertComments(id, tree, ctx.observedAt);
        ctx.extractor.observeComments(tree);
      }
    }
  }

  /** Replace list items by their detail payload; the list item stays when the fetch fails. */
  private async fetchDetails(ctx: RunContext, items: JsonObject[]): Promise<JsonObject[]> {
    const cacheTrees = this.crawl.crawlComments && this.crawl.commentsFromPostDetails;
    const detailed: JsonObject[] = [];
    for (const item of items) {
      const id = readString(item, 'id');
      if (!id) continue;
      try {
        const detail = await this.client.getPost(id);
        detailed.push(Object.keys(detail).length > 0 ? detail : item);
        if (cacheTrees && !ctx.commentedPostIds.has(id)) {
          const tree = extractList(detail.comments ?? [], LIST_KEYS.comments);
          if (tree.length > 0) ctx.commentCache.set(id, tree);
        }
      } catch (error) {
        this.logger.child('posts').warn(`detail fetch failed for post ${id}`, error);
        detailed.push(item);
      }
    }
    return detailed;
  }

  // === HELPERS ===

  private async scanOne(ctx: RunContext, scanner: ViewScanner, request: ScanRequest): Promise<number> {
    const result = await scanner.scan(request);
    ctx.views.push({
      key: request.key,
      state: result.state,
      pages: result.pages,
      items: result.itemsProcessed,
      error: result.error ? describeError(result.error) : undefined,
    });
    return result.itemsProcessed;
  }

  private async runStage(ctx: RunContext, name: StageName, body: () => Promise<StageOutcome>): Promise<void> {
    try {
      const outcome = await body();
      ctx.stages.push(
        outcome
          ? { name, status: 'ok', records: outcome.records, failures: outcome.failures ?? 0 }
          : { name, status: 'skipped', records: 0, failures: 0 }
      );
    } catch (error) {
      this.logger.error(`stage ${name} failed`, error);
      ctx.stages.push({ name, status: 'failed', records: 0, failures: 0, error: describeError(error) });
    }
  }

  private now(): string {
    return new Date(this.clock()).toISOString();
  }
}
