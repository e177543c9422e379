import { promises as fs } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { EnvSchema, Env } from './schemas.js';
import { ConfigurationError } from './errors.js';
import { View } from './types.js';
import { parseViews } from '../lib/scanner/views.js';

// Default location of the JSONL graph snapshot when GRAPH_STORE=jsonl
export const defaultDataDir = path.join(path.dirname(fileURLToPath(import.meta.url)), '..', 'graph-data');

export interface TransportConfig {
  baseUrl: string;
  apiKey: string;
  userAgent: string;
  requestsPerMinute: number;
  maxAttempts: number;
  maxRateLimitWaits: number;
  backoffSeedMs: number;
  backoffCeilingMs: number;
  rateLimitCooldownMs: number;
  timeoutMs: number;
}

export interface ScanConfig {
  pageSize: number;
  maxPages: number;
  staleThreshold: number;
  repeatThreshold: number;
  signatureSize: number;
}

export interface CrawlConfig {
  views: View[];
  incrementalViews: View[];
  fetchPostDetails: boolean;
  crawlComments: boolean;
  commentsFromPostDetails: boolean;
  commentsLimitPerPost: number;
  submoltTopLimit: number;
  enrichSubmolts: boolean;
  enrichSubmoltsLimit: number;
  crawlSubmoltFeeds: boolean;
  submoltFeedMaxPages: number;
  submoltFeedSort: string;
  submoltFeedLimit: number;
  refreshModerators: boolean;
  moderatorSubmoltsLimit: number;
  fetchAgentProfiles: boolean;
  profileLimit: number;
  profileRefreshDays: number;
  profileRefreshLimit: number;
  feedSnapshot: boolean;
  feedSnapshotSort: string;
  feedSnapshotLimit: number;
  scrapeAgentHtml: boolean;
}

export type StoreConfig =
  | { kind: 'neo4j'; uri: string; username: string; password: string; database?: string }
  | { kind: 'jsonl'; dataDir: string };

export interface CrawlerConfig {
  transport: TransportConfig;
  scan: ScanConfig;
  crawl: CrawlConfig;
  store: StoreConfig;
  webBaseUrl: string;
  crawlId?: string;
}

/**
 * Validate environment variables and build the crawler configuration.
 * Empty strings count as unset. Throws ConfigurationError listing every problem.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value.trim();
    }
  }

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return buildConfig(parsed.data);
}

function buildConfig(env: Env): CrawlerConfig {
  return {
    transport: {
      baseUrl: env.MOLTBOOK_BASE_URL.replace(/\/+$/, ''),
      apiKey: env.MOLTBOOK_API_KEY,
      userAgent: env.USER_AGENT,
      requestsPerMinute: env.REQUESTS_PER_MINUTE,
      maxAttempts: env.MAX_RETRIES,
      maxRateLimitWaits: env.MAX_RATE_LIMIT_WAITS,
      backoffSeedMs: env.RETRY_BACKOFF_SECONDS * 1000,
      backoffCeilingMs: env.RETRY_BACKOFF_MAX_SECONDS * 1000,
      rateLimitCooldownMs: env.RATE_LIMIT_COOLDOWN_SECONDS * 1000,
      timeoutMs: env.HTTP_TIMEOUT_SECONDS * 1000,
    },
    scan: {
      pageSize: env.POSTS_PAGE_SIZE,
      maxPages: env.POSTS_MAX_PAGES,
      staleThreshold: env.MAX_STALE_PAGES,
      repeatThreshold: env.MAX_REPEAT_PAGES,
      signatureSize: 10,
    },
    crawl: {
      views: parseViews(env.POST_VIEWS),
      incrementalViews: parseViews(env.INCREMENTAL_VIEWS),
      fetchPostDetails: env.FETCH_POST_DETAILS,
      crawlComments: env.CRAWL_COMMENTS,
      commentsFromPostDetails: env.COMMENTS_FROM_POST_DETAILS,
      commentsLimitPerPost: env.COMMENTS_LIMIT_PER_POST,
      submoltTopLimit: env.SUBMOLT_TOP_LIMIT,
      enrichSubmolts: env.ENRICH_SUBMOLTS,
      enrichSubmoltsLimit: env.ENRICH_SUBMOLTS_LIMIT,
      crawlSubmoltFeeds: env.CRAWL_SUBMOLT_FEEDS,
      submoltFeedMaxPages: env.SUBMOLT_FEED_MAX_PAGES,
      submoltFeedSort: env.SUBMOLT_FEED_SORT,
      submoltFeedLimit: env.SUBMOLT_FEED_LIMIT,
      refreshModerators: env.REFRESH_MODERATORS,
      moderatorSubmoltsLimit: env.MODERATOR_SUBMOLTS_LIMIT,
      fetchAgentProfiles: env.FETCH_AGENT_PROFILES,
      profileLimit: env.PROFILE_LIMIT,
      profileRefreshDays: env.PROFILE_REFRESH_DAYS,
      profileRefreshLimit: env.PROFILE_REFRESH_LIMIT,
      feedSnapshot: env.FEED_SNAPSHOT,
      feedSnapshotSort: env.FEED_SNAPSHOT_SORT,
      feedSnapshotLimit: env.FEED_SNAPSHOT_LIMIT,
      scrapeAgentHtml: env.SCRAPE_AGENT_HTML,
    },
    store: buildStoreConfig(env),
    webBaseUrl: env.MOLTBOOK_WEB_URL.replace(/\/+$/, ''),
    crawlId: env.CRAWL_ID,
  };
}

function buildStoreConfig(env: Env): StoreConfig {
  if (env.GRAPH_STORE === 'jsonl') {
    return { kind: 'jsonl', dataDir: resolveDataDir(env.GRAPH_DATA_PATH) };
  }
  // superRefine has already rejected a neo4j store without credentials
  const { NEO4J_URI: uri, NEO4J_USER: username, NEO4J_PASSWORD: password } = env;
  if (!uri || !username || !password) {
    throw new ConfigurationError(['NEO4J_URI, NEO4J_USER and NEO4J_PASSWORD are required']);
  }
  return { kind: 'neo4j', uri, username, password, database: env.NEO4J_DATABASE };
}

function resolveDataDir(configured: string | undefined): string {
  if (!configured) return defaultDataDir;
  return path.isAbsolute(configured)
    ? configured
    : path.join(path.dirname(fileURLToPath(import.meta.url)), '..', configured);
}

export async function ensureDataDirectory(dataDir: string): Promise<string> {
  await fs.mkdir(dataDir, { recursive: true });
  return dataDir;
}
