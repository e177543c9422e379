/**
 * Graph storage interface
 *
 * Rows arrive already normalized (see row-mappers.ts) and chunked by the
 * GraphWriter. Every implementation must give these semantics:
 *
 * - merge by natural key; `first_seen_at` set once, `last_seen_at` on every call;
 * - `created_at` on creation from the row, else the observation time;
 * - a null row field never overwrites a stored value;
 * - reconciled edge sets are closed with `ended_at`, never deleted.
 */

import {
  AgentRow,
  CommentRow,
  CrawlMode,
  FeedEntryRow,
  ModeratorRow,
  PostRow,
  SubmoltRow,
  XAccountRow,
} from '../../core/types.js';

export interface MergeAgentsOptions {
  /** Stamp `profile_last_fetched_at` with the observation time. */
  markProfile?: boolean;
}

export interface GraphStore {
  initialize(): Promise<void>;
  close(): Promise<void>;

  // Crawl bookkeeping
  /**
   * Create or resume a crawl. `startedAtIso` becomes the crawl's cutoff for
   * the next incremental run; `sinceIso` is the cutoff this run filters by.
   * A resumed crawl keeps its original start time.
   */
  beginCrawl(crawlId: string, mode: CrawlMode, startedAtIso: string, sinceIso: string | null): Promise<void>;
  endCrawl(crawlId: string, endedAtIso: string): Promise<void>;
  /** Start time of the most recent crawl that reached `endCrawl`. */
  getLatestCrawlCutoff(): Promise<string | null>;
  getCheckpoint(crawlId: string, key: string): Promise<number>;
  /** Never lowers a stored checkpoint. */
  setCheckpoint(crawlId: string, key: string, offset: number): Promise<void>;
  /** Names whose profile was never fetched or is older than `days`, oldest first. */
  getAgentsNeedingProfileRefresh(days: number, limit: number, nowIso: string): Promise<string[]>;

  // Node upserts
  mergeAgents(rows: AgentRow[], observedAt: string, options?: MergeAgentsOptions): Promise<void>;
  mergeSubmolts(rows: SubmoltRow[], observedAt: string): Promise<void>;
  /** Posts plus AUTHORED and IN_SUBMOLT edges. */
  mergePosts(rows: PostRow[], observedAt: string): Promise<void>;
  /** Comments plus AUTHORED, ON_POST and REPLY_TO edges. */
  mergeComments(rows: CommentRow[], observedAt: string): Promise<void>;
  mergeOwnerAccount(agentName: string, account: XAccountRow, observedAt: string): Promise<void>;
  writeFeedSnapshot(snapshotId: string, sort: string, rows: FeedEntryRow[], observedAt: string): Promise<void>;

  // Time-varying edge sets: close absent members, then merge/reopen present ones
  reconcileModerators(submolt: string, rows: ModeratorRow[], observedAt: string): Promise<void>;
  reconcileSimilarAgents(agentName: string, similarNames: string[], source: string, observedAt: string): Promise<void>;
}
