/**
 * Graph upsert and reconciliation engine
 *
 * Turns raw API payloads into normalized rows and hands them to the store in
 * chunks. Rows without a natural key are dropped; duplicates within a call are
 * collapsed, later payloads winning.
 */

import { JsonObject, XAccountRow } from '../../core/types.js';
import { GraphStore } from './graph-store.js';
import { flattenCommentTree } from './comment-flattener.js';
import { mapAgent, mapComment, mapFeedEntries, mapModerator, mapPost, mapSubmolt } from './row-mappers.js';

export const POST_CHUNK_SIZE = 300;
export const DEFAULT_CHUNK_SIZE = 500;

export interface UpsertAgentsOptions {
  markProfile?: boolean;
}

export function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/** Last occurrence of each key wins, in first-seen order. */
function dedupe<T>(rows: T[], keyOf: (row: T) => string): T[] {
  const byKey = new Map<string, T>();
  for (const row of rows) {
    byKey.set(keyOf(row), row);
  }
  return [...byKey.values()];
}

function mapRows<I, T>(payloads: I[], mapper: (obj: I) => T | null): T[] {
  const rows: T[] = [];
  for (const payload of payloads) {
    const row = mapper(payload);
    if (row) rows.push(row);
  }
  return rows;
}

export class GraphWriter {
  constructor(private readonly store: GraphStore) {}

  /** @returns number of rows written */
  async upsertAgents(payloads: JsonObject[], observedAt: string, options: UpsertAgentsOptions = {}): Promise<number> {
    const rows = dedupe(mapRows(payloads, mapAgent), row => row.name);
    for (const batch of chunk(rows, DEFAULT_CHUNK_SIZE)) {
      await this.store.mergeAgents(batch, observedAt, { markProfile: options.markProfile ?? false });
    }
    return rows.length;
  }

  async upsertSubmolts(payloads: JsonObject[], observedAt: string): Promise<number> {
    const rows = dedupe(mapRows(payloads, mapSubmolt), row => row.name);
    for (const batch of chunk(rows, DEFAULT_CHUNK_SIZE)) {
      await this.store.mergeSubmolts(batch, observedAt);
    }
    return rows.length;
  }

  async upsertPosts(payloads: JsonObject[], observedAt: string): Promise<number> {
    const rows = dedupe(mapRows(payloads, mapPost), row => row.id);
    for (const batch of chunk(rows, POST_CHUNK_SIZE)) {
      await this.store.mergePosts(batch, observedAt);
    }
    return rows.length;
  }

  /**
   * Flatten a post's reply tree and write every comment with its parent link.
   * Root comments have no parent.
   */
  async upsertComments(postId: string, tree: JsonObject[], observedAt: string): Promise<number> {
    const flat = flattenCommentTree(tree);
    const rows = dedupe(
      mapRows(flat, entry => mapComment(entry.comment, postId, entry.parentId, entry.depth)),
      row => row.id
    );
    for (const batch of chunk(rows, DEFAULT_CHUNK_SIZE)) {
      await this.store.mergeComments(batch, observedAt);
    }
    return rows.length;
  }

  /**
   * Replace the open moderator set of a submolt with `payloads`. When no entry
   * yields a name nothing is reconciled and the open edges stay as they are.
   * @returns number of current moderators
   */
  async reconcileModerators(submolt: string, payloads: JsonObject[], observedAt: string): Promise<number> {
    const rows = dedupe(mapRows(payloads, mapModerator), row => row.name);
    if (rows.length === 0) return 0;
    await this.store.reconcileModerators(submolt, rows, observedAt);
    return rows.length;
  }

  /** Self-references and duplicates are dropped before reconciling. */
  async reconcileSimilarAgents(agentName: string, names: string[], source: string, observedAt: string): Promise<number> {
    const current = [...new Set(names.filter(name => name && name !== agentName))];
    await this.store.reconcileSimilarAgents(agentName, current, source, observedAt);
    return current.length;
  }

  async upsertOwnerAccount(agentName: string, account: XAccountRow, observedAt: string): Promise<void> {
    await this.store.mergeOwnerAccount(agentName, account, observedAt);
  }

  /**
   * One snapshot per crawl and sort, id `${crawlId}:${sort}`.
   * @returns number of ranked posts
   */
  async writeFeedSnapshot(crawlId: string, sort: string, posts: JsonObject[], observedAt: string): Promise<number> {
    const rows = mapFeedEntries(posts);
    await this.store.writeFeedSnapshot(`${crawlId}:${sort}`, sort, rows, observedAt);
    return rows.length;
  }
}
