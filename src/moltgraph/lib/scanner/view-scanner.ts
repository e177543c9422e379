/**
 * View Scanner
 *
 * Walks one offset-paginated stream until a terminal state. The upstream is
 * known to ignore `offset` at times and hand back the same page forever, so
 * besides the usual end-of-stream signals the scanner watches for repeated
 * page signatures and for pages that add nothing new.
 *
 *   Scanning ─┬─> Exhausted       empty batch or has_more=false
 *             ├─> PageCapReached  maxPages pages processed
 *             ├─> RepeatDetected  same signature repeated repeatThreshold times
 *             ├─> StaleDetected   staleThreshold pages without an unseen id
 *             ├─> CutoffReached   page dated at or before the cutoff
 *             └─> Failed          fetch, handler or checkpoint error
 */

import { ScanConfig } from '../../core/config.js';
import { describeError } from '../../core/errors.js';
import { Logger, silentLogger } from '../../core/logger.js';
import { JsonObject } from '../../core/types.js';
import { Page } from '../api/moltbook-client.js';
import { readString, readTimestamp } from '../api/response-normalizer.js';

export type ScanState =
  | 'Scanning'
  | 'StaleDetected'
  | 'RepeatDetected'
  | 'Exhausted'
  | 'PageCapReached'
  | 'CutoffReached'
  | 'Failed';

export type TerminalState = Exclude<ScanState, 'Scanning'>;

export type FetchPage = (offset: number, limit: number) => Promise<Page>;
export type PageHandler = (items: JsonObject[]) => Promise<void>;

export interface CheckpointStore {
  getCheckpoint(crawlId: string, key: string): Promise<number>;
  setCheckpoint(crawlId: string, key: string, offset: number): Promise<void>;
}

export interface ScanRequest {
  /** Checkpoint key, e.g. `posts_offset_new_na`. */
  key: string;
  fetchPage: FetchPage;
  handlePage: PageHandler;
  /** Items dated at or before this ISO time are dropped; null disables the bound. */
  cutoff?: string | null;
  /** Overrides the configured page cap (0 = no cap). */
  maxPages?: number;
}

export interface ScanResult {
  state: TerminalState;
  pages: number;
  /** Offset the next page would be fetched from. */
  offset: number;
  itemsProcessed: number;
  error?: Error;
}

interface CutoffSplit {
  kept: JsonObject[];
  sawOld: boolean;
}

/** Ids of the first `size` items, used to recognize a page served twice. */
export function pageSignature(items: JsonObject[], size: number): string {
  return JSON.stringify(items.slice(0, size).map(item => readString(item, 'id')));
}

/** Server `next_offset` when it moves forward, else past the batch. */
export function nextOffset(current: number, serverNext: number | null, batchSize: number): number {
  return serverNext !== null && serverNext > current ? serverNext : current + batchSize;
}

function splitByCutoff(items: JsonObject[], cutoffMs: number | null): CutoffSplit {
  if (cutoffMs === null) return { kept: items, sawOld: false };
  const kept: JsonObject[] = [];
  let sawOld = false;
  for (const item of items) {
    const created = readTimestamp(item, 'created_at', 'createdAt');
    if (created !== null && Date.parse(created) <= cutoffMs) {
      sawOld = true;
    } else {
      kept.push(item);
    }
  }
  return { kept, sawOld };
}

export class ViewScanner {
  constructor(
    private readonly config: ScanConfig,
    private readonly checkpoints: CheckpointStore,
    private readonly crawlId: string,
    /** Item ids seen so far in this run, shared across views. */
    private readonly seen: Set<string>,
    private readonly logger: Logger = silentLogger
  ) {}

  async scan(request: ScanRequest): Promise<ScanResult> {
    const maxPages = request.maxPages ?? this.config.maxPages;
    const cutoffMs = request.cutoff ? Date.parse(request.cutoff) : null;
    const result: ScanResult = { state: 'Exhausted', pages: 0, offset: 0, itemsProcessed: 0 };

    let previousSignature: string | null = null;
    let repeatPages = 0;
    let stalePages = 0;

    const fail = (error: unknown, what: string): ScanResult => {
      const err = error instanceof Error ? error : new Error(String(error));
      this.logger.warn(`${request.key} ${what} failed at offset=${result.offset}: ${describeError(err)}`);
      return { ...result, state: 'Failed', error: err };
    };

    try {
      result.offset = await this.checkpoints.getCheckpoint(this.crawlId, request.key);
    } catch (error) {
      return fail(error, 'checkpoint read');
    }
    this.logger.info(`${request.key} starting offset=${result.offset} page=${this.config.pageSize}`);

    const stop = (state: TerminalState): ScanResult => {
      this.logger.info(`${request.key} ${state} pages=${result.pages} offset=${result.offset}`);
      return { ...result, state };
    };

    for (;;) {
      if (maxPages > 0 && result.pages >= maxPages) {
        return stop('PageCapReached');
      }

      let page: Page;
      try {
        page = await request.fetchPage(result.offset, this.config.pageSize);
      } catch (error) {
        return fail(error, 'fetch');
      }

      const batch = page.items;
      if (batch.length === 0) {
        return stop('Exhausted');
      }

      const signature = pageSignature(batch, this.config.signatureSize);
      repeatPages = signature === previousSignature ? repeatPages + 1 : 0;
      previousSignature = signature;

      const { kept, sawOld } = splitByCutoff(batch, cutoffMs);
      if (sawOld && kept.length === 0) {
        return stop('CutoffReached');
      }

      const unseen = kept
        .map(item => readString(item, 'id'))
        .filter((id): id is string => id !== null && !this.seen.has(id));
      const newIds = new Set(unseen).size;

      try {
        await request.handlePage(kept);
      } catch (error) {
        return fail(error, 'page handler');
      }
      for (const id of unseen) this.seen.add(id);

      const previousOffset = result.offset;
      result.offset = nextOffset(result.offset, page.nextOffset, batch.length);
      try {
        await this.checkpoints.setCheckpoint(this.crawlId, request.key, result.offset);
      } catch (error) {
        return fail(error, 'checkpoint write');
      }

      result.pages += 1;
      result.itemsProcessed += kept.length;
      stalePages = newIds === 0 ? stalePages + 1 : 0;

      this.logger.info(
        `${request.key} batch=${batch.length} kept=${kept.length} new_ids=${newIds} has_more=${String(page.hasMore)} ` +
          `offset:${previousOffset}->${result.offset} repeat=${repeatPages} stale=${stalePages}`
      );

      if (sawOld) {
        return stop('CutoffReached');
      }
      if (maxPages > 0 && result.pages >= maxPages) {
        return stop('PageCapReached');
      }
      if (repeatPages >= this.config.repeatThreshold) {
        this.logger.warn(`${request.key} same page signature repeating; stopping view`);
        return stop('RepeatDetected');
      }
      if (stalePages >= this.config.staleThreshold) {
        this.logger.warn(`${request.key} no new ids for ${stalePages} pages (offset likely ignored); stopping view`);
        return stop('StaleDetected');
      }
      if (page.hasMore === false) {
        return stop('Exhausted');
      }
    }
  }
}
