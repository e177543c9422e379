import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createStore, formatSummary, parseCliArgs, resolveCrawlId } from '../cli.js';
import { loadConfig } from '../core/config.js';
import { ConfigurationError } from '../core/errors.js';
import { silentLogger } from '../core/logger.js';
import { CrawlSummary } from '../lib/crawl/crawl-orchestrator.js';
import { MemoryGraphStore } from '../lib/graph/memory-graph-store.js';
import { Neo4jGraphStore } from '../lib/graph/neo4j-graph-store.js';

describe('parseCliArgs', () => {
  it('should read the mode and an optional crawl id', () => {
    expect(parseCliArgs(['full'])).toEqual({ mode: 'full' });
    expect(parseCliArgs(['incremental', '--crawl-id', 'incremental:abc'])).toEqual({
      mode: 'incremental',
      crawlId: 'incremental:abc',
    });
    expect(parseCliArgs(['--crawl-id=full:xyz', 'full'])).toEqual({ mode: 'full', crawlId: 'full:xyz' });
  });

  it('should reject missing or unexpected arguments', () => {
    expect(() => parseCliArgs([])).toThrow(ConfigurationError);
    expect(() => parseCliArgs(['full', 'incremental'])).toThrow('unexpected argument "incremental"');
    expect(() => parseCliArgs(['full', '--crawl-id'])).toThrow('--crawl-id needs a value');
    expect(() => parseCliArgs(['fast'])).toThrow('unexpected argument "fast"');
  });
});

describe('resolveCrawlId', () => {
  const config = loadConfig({ MOLTBOOK_API_KEY: 'test-secret', GRAPH_STORE: 'jsonl', CRAWL_ID: 'full:from-env' });

  it('should prefer the command line over CRAWL_ID', () => {
    expect(resolveCrawlId({ mode: 'full', crawlId: 'full:from-cli' }, config)).toBe('full:from-cli');
    expect(resolveCrawlId({ mode: 'full' }, config)).toBe('full:from-env');
  });
});

describe('createStore', () => {
  let dataDir: string | null = null;

  afterEach(async () => {
    if (dataDir) await fs.rm(dataDir, { recursive: true, force: true });
    dataDir = null;
  });

  it('should create the data directory for the JSONL store', async () => {
    dataDir = path.join(await fs.mkdtemp(path.join(os.tmpdir(), 'molt-graph-cli-')), 'nested');

    const store = await createStore({ kind: 'jsonl', dataDir }, silentLogger);

    expect(store).toBeInstanceOf(MemoryGraphStore);
    await expect(fs.stat(dataDir)).resolves.toBeDefined();
  });

  it('should create an unconnected Neo4j store', async () => {
    const store = await createStore(
      { kind: 'neo4j', uri: 'neo4j://localhost:7687', username: 'neo4j', password: 'test-secret' },
      silentLogger
    );
    expect(store).toBeInstanceOf(Neo4jGraphStore);
  });
});

describe('formatSummary', () => {
  it('should list stages and views', () => {
    const summary: CrawlSummary = {
      crawlId: 'full:run-1',
      mode: 'full',
      startedAt: '2024-01-20T10:00:00.000Z',
      endedAt: '2024-01-20T10:05:00.000Z',
      since: null,
      stages: [
        { name: 'open-crawl', status: 'ok', records: 1, failures: 0 },
        { name: 'self', status: 'failed', records: 0, failures: 0, error: 'unauthorized' },
        { name: 'moderators', status: 'ok', records: 4, failures: 1 },
      ],
      views: [
        { key: 'posts_offset_new_na', state: 'Exhausted', pages: 2, items: 20 },
        { key: 'posts_offset_top_day', state: 'Failed', pages: 0, items: 0, error: 'boom' },
      ],
    };

    expect(formatSummary(summary).split('\n')).toEqual([
      'crawl_id=full:run-1 mode=full since=-',
      'started=2024-01-20T10:00:00.000Z ended=2024-01-20T10:05:00.000Z',
      'stages:',
      '  open-crawl         ok      records=1',
      '  self               failed  records=0 error=unauthorized',
      '  moderators         ok      records=4 failures=1',
      'views:',
      '  posts_offset_new_na Exhausted pages=2 items=20',
      '  posts_offset_top_day Failed pages=0 items=0 error=boom',
    ]);
  });
});
