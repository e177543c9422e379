/**
 * Command-line parsing, store selection and summary formatting for the entry point.
 */

import { CrawlerConfig, StoreConfig, ensureDataDirectory } from './core/config.js';
import { ConfigurationError } from './core/errors.js';
import { Logger } from './core/logger.js';
import { CrawlMode } from './core/types.js';
import { CrawlSummary } from './lib/crawl/crawl-orchestrator.js';
import { GraphStore } from './lib/graph/graph-store.js';
import { MemoryGraphStore } from './lib/graph/memory-graph-store.js';
import { Neo4jGraphStore } from './lib/graph/neo4j-graph-store.js';

export const USAGE = 'Usage: molt-graph <full|incremental> [--crawl-id <id>]';

export interface CliArgs {
  mode: CrawlMode;
  crawlId?: string;
}

export function parseCliArgs(argv: string[]): CliArgs {
  let mode: CrawlMode | null = null;
  let crawlId: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--crawl-id') {
      crawlId = argv[++i];
      if (!crawlId) throw new ConfigurationError([`--crawl-id needs a value. ${USAGE}`]);
    } else if (arg.startsWith('--crawl-id=')) {
      crawlId = arg.slice('--crawl-id='.length);
    } else if ((arg === 'full' || arg === 'incremental') && mode === null) {
      mode = arg;
    } else {
      throw new ConfigurationError([`unexpected argument "${arg}". ${USAGE}`]);
    }
  }

  if (!mode) throw new ConfigurationError([`missing crawl mode. ${USAGE}`]);
  return crawlId ? { mode, crawlId } : { mode };
}

export async function createStore(config: StoreConfig, logger: Logger): Promise<GraphStore> {
  switch (config.kind) {
    case 'neo4j':
      return new Neo4jGraphStore({
        uri: config.uri,
        username: config.username,
        password: config.password,
        database: config.database,
      });
    case 'jsonl':
      return new MemoryGraphStore({ dataDir: await ensureDataDirectory(config.dataDir), logger });
  }
}

/** Crawl id from the command line, else CRAWL_ID. */
export function resolveCrawlId(args: CliArgs, config: CrawlerConfig): string | undefined {
  return args.crawlId ?? config.crawlId;
}

export function formatSummary(summary: CrawlSummary): string {
  const lines = [
    `crawl_id=${summary.crawlId} mode=${summary.mode} since=${summary.since ?? '-'}`,
    `started=${summary.startedAt} ended=${summary.endedAt}`,
    'stages:',
    ...summary.stages.map(stage => {
      const failures = stage.failures > 0 ? ` failures=${stage.failures}` : '';
      const error = stage.error ? ` error=${stage.error}` : '';
      return `  ${stage.name.padEnd(18)} ${stage.status.padEnd(7)} records=${stage.records}${failures}${error}`;
    }),
  ];
  if (summary.views.length > 0) {
    lines.push('views:');
    for (const view of summary.views) {
      const error = view.error ? ` error=${view.error}` : '';
      lines.push(`  ${view.key} ${view.state} pages=${view.pages} items=${view.items}${error}`);
    }
  }
  return lines.join('\n');
}
