/**
 * Neo4j Graph Store
 *
 * Example usage:
 * ```typescript
 * const store = new Neo4jGraphStore({
 *   uri: 'neo4j://localhost:7687',
 *   username: 'neo4j',
 *   password: 'password'
 * });
 *
 * await store.initialize();
 * await store.mergeAgents(rows, new Date().toISOString());
 * await store.close();
 * ```
 */

import neo4j, { Driver } from 'neo4j-driver';
import { PersistenceError, describeError } from '../../core/errors.js';
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
import { GraphStore, MergeAgentsOptions } from './graph-store.js';
import { CRAWL_QUERIES, EDGE_QUERIES, NODE_QUERIES, RECONCILE_QUERIES, SCHEMA_QUERIES } from './neo4j-queries.js';

export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
}

export interface CypherStatement {
  query: string;
  params: Record<string, unknown>;
}

/**
 * The slice of the driver the store needs. `write` runs all statements in a
 * single transaction.
 */
export interface CypherRunner {
  read(statement: CypherStatement): Promise<Array<Record<string, unknown>>>;
  write(statements: CypherStatement[]): Promise<void>;
  close(): Promise<void>;
}

/**
 * CypherRunner over a neo4j-driver Driver.
 *
 * JS numbers would reach the server as floats, so whole numbers in parameters
 * are sent as Neo4j integers and integers in results come back as numbers.
 */
export class DriverCypherRunner implements CypherRunner {
  constructor(
    private readonly driver: Driver,
    private readonly database?: string
  ) {}

  static async connect(config: Neo4jConfig): Promise<DriverCypherRunner> {
    const driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password));
    try {
      await driver.verifyConnectivity();
    } catch (error) {
      await driver.close();
      throw error;
    }
    return new DriverCypherRunner(driver, config.database);
  }

  async read(statement: CypherStatement): Promise<Array<Record<string, unknown>>> {
    const session = this.driver.session({ database: this.database });
    try {
      const result = await session.executeRead(tx => tx.run(statement.query, toDriverValue(statement.params)));
      return result.records.map(record => {
        const row: Record<string, unknown> = {};
        for (const key of record.keys) {
          row[String(key)] = fromDriverValue(record.get(key));
        }
        return row;
      });
    } finally {
      await session.close();
    }
  }

  async write(statements: CypherStatement[]): Promise<void> {
    const session = this.driver.session({ database: this.database });
    try {
      await session.executeWrite(async tx => {
        for (const statement of statements) {
          await tx.run(statement.query, toDriverValue(statement.params));
        }
      });
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}

function toDriverValue(value: Record<string, unknown>): Record<string, unknown>;
function toDriverValue(value: unknown): unknown;
function toDriverValue(value: unknown): unknown {
  if (typeof value === 'number' && Number.isSafeInteger(value)) return neo4j.int(value);
  if (Array.isArray(value)) return value.map(item => toDriverValue(item));
  if (value !== null && typeof value === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) {
      out[key] = toDriverValue(item);
    }
    return out;
  }
  return value;
}

function fromDriverValue(value: unknown): unknown {
  return neo4j.isInt(value) ? value.toNumber() : value;
}

/**
 * Neo4j-backed graph store
 */
export class Neo4jGraphStore implements GraphStore {
  private runner: CypherRunner | null;

  /**
   * @param runner pre-built runner; when omitted `initialize()` connects with `config`
   */
  constructor(
    private readonly config: Neo4jConfig,
    runner?: CypherRunner
  ) {
    this.runner = runner ?? null;
  }

  /**
   * Connect and create constraints and indexes
   */
  async initialize(): Promise<void> {
    try {
      if (!this.runner) {
        this.runner = await DriverCypherRunner.connect(this.config);
      }
      for (const query of SCHEMA_QUERIES) {
        await this.runner.write([{ query, params: {} }]);
      }
    } catch (error) {
      throw new Error(`Failed to initialize Neo4j connection: ${describeError(error)}`);
    }
  }

  async close(): Promise<void> {
    if (this.runner) {
      await this.runner.close();
      this.runner = null;
    }
  }

  // === CRAWL BOOKKEEPING ===

  async beginCrawl(crawlId: string, mode: CrawlMode, startedAtIso: string, sinceIso: string | null): Promise<void> {
    await this.write('beginCrawl', [
      { query: CRAWL_QUERIES.begin, params: { id: crawlId, mode, startedAt: startedAtIso, since: sinceIso } },
    ]);
  }

  async endCrawl(crawlId: string, endedAtIso: string): Promise<void> {
    await this.write('endCrawl', [{ query: CRAWL_QUERIES.end, params: { id: crawlId, endedAt: endedAtIso } }]);
  }

  async getLatestCrawlCutoff(): Promise<string | null> {
    const rows = await this.read('getLatestCrawlCutoff', { query: CRAWL_QUERIES.latestCutoff, params: {} });
    const cutoff = rows[0]?.cutoff;
    return typeof cutoff === 'string' ? cutoff : null;
  }

  async getCheckpoint(crawlId: string, key: string): Promise<number> {
    const rows = await this.read('getCheckpoint', { query: CRAWL_QUERIES.getCheckpoint, params: { id: crawlId, key } });
    const offset = rows[0]?.offset;
    return typeof offset === 'number' ? offset : 0;
  }

  async setCheckpoint(crawlId: string, key: string, offset: number): Promise<void> {
    await this.write('setCheckpoint', [
      {
        query: CRAWL_QUERIES.setCheckpoint,
        params: { id: crawlId, key, offset, checkpoint: { [key]: offset }, now: new Date().toISOString() },
      },
    ]);
  }

  async getAgentsNeedingProfileRefresh(days: number, limit: number, nowIso: string): Promise<string[]> {
    if (limit <= 0) return [];
    const rows = await this.read('getAgentsNeedingProfileRefresh', {
      query: CRAWL_QUERIES.agentsNeedingProfile,
      params: { days, limit, now: nowIso },
    });
    return rows.map(row => row.name).filter((name): name is string => typeof name === 'string');
  }

  // === NODE UPSERTS ===

  async mergeAgents(rows: AgentRow[], observedAt: string, options: MergeAgentsOptions = {}): Promise<void> {
    if (rows.length === 0) return;
    await this.write('mergeAgents', [
      { query: NODE_QUERIES.agents, params: { rows, obs: observedAt, markProfile: options.markProfile ?? false } },
    ]);
  }

  async mergeSubmolts(rows: SubmoltRow[], observedAt: string): Promise<void> {
    if (rows.length === 0) return;
    await this.write('mergeSubmolts', [{ query: NODE_QUERIES.submolts, params: { rows, obs: observedAt } }]);
  }

  async mergePosts(rows: PostRow[], observedAt: string): Promise<void> {
    if (rows.length === 0) return;
    const params = { rows, obs: observedAt };
    await this.write('mergePosts', [
      { query: NODE_QUERIES.posts, params },
      { query: EDGE_QUERIES.postAuthors, params },
      { query: EDGE_QUERIES.postSubmolts, params },
    ]);
  }

  async mergeComments(rows: CommentRow[], observedAt: string): Promise<void> {
    if (rows.length === 0) return;
    const params = { rows, obs: observedAt };
    await this.write('mergeComments', [
      { query: NODE_QUERIES.comments, params },
      { query: EDGE_QUERIES.commentAuthors, params },
      { query: EDGE_QUERIES.commentPosts, params },
      { query: EDGE_QUERIES.commentReplies, params },
    ]);
  }

  async mergeOwnerAccount(agentName: string, account: XAccountRow, observedAt: string): Promise<void> {
    await this.write('mergeOwnerAccount', [
      { query: NODE_QUERIES.ownerAccount, params: { agent: agentName, account, obs: observedAt } },
    ]);
  }

  async writeFeedSnapshot(snapshotId: string, sort: string, rows: FeedEntryRow[], observedAt: string): Promise<void> {
    await this.write('writeFeedSnapshot', [
      { query: NODE_QUERIES.feedSnapshot, params: { id: snapshotId, sort, rows, obs: observedAt } },
    ]);
  }

  // === RECONCILIATION ===

  async reconcileModerators(submolt: string, rows: ModeratorRow[], observedAt: string): Promise<void> {
    const current = rows.map(row => row.name);
    await this.write('reconcileModerators', [
      { query: RECONCILE_QUERIES.closeModerators, params: { submolt, current, obs: observedAt } },
      { query: RECONCILE_QUERIES.mergeModerators, params: { submolt, rows, obs: observedAt } },
    ]);
  }

  async reconcileSimilarAgents(
    agentName: string,
    similarNames: string[],
    source: string,
    observedAt: string
  ): Promise<void> {
    const params = { agent: agentName, current: similarNames, source, obs: observedAt };
    await this.write('reconcileSimilarAgents', [
      { query: RECONCILE_QUERIES.closeSimilar, params },
      { query: RECONCILE_QUERIES.mergeSimilar, params },
    ]);
  }

  private requireRunner(): CypherRunner {
    if (!this.runner) {
      throw new Error('Neo4j driver not initialized. Call initialize() first.');
    }
    return this.runner;
  }

  private async write(operation: string, statements: CypherStatement[]): Promise<void> {
    const runner = this.requireRunner();
    try {
      await runner.write(statements);
    } catch (error) {
      throw new PersistenceError(operation, { cause: error });
    }
  }

  private async read(operation: string, statement: CypherStatement): Promise<Array<Record<string, unknown>>> {
    const runner = this.requireRunner();
    try {
      return await runner.read(statement);
    } catch (error) {
      throw new PersistenceError(operation, { cause: error });
    }
  }
}
