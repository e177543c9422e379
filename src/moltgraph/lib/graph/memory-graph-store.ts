/**
 * In-process graph store
 *
 * Implements the same merge and reconciliation semantics as the Neo4j store
 * over plain maps. With a data directory the graph is loaded from and written
 * back to `graph.jsonl`, one node or edge per line.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { PersistenceError } from '../../core/errors.js';
import { Logger, silentLogger } from '../../core/logger.js';
import {
  AgentRow,
  CommentRow,
  CrawlMode,
  FeedEntryRow,
  JsonPrimitive,
  ModeratorRow,
  NodeLabel,
  PostRow,
  RelationshipType,
  SubmoltRow,
  XAccountRow,
} from '../../core/types.js';
import { GraphStore, MergeAgentsOptions } from './graph-store.js';
import { DEFAULT_MODERATOR_ROLE } from './row-mappers.js';

export type Props = Record<string, JsonPrimitive>;

export interface NodeRef {
  label: NodeLabel;
  key: string;
}

export interface GraphNode extends NodeRef {
  props: Props;
}

export interface GraphEdge {
  type: RelationshipType;
  from: NodeRef;
  to: NodeRef;
  props: Props;
}

export interface MemoryGraphStoreOptions {
  /** Directory holding `graph.jsonl`; in-memory only when omitted. */
  dataDir?: string;
  logger?: Logger;
}

const NODE_LABELS = ['Agent', 'Submolt', 'Post', 'Comment', 'XAccount', 'Crawl', 'FeedSnapshot'] as const satisfies readonly NodeLabel[];
const RELATIONSHIP_TYPES = [
  'AUTHORED',
  'IN_SUBMOLT',
  'ON_POST',
  'REPLY_TO',
  'MODERATES',
  'SIMILAR_TO',
  'HAS_OWNER_X',
  'CONTAINS',
] as const satisfies readonly RelationshipType[];

/** Natural key property per label */
const KEY_PROPS: Record<NodeLabel, string> = {
  Agent: 'name',
  Submolt: 'name',
  Post: 'id',
  Comment: 'id',
  XAccount: 'handle',
  Crawl: 'id',
  FeedSnapshot: 'id',
};

const PropsSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));
const NodeRefSchema = z.object({ label: z.enum(NODE_LABELS), key: z.string() });

const LineSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('node'), label: z.enum(NODE_LABELS), key: z.string(), props: PropsSchema }),
  z.object({
    type: z.literal('edge'),
    relationship: z.enum(RELATIONSHIP_TYPES),
    from: NodeRefSchema,
    to: NodeRefSchema,
    props: PropsSchema,
  }),
]);

export const GRAPH_FILE_NAME = 'graph.jsonl';
const DAY_MS = 24 * 60 * 60 * 1000;

function nodeId(ref: NodeRef): string {
  return `${ref.label}:${ref.key}`;
}

/** Copy every non-null field; null means "not observed". */
function assignPresent(target: Props, fields: Props): void {
  for (const [key, value] of Object.entries(fields)) {
    if (value !== null) target[key] = value;
  }
}

function timeOf(value: JsonPrimitive | undefined): number | null {
  if (typeof value !== 'string') return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

export class MemoryGraphStore implements GraphStore {
  private readonly nodes = new Map<string, GraphNode>();
  private readonly edgeIndex = new Map<string, GraphEdge>();
  private readonly logger: Logger;

  constructor(private readonly options: MemoryGraphStoreOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  get filePath(): string | null {
    return this.options.dataDir ? path.join(this.options.dataDir, GRAPH_FILE_NAME) : null;
  }

  async initialize(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) return;

    let data: string;
    try {
      data = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return;
      throw new PersistenceError('load', { cause: error });
    }

    const lines = data.split('\n').filter(line => line.trim() !== '');
    for (const line of lines) {
      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch {
        this.logger.warn(`Skipping malformed JSON line in ${filePath} (line length: ${line.length} chars)`);
        continue;
      }
      const parsed = LineSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn(`Skipping record with missing required fields in ${filePath}`);
        continue;
      }
      const item = parsed.data;
      if (item.type === 'node') {
        this.nodes.set(nodeId(item), { label: item.label, key: item.key, props: item.props });
      } else {
        const edge: GraphEdge = { type: item.relationship, from: item.from, to: item.to, props: item.props };
        this.edgeIndex.set(edgeId(edge.type, edge.from, edge.to, edge.props.source ?? null), edge);
      }
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }

  /**
   * Write the whole graph to `graph.jsonl` (no-op without a data directory).
   * The lines go to a temporary file first, renamed over the previous graph.
   */
  async flush(): Promise<void> {
    const filePath = this.filePath;
    if (!filePath) return;
    const lines = [
      ...[...this.nodes.values()].map(n => JSON.stringify({ type: 'node', label: n.label, key: n.key, props: n.props })),
      ...[...this.edgeIndex.values()].map(e =>
        JSON.stringify({ type: 'edge', relationship: e.type, from: e.from, to: e.to, props: e.props })
      ),
    ];
    try {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
      const tempPath = `${filePath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, lines.join('\n'));
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw new PersistenceError('flush', { cause: error });
    }
  }

  // === READ HELPERS ===

  getNode(label: NodeLabel, key: string): Props | undefined {
    return this.nodes.get(nodeId({ label, key }))?.props;
  }

  listNodes(label: NodeLabel): GraphNode[] {
    return [...this.nodes.values()].filter(node => node.label === label);
  }

  listEdges(type: RelationshipType): GraphEdge[] {
    return [...this.edgeIndex.values()].filter(edge => edge.type === type);
  }

  findEdge(type: RelationshipType, from: NodeRef, to: NodeRef, source: string | null = null): GraphEdge | undefined {
    return this.edgeIndex.get(edgeId(type, from, to, source));
  }

  // === CRAWL BOOKKEEPING ===

  async beginCrawl(crawlId: string, mode: CrawlMode, startedAtIso: string, sinceIso: string | null): Promise<void> {
    const ref: NodeRef = { label: 'Crawl', key: crawlId };
    const existing = this.nodes.get(nodeId(ref));
    const props =
      existing?.props ??
      this.mergeNode(ref, { started_at: startedAtIso, cutoff: startedAtIso, since: sinceIso }, startedAtIso, startedAtIso);
    props.mode = mode;
    props.last_seen_at = startedAtIso;
    props.last_updated_at = startedAtIso;
  }

  async endCrawl(crawlId: string, endedAtIso: string): Promise<void> {
    const props = this.getNode('Crawl', crawlId);
    if (props) {
      props.ended_at = endedAtIso;
      props.last_updated_at = endedAtIso;
    }
    await this.flush();
  }

  async getLatestCrawlCutoff(): Promise<string | null> {
    let latest: { cutoff: string; ms: number } | null = null;
    for (const node of this.listNodes('Crawl')) {
      const cutoff = node.props.cutoff;
      const ms = timeOf(cutoff);
      if (typeof cutoff !== 'string' || ms === null || node.props.ended_at == null) continue;
      if (!latest || ms > latest.ms) latest = { cutoff, ms };
    }
    return latest?.cutoff ?? null;
  }

  async getCheckpoint(crawlId: string, key: string): Promise<number> {
    const value = this.getNode('Crawl', crawlId)?.[key];
    return typeof value === 'number' ? value : 0;
  }

  async setCheckpoint(crawlId: string, key: string, offset: number): Promise<void> {
    const props = this.getNode('Crawl', crawlId);
    if (!props) return;
    const current = props[key];
    if (typeof current === 'number' && current > offset) return;
    props[key] = offset;
    props.last_updated_at = new Date().toISOString();
    await this.flush();
  }

  async getAgentsNeedingProfileRefresh(days: number, limit: number, nowIso: string): Promise<string[]> {
    if (limit <= 0) return [];
    const threshold = Date.parse(nowIso) - days * DAY_MS;
    return this.listNodes('Agent')
      .map(node => ({ name: node.key, fetched: timeOf(node.props.profile_last_fetched_at) }))
      .filter(agent => agent.fetched === null || agent.fetched < threshold)
      .sort((a, b) => (a.fetched ?? 0) - (b.fetched ?? 0) || a.name.localeCompare(b.name))
      .slice(0, limit)
      .map(agent => agent.name);
  }

  // === NODE UPSERTS ===

  async mergeAgents(rows: AgentRow[], observedAt: string, options: MergeAgentsOptions = {}): Promise<void> {
    for (const row of rows) {
      const props = this.mergeAgent(row, observedAt);
      if (options.markProfile) props.profile_last_fetched_at = observedAt;
    }
  }

  async mergeSubmolts(rows: SubmoltRow[], observedAt: string): Promise<void> {
    for (const row of rows) {
      const { name, ...fields } = row;
      this.mergeNode({ label: 'Submolt', key: name }, fields, observedAt, row.created_at);
    }
  }

  async mergePosts(rows: PostRow[], observedAt: string): Promise<void> {
    for (const row of rows) {
      const { author, ...fields } = row;
      const post: NodeRef = { label: 'Post', key: row.id };
      const props = this.mergeNode(post, fields, observedAt, row.created_at);

      if (author) {
        this.mergeAgent(author, observedAt);
        this.mergeEdge('AUTHORED', { label: 'Agent', key: author.name }, post, observedAt, { createdAt: props.created_at });
      }
      if (row.submolt) {
        const submolt: NodeRef = { label: 'Submolt', key: row.submolt };
        this.mergeNode(submolt, { id: row.submolt_id }, observedAt);
        this.mergeEdge('IN_SUBMOLT', post, submolt, observedAt, { createdAt: props.created_at });
      }
    }
  }

  async mergeComments(rows: CommentRow[], observedAt: string): Promise<void> {
    for (const row of rows) {
      const { author, ...fields } = row;
      const comment: NodeRef = { label: 'Comment', key: row.id };
      const props = this.mergeNode(comment, fields, observedAt, row.created_at);
      const edgeOptions = { createdAt: props.created_at };

      if (author) {
        this.mergeAgent(author, observedAt);
        this.mergeEdge('AUTHORED', { label: 'Agent', key: author.name }, comment, observedAt, edgeOptions);
      }

      const post: NodeRef = { label: 'Post', key: row.post_id };
      this.mergeNode(post, {}, observedAt);
      this.mergeEdge('ON_POST', comment, post, observedAt, edgeOptions);

      if (row.parent_id) {
        const parent: NodeRef = { label: 'Comment', key: row.parent_id };
        if (!this.nodes.has(nodeId(parent))) this.mergeNode(parent, {}, observedAt);
        this.mergeEdge('REPLY_TO', comment, parent, observedAt, edgeOptions);
      }
    }
  }

  async mergeOwnerAccount(agentName: string, account: XAccountRow, observedAt: string): Promise<void> {
    const agent: NodeRef = { label: 'Agent', key: agentName };
    const agentProps = this.mergeNode(agent, {}, observedAt);
    if (agentProps.owner_twitter_handle == null) agentProps.owner_twitter_handle = account.handle;

    const { handle, ...fields } = account;
    const xAccount: NodeRef = { label: 'XAccount', key: handle };
    this.mergeNode(xAccount, fields, observedAt);
    this.mergeEdge('HAS_OWNER_X', agent, xAccount, observedAt);
  }

  async writeFeedSnapshot(snapshotId: string, sort: string, rows: FeedEntryRow[], observedAt: string): Promise<void> {
    const snapshot: NodeRef = { label: 'FeedSnapshot', key: snapshotId };
    const isNew = !this.nodes.has(nodeId(snapshot));
    const props = this.mergeNode(snapshot, { sort }, observedAt);
    if (isNew) props.observed_at = observedAt;

    for (const row of rows) {
      const post: NodeRef = { label: 'Post', key: row.id };
      this.mergeNode(post, { title: row.title, submolt: row.submolt, score: row.score }, observedAt, row.created_at);
      this.mergeEdge('CONTAINS', snapshot, post, observedAt, { fields: { rank: row.rank } });
    }
  }

  // === RECONCILIATION ===

  async reconcileModerators(submolt: string, rows: ModeratorRow[], observedAt: string): Promise<void> {
    const submoltRef: NodeRef = { label: 'Submolt', key: submolt };
    const current = new Set(rows.map(row => row.name));

    for (const edge of this.listEdges('MODERATES')) {
      if (edge.to.key === submolt && edge.props.ended_at == null && !current.has(edge.from.key)) {
        edge.props.ended_at = observedAt;
      }
    }

    this.mergeNode(submoltRef, {}, observedAt);
    for (const row of rows) {
      const agent: NodeRef = { label: 'Agent', key: row.name };
      this.mergeNode(agent, { display_name: row.display_name }, observedAt);
      const edge = this.mergeEdge('MODERATES', agent, submoltRef, observedAt, {
        onCreate: { role: DEFAULT_MODERATOR_ROLE },
        fields: { role: row.role },
      });
      delete edge.ended_at;
    }
  }

  async reconcileSimilarAgents(
    agentName: string,
    similarNames: string[],
    source: string,
    observedAt: string
  ): Promise<void> {
    const agent: NodeRef = { label: 'Agent', key: agentName };
    const current = new Set(similarNames);

    for (const edge of this.listEdges('SIMILAR_TO')) {
      if (
        edge.from.key === agentName &&
        edge.props.source === source &&
        edge.props.ended_at == null &&
        !current.has(edge.to.key)
      ) {
        edge.props.ended_at = observedAt;
      }
    }

    this.mergeNode(agent, {}, observedAt);
    for (const name of current) {
      const other: NodeRef = { label: 'Agent', key: name };
      this.mergeNode(other, {}, observedAt);
      const edge = this.mergeEdge('SIMILAR_TO', agent, other, observedAt, { source });
      delete edge.ended_at;
    }
  }

  // === INTERNALS ===

  private mergeAgent(row: AgentRow, observedAt: string): Props {
    const { name, ...fields } = row;
    return this.mergeNode({ label: 'Agent', key: name }, fields, observedAt, row.created_at);
  }

  private mergeNode(ref: NodeRef, fields: Props, observedAt: string, createdAt: string | null = null): Props {
    const id = nodeId(ref);
    let node = this.nodes.get(id);
    if (!node) {
      node = {
        ...ref,
        props: { [KEY_PROPS[ref.label]]: ref.key, first_seen_at: observedAt, created_at: createdAt ?? observedAt },
      };
      this.nodes.set(id, node);
    }
    node.props.last_seen_at = observedAt;
    assignPresent(node.props, fields);
    return node.props;
  }

  private mergeEdge(
    type: RelationshipType,
    from: NodeRef,
    to: NodeRef,
    observedAt: string,
    options: { source?: string; createdAt?: JsonPrimitive; onCreate?: Props; fields?: Props } = {}
  ): Props {
    const id = edgeId(type, from, to, options.source ?? null);
    let edge = this.edgeIndex.get(id);
    if (!edge) {
      const props: Props = { first_seen_at: observedAt };
      if (options.source !== undefined) props.source = options.source;
      if (options.createdAt !== undefined && options.createdAt !== null) props.created_at = options.createdAt;
      if (options.onCreate) assignPresent(props, options.onCreate);
      edge = { type, from, to, props };
      this.edgeIndex.set(id, edge);
    }
    edge.props.last_seen_at = observedAt;
    if (options.fields) assignPresent(edge.props, options.fields);
    return edge.props;
  }
}

function edgeId(type: RelationshipType, from: NodeRef, to: NodeRef, source: JsonPrimitive): string {
  return source === null ? `${type}|${nodeId(from)}|${nodeId(to)}` : `${type}|${nodeId(from)}|${nodeId(to)}|${String(source)}`;
}
