/**
 * Neo4j Cypher Queries
 *
 * Centralizes all Cypher used by the Neo4j graph store.
 *
 * Conventions: `$obs` is the observation time (ISO string), `$rows` a list of
 * normalized rows. `coalesce(row.x, n.x)` keeps the stored value when the row
 * field is null.
 */

import { DEFAULT_MODERATOR_ROLE } from './row-mappers.js';

/** SET lines applying an agent row found at `src` to the node bound to `a`. */
function agentFields(a: string, src: string): string {
  return `
    ${a}.last_seen_at = datetime($obs),
    ${a}.id = coalesce(${src}.id, ${a}.id),
    ${a}.display_name = coalesce(${src}.display_name, ${a}.display_name),
    ${a}.description = coalesce(${src}.description, ${a}.description),
    ${a}.avatar_url = coalesce(${src}.avatar_url, ${a}.avatar_url),
    ${a}.status = coalesce(${src}.status, ${a}.status),
    ${a}.karma = coalesce(${src}.karma, ${a}.karma),
    ${a}.follower_count = coalesce(${src}.follower_count, ${a}.follower_count),
    ${a}.following_count = coalesce(${src}.following_count, ${a}.following_count),
    ${a}.is_claimed = coalesce(${src}.is_claimed, ${a}.is_claimed),
    ${a}.is_active = coalesce(${src}.is_active, ${a}.is_active),
    ${a}.owner_twitter_id = coalesce(${src}.owner_twitter_id, ${a}.owner_twitter_id),
    ${a}.owner_twitter_handle = coalesce(${src}.owner_twitter_handle, ${a}.owner_twitter_handle),
    ${a}.created_at = ${datetimeOr(`${src}.created_at`, `${a}.created_at`)},
    ${a}.claimed_at = ${datetimeOr(`${src}.claimed_at`, `${a}.claimed_at`)},
    ${a}.last_active = ${datetimeOr(`${src}.last_active`, `${a}.last_active`)},
    ${a}.updated_at = ${datetimeOr(`${src}.updated_at`, `${a}.updated_at`)}`;
}

function datetimeOr(value: string, fallback: string): string {
  return `CASE WHEN ${value} IS NULL THEN ${fallback} ELSE datetime(${value}) END`;
}

/** ON CREATE clause shared by every node kind. */
function onCreate(n: string, createdAt = '$obs'): string {
  return `ON CREATE SET ${n}.first_seen_at = datetime($obs), ${n}.created_at = datetime(coalesce(${createdAt}, $obs))`;
}

/** MERGE/stamp of a plain edge variable. */
function edgeStamp(r: string, createdAt?: string): string {
  const created = createdAt ? `, ${r}.created_at = ${createdAt}` : '';
  return `ON CREATE SET ${r}.first_seen_at = datetime($obs)${created}
    SET ${r}.last_seen_at = datetime($obs)`;
}

/**
 * Constraint queries for schema initialization
 */
export const SCHEMA_QUERIES = [
  'CREATE CONSTRAINT agent_name_unique IF NOT EXISTS FOR (a:Agent) REQUIRE a.name IS UNIQUE',
  'CREATE CONSTRAINT submolt_name_unique IF NOT EXISTS FOR (s:Submolt) REQUIRE s.name IS UNIQUE',
  'CREATE CONSTRAINT post_id_unique IF NOT EXISTS FOR (p:Post) REQUIRE p.id IS UNIQUE',
  'CREATE CONSTRAINT comment_id_unique IF NOT EXISTS FOR (c:Comment) REQUIRE c.id IS UNIQUE',
  'CREATE CONSTRAINT xaccount_handle_unique IF NOT EXISTS FOR (x:XAccount) REQUIRE x.handle IS UNIQUE',
  'CREATE CONSTRAINT crawl_id_unique IF NOT EXISTS FOR (cr:Crawl) REQUIRE cr.id IS UNIQUE',
  'CREATE CONSTRAINT feed_snapshot_id_unique IF NOT EXISTS FOR (fs:FeedSnapshot) REQUIRE fs.id IS UNIQUE',
  'CREATE INDEX agent_profile_fetched_idx IF NOT EXISTS FOR (a:Agent) ON (a.profile_last_fetched_at)',
  'CREATE INDEX crawl_cutoff_idx IF NOT EXISTS FOR (cr:Crawl) ON (cr.cutoff)',
] as const;

/**
 * Crawl bookkeeping
 */
export const CRAWL_QUERIES = {
  begin: `
    MERGE (cr:Crawl {id: $id})
    ON CREATE SET cr.started_at = datetime($startedAt),
                  cr.cutoff = datetime($startedAt),
                  cr.since = CASE WHEN $since IS NULL THEN NULL ELSE datetime($since) END,
                  cr.first_seen_at = datetime($startedAt),
                  cr.created_at = datetime($startedAt)
    SET cr.mode = $mode,
        cr.last_seen_at = datetime($startedAt),
        cr.last_updated_at = datetime($startedAt)
  `,

  end: `
    MATCH (cr:Crawl {id: $id})
    SET cr.ended_at = datetime($endedAt),
        cr.last_updated_at = datetime($endedAt)
  `,

  latestCutoff: `
    MATCH (cr:Crawl)
    WHERE cr.cutoff IS NOT NULL AND cr.ended_at IS NOT NULL
    RETURN toString(cr.cutoff) AS cutoff
    ORDER BY cr.cutoff DESC
    LIMIT 1
  `,

  getCheckpoint: `
    MATCH (cr:Crawl {id: $id})
    RETURN coalesce(cr[$key], 0) AS offset
  `,

  setCheckpoint: `
    MATCH (cr:Crawl {id: $id})
    WHERE coalesce(cr[$key], 0) <= $offset
    SET cr += $checkpoint,
        cr.last_updated_at = datetime($now)
  `,

  agentsNeedingProfile: `
    MATCH (a:Agent)
    WHERE a.name IS NOT NULL
      AND (a.profile_last_fetched_at IS NULL
           OR a.profile_last_fetched_at < datetime($now) - duration({days: $days}))
    RETURN a.name AS name
    ORDER BY coalesce(a.profile_last_fetched_at, datetime("1970-01-01T00:00:00Z")) ASC, a.name ASC
    LIMIT $limit
  `,
} as const;

/**
 * Node upserts
 */
export const NODE_QUERIES = {
  agents: `
    UNWIND $rows AS row
    MERGE (a:Agent {name: row.name})
    ${onCreate('a', 'row.created_at')}
    SET ${agentFields('a', 'row')},
        a.profile_last_fetched_at = CASE WHEN $markProfile THEN datetime($obs) ELSE a.profile_last_fetched_at END
  `,

  submolts: `
    UNWIND $rows AS row
    MERGE (s:Submolt {name: row.name})
    ${onCreate('s', 'row.created_at')}
    SET s.last_seen_at = datetime($obs),
        s.id = coalesce(row.id, s.id),
        s.display_name = coalesce(row.display_name, s.display_name),
        s.description = coalesce(row.description, s.description),
        s.avatar_url = coalesce(row.avatar_url, s.avatar_url),
        s.banner_url = coalesce(row.banner_url, s.banner_url),
        s.banner_color = coalesce(row.banner_color, s.banner_color),
        s.theme_color = coalesce(row.theme_color, s.theme_color),
        s.subscriber_count = coalesce(row.subscriber_count, s.subscriber_count),
        s.post_count = coalesce(row.post_count, s.post_count),
        s.created_at = ${datetimeOr('row.created_at', 's.created_at')},
        s.updated_at = ${datetimeOr('row.updated_at', 's.updated_at')}
  `,

  posts: `
    UNWIND $rows AS row
    MERGE (p:Post {id: row.id})
    ${onCreate('p', 'row.created_at')}
    SET p.last_seen_at = datetime($obs),
        p.title = coalesce(row.title, p.title),
        p.content = coalesce(row.content, p.content),
        p.url = coalesce(row.url, p.url),
        p.submolt = coalesce(row.submolt, p.submolt),
        p.submolt_id = coalesce(row.submolt_id, p.submolt_id),
        p.type = coalesce(row.type, p.type),
        p.score = coalesce(row.score, p.score),
        p.upvotes = coalesce(row.upvotes, p.upvotes),
        p.downvotes = coalesce(row.downvotes, p.downvotes),
        p.comment_count = coalesce(row.comment_count, p.comment_count),
        p.hot_score = coalesce(row.hot_score, p.hot_score),
        p.is_pinned = coalesce(row.is_pinned, p.is_pinned),
        p.is_locked = coalesce(row.is_locked, p.is_locked),
        p.is_deleted = coalesce(row.is_deleted, p.is_deleted),
        p.is_spam = coalesce(row.is_spam, p.is_spam),
        p.verification_status = coalesce(row.verification_status, p.verification_status),
        p.created_at = ${datetimeOr('row.created_at', 'p.created_at')},
        p.updated_at = ${datetimeOr('row.updated_at', 'p.updated_at')}
  `,

  comments: `
    UNWIND $rows AS row
    MERGE (c:Comment {id: row.id})
    ${onCreate('c', 'row.created_at')}
    SET c.last_seen_at = datetime($obs),
        c.post_id = coalesce(row.post_id, c.post_id),
        c.parent_id = coalesce(row.parent_id, c.parent_id),
        c.content = coalesce(row.content, c.content),
        c.score = coalesce(row.score, c.score),
        c.upvotes = coalesce(row.upvotes, c.upvotes),
        c.downvotes = coalesce(row.downvotes, c.downvotes),
        c.reply_count = coalesce(row.reply_count, c.reply_count),
        c.depth = coalesce(row.depth, c.depth),
        c.is_deleted = coalesce(row.is_deleted, c.is_deleted),
        c.is_spam = coalesce(row.is_spam, c.is_spam),
        c.verification_status = coalesce(row.verification_status, c.verification_status),
        c.created_at = ${datetimeOr('row.created_at', 'c.created_at')},
        c.updated_at = ${datetimeOr('row.updated_at', 'c.updated_at')}
  `,

  ownerAccount: `
    MERGE (a:Agent {name: $agent})
    ${onCreate('a')}
    SET a.last_seen_at = datetime($obs),
        a.owner_twitter_handle = coalesce(a.owner_twitter_handle, $account.handle)
    MERGE (x:XAccount {handle: $account.handle})
    ${onCreate('x')}
    SET x.last_seen_at = datetime($obs),
        x.url = coalesce($account.url, x.url),
        x.name = coalesce($account.name, x.name),
        x.bio = coalesce($account.bio, x.bio),
        x.avatar_url = coalesce($account.avatar_url, x.avatar_url),
        x.follower_count = coalesce($account.follower_count, x.follower_count),
        x.following_count = coalesce($account.following_count, x.following_count),
        x.is_verified = coalesce($account.is_verified, x.is_verified)
    MERGE (a)-[r:HAS_OWNER_X]->(x)
    ${edgeStamp('r')}
  `,

  feedSnapshot: `
    MERGE (fs:FeedSnapshot {id: $id})
    ON CREATE SET fs.first_seen_at = datetime($obs),
                  fs.created_at = datetime($obs),
                  fs.observed_at = datetime($obs)
    SET fs.last_seen_at = datetime($obs),
        fs.sort = $sort
    WITH fs
    UNWIND $rows AS row
    MERGE (p:Post {id: row.id})
    ${onCreate('p', 'row.created_at')}
    SET p.last_seen_at = datetime($obs),
        p.title = coalesce(row.title, p.title),
        p.submolt = coalesce(row.submolt, p.submolt),
        p.score = coalesce(row.score, p.score)
    MERGE (fs)-[r:CONTAINS]->(p)
    ${edgeStamp('r')},
        r.rank = row.rank
  `,
} as const;

/**
 * Edges derived from post and comment rows
 */
export const EDGE_QUERIES = {
  postAuthors: `
    UNWIND $rows AS row
    WITH row WHERE row.author IS NOT NULL
    MERGE (a:Agent {name: row.author.name})
    ${onCreate('a', 'row.author.created_at')}
    SET ${agentFields('a', 'row.author')}
    WITH row, a
    MATCH (p:Post {id: row.id})
    MERGE (a)-[r:AUTHORED]->(p)
    ${edgeStamp('r', 'p.created_at')}
  `,

  postSubmolts: `
    UNWIND $rows AS row
    WITH row WHERE row.submolt IS NOT NULL
    MERGE (s:Submolt {name: row.submolt})
    ${onCreate('s')}
    SET s.last_seen_at = datetime($obs),
        s.id = coalesce(row.submolt_id, s.id)
    WITH row, s
    MATCH (p:Post {id: row.id})
    MERGE (p)-[r:IN_SUBMOLT]->(s)
    ${edgeStamp('r', 'p.created_at')}
  `,

  commentAuthors: `
    UNWIND $rows AS row
    WITH row WHERE row.author IS NOT NULL
    MERGE (a:Agent {name: row.author.name})
    ${onCreate('a', 'row.author.created_at')}
    SET ${agentFields('a', 'row.author')}
    WITH row, a
    MATCH (c:Comment {id: row.id})
    MERGE (a)-[r:AUTHORED]->(c)
    ${edgeStamp('r', 'c.created_at')}
  `,

  commentPosts: `
    UNWIND $rows AS row
    MATCH (c:Comment {id: row.id})
    MERGE (p:Post {id: row.post_id})
    ${onCreate('p')}
    SET p.last_seen_at = datetime($obs)
    MERGE (c)-[r:ON_POST]->(p)
    ${edgeStamp('r', 'c.created_at')}
  `,

  commentReplies: `
    UNWIND $rows AS row
    WITH row WHERE row.parent_id IS NOT NULL
    MATCH (c:Comment {id: row.id})
    MERGE (parent:Comment {id: row.parent_id})
    ON CREATE SET parent.first_seen_at = datetime($obs),
                  parent.created_at = datetime($obs),
                  parent.last_seen_at = datetime($obs)
    MERGE (c)-[r:REPLY_TO]->(parent)
    ${edgeStamp('r', 'c.created_at')}
  `,
} as const;

/**
 * Time-varying edge sets: phase 1 closes, phase 2 merges/reopens
 */
export const RECONCILE_QUERIES = {
  closeModerators: `
    MATCH (a:Agent)-[r:MODERATES]->(s:Submolt {name: $submolt})
    WHERE r.ended_at IS NULL AND NOT a.name IN $current
    SET r.ended_at = datetime($obs)
  `,

  mergeModerators: `
    MERGE (s:Submolt {name: $submolt})
    ${onCreate('s')}
    SET s.last_seen_at = datetime($obs)
    WITH s
    UNWIND $rows AS row
    MERGE (a:Agent {name: row.name})
    ${onCreate('a')}
    SET a.last_seen_at = datetime($obs),
        a.display_name = coalesce(row.display_name, a.display_name)
    MERGE (a)-[r:MODERATES]->(s)
    ON CREATE SET r.first_seen_at = datetime($obs),
                  r.role = coalesce(row.role, '${DEFAULT_MODERATOR_ROLE}')
    SET r.last_seen_at = datetime($obs),
        r.role = coalesce(row.role, r.role),
        r.ended_at = NULL
  `,

  closeSimilar: `
    MATCH (a:Agent {name: $agent})-[r:SIMILAR_TO {source: $source}]->(b:Agent)
    WHERE r.ended_at IS NULL AND NOT b.name IN $current
    SET r.ended_at = datetime($obs)
  `,

  mergeSimilar: `
    MERGE (a:Agent {name: $agent})
    ${onCreate('a')}
    SET a.last_seen_at = datetime($obs)
    WITH a
    UNWIND $current AS other
    MERGE (b:Agent {name: other})
    ${onCreate('b')}
    SET b.last_seen_at = datetime($obs)
    MERGE (a)-[r:SIMILAR_TO {source: $source}]->(b)
    ${edgeStamp('r')},
        r.ended_at = NULL
  `,
} as const;
