// JSON as it arrives from the wire
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
export type QueryParams = Record<string, string | number | boolean | null | undefined>;

export type CrawlMode = 'full' | 'incremental';

// A (sort, time-window) pagination stream
export interface View {
  sort: string;
  time: string | null;
}

// Normalized graph rows. Every property is nullable: null means "not observed"
// and never overwrites a stored value.
export interface AgentRow {
  name: string;
  id: string | null;
  display_name: string | null;
  description: string | null;
  avatar_url: string | null;
  status: string | null;
  karma: number | null;
  follower_count: number | null;
  following_count: number | null;
  is_claimed: boolean | null;
  is_active: boolean | null;
  owner_twitter_id: string | null;
  owner_twitter_handle: string | null;
  created_at: string | null;
  claimed_at: string | null;
  last_active: string | null;
  updated_at: string | null;
}

export interface SubmoltRow {
  name: string;
  id: string | null;
  display_name: string | null;
  description: string | null;
  avatar_url: string | null;
  banner_url: string | null;
  banner_color: string | null;
  theme_color: string | null;
  subscriber_count: number | null;
  post_count: number | null;
  created_at: string | null;
  updated_at: string | null;
}

export interface PostRow {
  id: string;
  title: string | null;
  content: string | null;
  url: string | null;
  submolt: string | null;
  submolt_id: string | null;
  type: string | null;
  score: number | null;
  upvotes: number | null;
  downvotes: number | null;
  comment_count: number | null;
  hot_score: number | null;
  is_pinned: boolean | null;
  is_locked: boolean | null;
  // Opaque moderation tags, stored as received
  is_deleted: JsonPrimitive;
  is_spam: JsonPrimitive;
  verification_status: JsonPrimitive;
  created_at: string | null;
  updated_at: string | null;
  author: AgentRow | null;
}

export interface CommentRow {
  id: string;
  post_id: string;
  parent_id: string | null;
  content: string | null;
  score: number | null;
  upvotes: number | null;
  downvotes: number | null;
  reply_count: number | null;
  depth: number | null;
  is_deleted: JsonPrimitive;
  is_spam: JsonPrimitive;
  verification_status: JsonPrimitive;
  created_at: string | null;
  updated_at: string | null;
  author: AgentRow | null;
}

export interface ModeratorRow {
  name: string;
  display_name: string | null;
  role: string | null;
}

export interface XAccountRow {
  handle: string;
  url: string | null;
  name: string | null;
  bio: string | null;
  avatar_url: string | null;
  follower_count: number | null;
  following_count: number | null;
  is_verified: boolean | null;
}

export interface FeedEntryRow {
  id: string;
  title: string | null;
  submolt: string | null;
  score: number | null;
  created_at: string | null;
  rank: number;
}

export type NodeLabel = 'Agent' | 'Submolt' | 'Post' | 'Comment' | 'XAccount' | 'Crawl' | 'FeedSnapshot';

export type RelationshipType =
  | 'AUTHORED'
  | 'IN_SUBMOLT'
  | 'ON_POST'
  | 'REPLY_TO'
  | 'MODERATES'
  | 'SIMILAR_TO'
  | 'HAS_OWNER_X'
  | 'CONTAINS';
