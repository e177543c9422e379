/**
 * Field-mapping tables from upstream payloads to graph rows.
 *
 * Deployments disagree on camelCase vs snake_case, so every field lists the
 * names it has been observed under. A field missing from the payload maps to
 * null, which the stores read as "keep what is already stored".
 */

import { AgentRow, CommentRow, FeedEntryRow, JsonObject, JsonPrimitive, ModeratorRow, PostRow, SubmoltRow, XAccountRow } from '../../core/types.js';
import {
  isJsonObject,
  readBoolean,
  readInteger,
  readNumber,
  readObject,
  readString,
  readTimestamp,
} from '../api/response-normalizer.js';

/** Submolt reference as either a bare name or an embedded object. */
export function submoltName(value: unknown): string | null {
  if (typeof value === 'string') return value || null;
  if (isJsonObject(value)) return readString(value, 'name');
  return null;
}

/** Author name from `author: {name}`, `author: "name"` or `author_name`. */
export function authorName(obj: JsonObject): string | null {
  const author = obj.author;
  if (isJsonObject(author)) return readString(author, 'name');
  if (typeof author === 'string' && author) return author;
  return readString(obj, 'author_name', 'authorName');
}

export function mapAgent(obj: JsonObject): AgentRow | null {
  const name = readString(obj, 'name');
  if (!name) return null;
  return {
    name,
    id: readString(obj, 'id'),
    display_name: readString(obj, 'displayName', 'display_name'),
    description: readString(obj, 'description'),
    avatar_url: readString(obj, 'avatarUrl', 'avatar_url'),
    status: readString(obj, 'status'),
    karma: readNumber(obj, 'karma'),
    follower_count: readInteger(obj, 'followerCount', 'follower_count'),
    following_count: readInteger(obj, 'followingCount', 'following_count'),
    is_claimed: readBoolean(obj, 'isClaimed', 'is_claimed'),
    is_active: readBoolean(obj, 'isActive', 'is_active'),
    owner_twitter_id: readString(obj, 'owner_twitter_id', 'ownerTwitterId'),
    owner_twitter_handle: readString(obj, 'owner_twitter_handle', 'ownerTwitterHandle'),
    created_at: readTimestamp(obj, 'createdAt', 'created_at'),
    claimed_at: readTimestamp(obj, 'claimedAt', 'claimed_at'),
    last_active: readTimestamp(obj, 'lastActive', 'last_active'),
    updated_at: readTimestamp(obj, 'updatedAt', 'updated_at'),
  };
}

/** Embedded author of a post or comment; a bare string author yields a name-only row. */
function mapAuthor(obj: JsonObject): AgentRow | null {
  const author = readObject(obj, 'author');
  if (author) {
    const row = mapAgent(author);
    if (row) {
      return { ...row, id: row.id ?? readString(obj, 'author_id', 'authorId') };
    }
  }
  const name = authorName(obj);
  return name ? { ...emptyAgent(name), id: readString(obj, 'author_id', 'authorId') } : null;
}

export function emptyAgent(name: string): AgentRow {
  return {
    name,
    id: null,
    display_name: null,
    description: null,
    avatar_url: null,
    status: null,
    karma: null,
    follower_count: null,
    following_count: null,
    is_claimed: null,
    is_active: null,
    owner_twitter_id: null,
    owner_twitter_handle: null,
    created_at: null,
    claimed_at: null,
    last_active: null,
    updated_at: null,
  };
}

export function mapSubmolt(obj: JsonObject): SubmoltRow | null {
  const name = readString(obj, 'name');
  if (!name) return null;
  return {
    name,
    id: readString(obj, 'id'),
    display_name: readString(obj, 'displayName', 'display_name'),
    description: readString(obj, 'description'),
    avatar_url: readString(obj, 'avatarUrl', 'avatar_url'),
    banner_url: readString(obj, 'bannerUrl', 'banner_url'),
    banner_color: readString(obj, 'bannerColor', 'banner_color'),
    theme_color: readString(obj, 'themeColor', 'theme_color'),
    subscriber_count: readInteger(obj, 'subscriberCount', 'subscriber_count'),
    post_count: readInteger(obj, 'postCount', 'post_count'),
    created_at: readTimestamp(obj, 'createdAt', 'created_at'),
    updated_at: readTimestamp(obj, 'updatedAt', 'updated_at'),
  };
}

export function mapPost(obj: JsonObject): PostRow | null {
  const id = readString(obj, 'id');
  if (!id) return null;
  const submolt = obj.submolt;
  return {
    id,
    title: readString(obj, 'title'),
    content: readString(obj, 'content'),
    url: readString(obj, 'url'),
    submolt: submoltName(submolt) ?? readString(obj, 'submolt_name', 'submoltName'),
    submolt_id: (isJsonObject(submolt) ? readString(submolt, 'id') : null) ?? readString(obj, 'submolt_id', 'submoltId'),
    type: readString(obj, 'type'),
    score: readNumber(obj, 'score'),
    upvotes: readInteger(obj, 'upvotes'),
    downvotes: readInteger(obj, 'downvotes'),
    comment_count: readInteger(obj, 'comment_count', 'commentCount'),
    hot_score: readNumber(obj, 'hot_score', 'hotScore'),
    is_pinned: readBoolean(obj, 'is_pinned', 'isPinned'),
    is_locked: readBoolean(obj, 'is_locked', 'isLocked'),
    is_deleted: readOpaque(obj, 'is_deleted', 'isDeleted'),
    is_spam: readOpaque(obj, 'is_spam', 'isSpam'),
    verification_status: readOpaque(obj, 'verification_status', 'verificationStatus'),
    created_at: readTimestamp(obj, 'created_at', 'createdAt'),
    updated_at: readTimestamp(obj, 'updated_at', 'updatedAt'),
    author: mapAuthor(obj),
  };
}

/**
 * @param postId post the comment belongs to when the payload does not say
 * @param parentId immediate parent resolved from the reply tree
 * @param depth tree depth, used when the payload carries none
 */
export function mapComment(obj: JsonObject, postId: string, parentId: string | null, depth: number): CommentRow | null {
  const id = readString(obj, 'id');
  if (!id) return null;
  return {
    id,
    post_id: readString(obj, 'post_id', 'postId') ?? postId,
    parent_id: parentId,
    content: readString(obj, 'content'),
    score: readNumber(obj, 'score'),
    upvotes: readInteger(obj, 'upvotes'),
    downvotes: readInteger(obj, 'downvotes'),
    reply_count: readInteger(obj, 'reply_count', 'replyCount'),
    depth: readInteger(obj, 'depth') ?? depth,
    is_deleted: readOpaque(obj, 'is_deleted', 'isDeleted'),
    is_spam: readOpaque(obj, 'is_spam', 'isSpam'),
    verification_status: readOpaque(obj, 'verification_status', 'verificationStatus'),
    created_at: readTimestamp(obj, 'created_at', 'createdAt'),
    updated_at: readTimestamp(obj, 'updated_at', 'updatedAt'),
    author: mapAuthor(obj),
  };
}

/** Role given to a new MODERATES edge whose payload names none. */
export const DEFAULT_MODERATOR_ROLE = 'moderator';

/**
 * Moderator entries come as `{name}`, `{agent_name}`, `{agent: "name"}` or
 * `{agent: {name, ...}}`, each optionally with a `role`. A missing role stays
 * null so it never replaces a stored one.
 */
export function mapModerator(obj: JsonObject): ModeratorRow | null {
  const agent = obj.agent;
  let name = readString(obj, 'name', 'agent_name', 'agentName');
  let displayName = readString(obj, 'display_name', 'displayName');
  if (!name) {
    if (typeof agent === 'string' && agent) {
      name = agent;
    } else if (isJsonObject(agent)) {
      name = readString(agent, 'name', 'agent_name');
      displayName = displayName ?? readString(agent, 'displayName', 'display_name');
    }
  }
  if (!name) return null;
  return { name, display_name: displayName, role: readString(obj, 'role') };
}

/** The agent payload carried by a moderator entry, for a regular agent upsert. */
export function moderatorAgentPayload(obj: JsonObject): JsonObject | null {
  const agent = obj.agent;
  if (isJsonObject(agent)) return readString(agent, 'name') ? agent : null;
  const row = mapModerator(obj);
  if (!row) return null;
  return row.display_name ? { name: row.name, display_name: row.display_name } : { name: row.name };
}

export function cleanHandle(value: string | null): string | null {
  if (!value) return null;
  const handle = value.trim().replace(/^@+/, '').trim();
  return handle ? handle.toLowerCase() : null;
}

/** Owner object of an agent profile (`x_handle`, `x_name`, ...). */
export function mapXAccount(owner: JsonObject): XAccountRow | null {
  const handle = cleanHandle(readString(owner, 'x_handle', 'xHandle', 'handle'));
  if (!handle) return null;
  return {
    handle,
    url: readString(owner, 'x_url', 'xUrl', 'url') ?? `https://x.com/${handle}`,
    name: readString(owner, 'x_name', 'xName'),
    bio: readString(owner, 'x_bio', 'xBio'),
    avatar_url: readString(owner, 'x_avatar', 'xAvatar'),
    follower_count: readInteger(owner, 'x_follower_count', 'xFollowerCount'),
    following_count: readInteger(owner, 'x_following_count', 'xFollowingCount'),
    is_verified: readBoolean(owner, 'x_verified', 'xVerified'),
  };
}

/** Ranked feed membership; rank is the 1-based position in the response. */
export function mapFeedEntries(posts: JsonObject[]): FeedEntryRow[] {
  const rows: FeedEntryRow[] = [];
  posts.forEach((post, index) => {
    const id = readString(post, 'id');
    if (!id) return;
    rows.push({
      id,
      title: readString(post, 'title'),
      submolt: submoltName(post.submolt),
      score: readNumber(post, 'score'),
      created_at: readTimestamp(post, 'created_at', 'createdAt'),
      rank: index + 1,
    });
  });
  return rows;
}

/**
 * Opaque moderation tags are kept as received; nested values are stored as JSON
 * text since graph properties cannot hold maps.
 */
function readOpaque(obj: JsonObject, ...keys: string[]): JsonPrimitive {
  for (const key of keys) {
    const v = obj[key];
    if (v === undefined || v === null) continue;
    if (typeof v === 'object') return JSON.stringify(v);
    return v;
  }
  return null;
}
