/**
 * Run-wide accumulator of the submolts and agents referenced by crawled content.
 */

import { JsonObject } from '../../core/types.js';
import { isJsonObject } from '../api/response-normalizer.js';
import { walkCommentTree } from '../graph/comment-flattener.js';
import { authorName, mapModerator, moderatorAgentPayload, submoltName } from '../graph/row-mappers.js';

export interface ObservedModerators {
  names: string[];
  /** Agent payloads to upsert, one per moderator. */
  agents: JsonObject[];
}

export class EntityExtractor {
  private readonly submoltsByName = new Map<string, JsonObject>();
  private readonly agents = new Set<string>();

  /** Record the submolt and author of every post in a batch. */
  observePosts(posts: JsonObject[]): void {
    for (const post of posts) {
      this.observeSubmolt(post.submolt);
      const author = authorName(post);
      if (author) this.agents.add(author);
    }
  }

  /** Record the author of every comment in a nested reply tree. */
  observeComments(tree: JsonObject[]): void {
    for (const comment of walkCommentTree(tree)) {
      const author = authorName(comment);
      if (author) this.agents.add(author);
    }
  }

  observeModerators(entries: JsonObject[]): ObservedModerators {
    const names: string[] = [];
    const agents: JsonObject[] = [];
    for (const entry of entries) {
      const row = mapModerator(entry);
      if (!row) continue;
      names.push(row.name);
      this.agents.add(row.name);
      const payload = moderatorAgentPayload(entry);
      if (payload) agents.push(payload);
    }
    return { names, agents };
  }

  /**
   * A bare name registers `{ name }`; the non-null fields of an embedded object
   * are merged over what was already seen for that name.
   */
  observeSubmolt(value: unknown): void {
    const name = submoltName(value);
    if (!name) return;
    const known: JsonObject = this.submoltsByName.get(name) ?? { name };
    if (isJsonObject(value)) {
      for (const [key, field] of Object.entries(value)) {
        if (field !== null) known[key] = field;
      }
    }
    this.submoltsByName.set(name, known);
  }

  /** Richest payload seen per submolt, in discovery order. */
  submolts(): JsonObject[] {
    return [...this.submoltsByName.values()];
  }

  submoltNames(): string[] {
    return [...this.submoltsByName.keys()];
  }

  agentNames(): string[] {
    return [...this.agents];
  }
}
