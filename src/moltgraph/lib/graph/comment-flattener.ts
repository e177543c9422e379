import { JsonObject } from '../../core/types.js';
import { LIST_KEYS, extractList, readString } from '../api/response-normalizer.js';

export interface FlatComment {
  comment: JsonObject;
  parentId: string | null;
  depth: number;
}

/**
 * Flatten a nested reply tree into one entry per comment, in pre-order.
 *
 * Uses an explicit stack so arbitrarily deep threads cannot exhaust the call
 * stack. A `parent_id` on the payload wins over the tree position; roots
 * without one get `rootParentId`.
 */
export function flattenCommentTree(tree: JsonObject[], rootParentId: string | null = null): FlatComment[] {
  const flat: FlatComment[] = [];
  const stack: Array<{ node: JsonObject; parentId: string | null; depth: number }> = [];

  for (let i = tree.length - 1; i >= 0; i--) {
    stack.push({ node: tree[i], parentId: rootParentId, depth: 0 });
  }

  let entry = stack.pop();
  while (entry) {
    const { node, depth } = entry;
    const parentId = readString(node, 'parent_id', 'parentId') ?? entry.parentId;
    flat.push({ comment: node, parentId, depth });

    const replies = extractList(node.replies ?? [], LIST_KEYS.comments);
    const id = readString(node, 'id');
    for (let i = replies.length - 1; i >= 0; i--) {
      stack.push({ node: replies[i], parentId: id, depth: depth + 1 });
    }
    entry = stack.pop();
  }
  return flat;
}

/** Every comment in a reply tree, without parent bookkeeping. */
export function walkCommentTree(tree: JsonObject[]): JsonObject[] {
  return flattenCommentTree(tree).map(entry => entry.comment);
}
