/**
 * Shape-tolerant readers for the upstream's drifting JSON envelopes.
 *
 * The API answers list endpoints with either a bare array or an object wrapping
 * the array under one of several key names, and the set of names has grown over
 * time. Nothing in here throws: an unexpected shape reads as empty.
 */

import { JsonObject, JsonValue } from '../../core/types.js';

export type WireResponse =
  | { shape: 'array'; items: JsonValue[] }
  | { shape: 'object'; body: JsonObject }
  | { shape: 'scalar'; value: JsonValue };

export const LIST_KEYS = {
  posts: ['posts', 'data', 'items', 'results'],
  submolts: ['submolts', 'data', 'items'],
  comments: ['comments', 'data', 'replies'],
  moderators: ['moderators', 'data', 'mods'],
} as const;

export const OBJECT_KEYS = {
  agent: ['agent', 'data'],
  submolt: ['submolt', 'data'],
  post: ['post', 'data'],
} as const;

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function classifyResponse(value: JsonValue): WireResponse {
  if (Array.isArray(value)) return { shape: 'array', items: value };
  if (isJsonObject(value)) return { shape: 'object', body: value };
  return { shape: 'scalar', value };
}

/**
 * Return the list of records carried by `value`: the value itself when it is an
 * array, else the first candidate key holding an array. Non-object items are dropped.
 */
export function extractList(value: JsonValue, candidateKeys: readonly string[]): JsonObject[] {
  const wire = classifyResponse(value);
  switch (wire.shape) {
    case 'array':
      return wire.items.filter(isJsonObject);
    case 'object':
      for (const key of candidateKeys) {
        const candidate = wire.body[key];
        if (Array.isArray(candidate)) {
          return candidate.filter(isJsonObject);
        }
      }
      return [];
    case 'scalar':
      return [];
  }
}

/**
 * Return the first candidate key holding an object, else the object itself, else `{}`.
 */
export function extractObject(value: JsonValue, candidateKeys: readonly string[]): JsonObject {
  const wire = classifyResponse(value);
  if (wire.shape !== 'object') return {};
  for (const key of candidateKeys) {
    const candidate = wire.body[key];
    if (isJsonObject(candidate)) {
      return candidate;
    }
  }
  return wire.body;
}

// --- scalar readers ---

/** First non-empty string among `keys`. Numbers are stringified (ids drift between the two). */
export function readString(obj: JsonObject, ...keys: string[]): string | null {
  for (const key of keys) {
    const v = obj[key];
    if (typeof v === 'string' && v !== '') return v;
    if (typeof v === 'number' && Number.isFinite(v)) return String(v);
  }
  return null;
}

/** First finite number among `keys`; numeric strings count. */
export function readNumber(obj: JsonObject, ...keys: string[]): number | null {
  for (const key of keys) {
    const v = obj[key];
    if (typeof v === 'number' && Number.isFinite(v)) return v;
    if (typeof v === 'string' && v.trim() !== '') {
      const n = Number(v);
      if (Number.isFinite(n)) return n;
    }
  }
  return null;
}

export function readInteger(obj: JsonObject, ...keys: string[]): number | null {
  const n = readNumber(obj, ...keys);
  return n !== null && Number.isInteger(n) ? n : null;
}

/**
 * First key that is present with a boolean-ish value. A present `false` wins over
 * a later key, which is why this does not use `||` chains.
 */
export function readBoolean(obj: JsonObject, ...keys: string[]): boolean | null {
  for (const key of keys) {
    const v = obj[key];
    if (typeof v === 'boolean') return v;
    if (v === 'true' || v === 1) return true;
    if (v === 'false' || v === 0) return false;
  }
  return null;
}

/** ISO timestamp string, or null when absent or unparseable. */
export function readTimestamp(obj: JsonObject, ...keys: string[]): string | null {
  for (const key of keys) {
    const v = obj[key];
    if (typeof v === 'string' && v !== '' && !Number.isNaN(Date.parse(v))) {
      return v;
    }
  }
  return null;
}

export function readObject(obj: JsonObject, key: string): JsonObject | null {
  const v = obj[key];
  return isJsonObject(v) ? v : null;
}

export interface PageInfo {
  hasMore: boolean | null;
  nextOffset: number | null;
}

export function readPageInfo(value: JsonValue): PageInfo {
  if (!isJsonObject(value)) {
    return { hasMore: null, nextOffset: null };
  }
  return {
    hasMore: readBoolean(value, 'has_more', 'hasMore'),
    nextOffset: readInteger(value, 'next_offset', 'nextOffset'),
  };
}
