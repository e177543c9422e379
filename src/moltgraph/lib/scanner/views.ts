import { View } from '../../core/types.js';

/**
 * Parse a view list such as `new:|top:day|hot` into (sort, time) pairs.
 * Empty segments are skipped; an empty time means "no time window".
 */
export function parseViews(list: string): View[] {
  const views: View[] = [];
  for (const part of list.split('|')) {
    const trimmed = part.trim();
    if (!trimmed) continue;
    const sep = trimmed.indexOf(':');
    const sort = (sep === -1 ? trimmed : trimmed.slice(0, sep)).trim();
    const time = sep === -1 ? '' : trimmed.slice(sep + 1).trim();
    if (!sort) continue;
    views.push({ sort, time: time || null });
  }
  return views;
}

export function viewKey(view: View): string {
  return `posts_offset_${view.sort}_${view.time ?? 'na'}`;
}

export function submoltFeedKey(submolt: string): string {
  return `submolt_feed_offset_${submolt}`;
}

export function describeView(view: View): string {
  return `sort=${view.sort} time=${view.time ?? '-'}`;
}

// Only the "new" ordering is reverse-chronological, so only it can stop at a cutoff
export function supportsCutoff(view: View): boolean {
  return view.sort === 'new';
}
