/**
 * Tag normalization for new sessions.
 */

import { normalizeTag } from '../../store/session-store.js';

/**
 * Trim and lower-case tags, dropping empty ones and collapsing duplicates.
 * First-seen order is kept.
 */
export function normalizeTags(tags: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of tags) {
    const tag = normalizeTag(raw);
    if (!tag || seen.has(tag)) continue;
    seen.add(tag);
    result.push(tag);
  }
  return result;
}

/**
 * Split comma-separated tag arguments ("api,backend") into single tags.
 * Used by the CLI so `-t a,b` and `-t a -t b` mean the same.
 */
export function splitTagArgs(args: readonly string[]): string[] {
  return args.flatMap(arg => arg.split(','));
}
