/**
 * Tag normalization and extraction
 *
 * Normalized form: lower case, whitespace runs become `-`, hierarchical
 * segments joined by `/`, letters/digits/`_`/`-` only, starting with a letter
 * and at least two characters long. Anything else normalizes to `''`.
 */

import type { ExtractedTag, TagSource } from './types.js';
import type { FrontmatterData } from './frontmatter.js';

/**
 * Frontmatter keys whose values are tags
 */
export const FRONTMATTER_TAG_KEYS = ['tags', 'tag', 'keywords', 'categories', 'category'] as const;

/**
 * `#tag` preceded by neither a word character, `/`, `#`, `&` nor a `](`
 * link opener
 */
const INLINE_TAG = /(?<![\p{L}\p{N}_/#&]|\]\()#([\p{L}\p{N}_][\p{L}\p{N}_/-]*)/gu;

function normalizeSegment(segment: string): string {
  return segment
    .trim()
    .replace(/\s+/g, '-')
    .replace(/[^\p{L}\p{N}_-]/gu, '')
    .replace(/-{2,}/g, '-')
    .replace(/^-+|-+$/g, '');
}

/**
 * Normalize a raw tag. Returns `''` when the input is not a usable tag.
 * Applying it to its own output returns the same value.
 */
export function normalizeTag(raw: string): string {
  const lowered = raw.trim().replace(/^#+/, '').toLowerCase();
  if (lowered === '') return '';

  const segments = lowered.split('/').map(normalizeSegment);
  if (segments.some((segment) => segment === '')) return '';

  const tag = segments.join('/');
  if (tag.length < 2 || !/^\p{L}/u.test(tag)) return '';
  return tag;
}

function compare(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Sort and deduplicate tags by (tag, source)
 */
export function dedupeTags(tags: ExtractedTag[]): ExtractedTag[] {
  const seen = new Map<string, ExtractedTag>();
  for (const entry of tags) {
    seen.set(`${entry.source}\u0000${entry.tag}`, entry);
  }
  return [...seen.values()].sort(
    (a, b) => compare(a.tag, b.tag) || compare(a.source, b.source)
  );
}

function collectStrings(value: unknown, out: string[]): void {
  if (typeof value === 'string') {
    for (const part of value.split(',')) {
      out.push(part);
    }
  } else if (typeof value === 'number') {
    out.push(String(value));
  } else if (Array.isArray(value)) {
    for (const item of value) {
      collectStrings(item, out);
    }
  }
}

/**
 * Raw tag strings found under the given frontmatter keys (case-insensitive)
 */
export function rawFrontmatterTags(data: FrontmatterData, keys: readonly string[]): string[] {
  const wanted = new Set(keys.map((key) => key.toLowerCase()));
  const out: string[] = [];
  for (const [key, value] of Object.entries(data)) {
    if (wanted.has(key.toLowerCase())) {
      collectStrings(value, out);
    }
  }
  return out;
}

/**
 * Normalize a list of raw tags into records of one source
 */
export function toTags(raw: Iterable<string>, source: TagSource): ExtractedTag[] {
  const tags: ExtractedTag[] = [];
  for (const value of raw) {
    const tag = normalizeTag(value.replace(/^\[\[|\]\]$/g, ''));
    if (tag !== '') {
      tags.push({ tag, source });
    }
  }
  return tags;
}

/**
 * Raw `#tag` tokens in a body. Code spans and fences are not excluded.
 */
export function rawInlineTags(body: string): string[] {
  const out: string[] = [];
  for (const match of body.matchAll(INLINE_TAG)) {
    const token = match[1];
    if (token !== undefined) {
      out.push(token.replace(/[/-]+$/, ''));
    }
  }
  return out;
}

/**
 * Raw `#[[Multi Word]]` bracketed tags
 */
export function rawBracketTags(body: string): string[] {
  const out: string[] = [];
  for (const match of body.matchAll(/(?<![\p{L}\p{N}_&])#\[\[([^\[\]\n]+)\]\]/gu)) {
    if (match[1] !== undefined) {
      out.push(match[1]);
    }
  }
  return out;
}
