import { describe, it, expect } from 'vitest';
import { DialectRegistry, createDialectRegistry } from '../../../src/extraction/registry.js';
import { MarkdownDialect } from '../../../src/extraction/dialects/base.js';
import type { ExtractedDocument } from '../../../src/extraction/types.js';

const encode = (text: string): Uint8Array => Buffer.from(text, 'utf-8');

function extractOk(registry: DialectRegistry, path: string, text: string): ExtractedDocument {
  const outcome = registry.extract(path, encode(text));
  if (!outcome.success) {
    throw new Error(`expected success, got ${outcome.failure.code}`);
  }
  return outcome.document;
}

class JournalDialect extends MarkdownDialect {
  readonly name = 'journal';

  canHandle(path: string): boolean {
    return path.includes('/journal/');
  }
}

describe('DialectRegistry', () => {
  const registry = new DialectRegistry();

  it('lists dialects in dispatch order with the fallback last', () => {
    expect(registry.getDialectNames()).toEqual(['note-app', 'static-site', 'wikilink', 'generic']);
  });

  it('rejects a second dialect with the same name', () => {
    const fresh = new DialectRegistry();
    expect(() => fresh.register(new JournalDialect())).not.toThrow();
    expect(() => fresh.register(new JournalDialect())).toThrow('Dialect already registered: journal');
  });

  it('consults extra dialects first', () => {
    const custom = createDialectRegistry([new JournalDialect()]);
    expect(custom.getDialectNames()[0]).toBe('journal');
    expect(extractOk(custom, '/vault/journal/day.md', 'See [[Other]]').dialect).toBe('journal');
  });

  it('extracts plain markdown with the generic dialect', () => {
    const doc = extractOk(registry, '/docs/notes/a.md', '# Heading\n\nSome #tag text');
    expect(doc.dialect).toBe('generic');
    expect(doc.title).toBe('Heading');
    expect(doc.tags).toEqual([{ tag: 'tag', source: 'content' }]);
    expect(doc.links).toEqual([]);
    expect(doc.wordCount).toBe(4);
    expect(doc.frontmatterFormat).toBeNull();
  });

  it('recognizes wiki-style documents', () => {
    const doc = extractOk(registry, '/docs/b.md', 'See [[Other]] #topic');
    expect(doc.dialect).toBe('wikilink');
    expect(doc.title).toBe('b');
    expect(doc.tags).toEqual([{ tag: 'topic', source: 'content' }]);
    expect(doc.links).toEqual([
      { text: 'Other', target: 'Other', kind: 'wikilink', isInternal: true },
    ]);
  });

  it('recognizes note-app documents and their inline tag properties', () => {
    const doc = extractOk(
      registry,
      '/vault/idea.md',
      'tags:: Alpha, beta two\nSee ![[pic.png]] and #[[Big Idea]]'
    );
    expect(doc.dialect).toBe('note-app');
    expect(doc.tags).toEqual([
      { tag: 'alpha', source: 'dialect' },
      { tag: 'beta-two', source: 'dialect' },
      { tag: 'big-idea', source: 'dialect' },
    ]);
    expect(doc.links).toEqual([
      { text: null, target: 'pic.png', kind: 'embed', isInternal: true },
      { text: 'Big Idea', target: 'Big Idea', kind: 'wikilink', isInternal: true },
    ]);
  });

  it('recognizes static-site documents with TOML frontmatter', () => {
    const text = [
      '+++',
      'title = "Post"',
      'categories = ["News"]',
      'tags = ["Go"]',
      '+++',
      'See {{< ref "other.md" >}}',
    ].join('\n');
    const doc = extractOk(registry, '/site/content/post.md', text);

    expect(doc.dialect).toBe('static-site');
    expect(doc.frontmatterFormat).toBe('toml');
    expect(doc.title).toBe('Post');
    expect(doc.frontmatter).toEqual([
      { key: 'title', value: 'Post', type: 'string' },
      { key: 'categories', value: '["News"]', type: 'array' },
      { key: 'tags', value: '["Go"]', type: 'array' },
    ]);
    expect(doc.tags).toEqual([
      { tag: 'go', source: 'frontmatter' },
      { tag: 'news', source: 'dialect' },
    ]);
    expect(doc.links).toEqual([
      { text: null, target: 'other.md', kind: 'shortcode', isInternal: true },
    ]);
    expect(doc.body).toBe('See {{< ref "other.md" >}}');
    expect(doc.wordCount).toBe(1);
  });

  it('indexes a document with malformed frontmatter and warns', () => {
    const doc = extractOk(registry, '/docs/bad.md', '---\ntitle: [oops\n---\n# Heading\nbody');
    expect(doc.title).toBe('Heading');
    expect(doc.frontmatter).toEqual([]);
    expect(doc.warnings).toHaveLength(1);
    expect(doc.warnings[0]?.code).toBe('MALFORMED_FRONTMATTER');
  });

  it('prefers the frontmatter title over the first heading', () => {
    const doc = extractOk(registry, '/docs/t.md', '---\ntitle: " Given "\n---\n# Heading');
    expect(doc.title).toBe('Given');
  });

  it('drops a leading byte order mark', () => {
    const doc = extractOk(registry, '/docs/bom.md', '\ufeff# Marked');
    expect(doc.title).toBe('Marked');
  });

  it('fails on bytes that are not UTF-8', () => {
    const outcome = registry.extract('/docs/bin.md', new Uint8Array([0xff, 0xfe, 0xfd]));
    expect(outcome.success).toBe(false);
    if (!outcome.success) {
      expect(outcome.failure.code).toBe('DECODE_FAILED');
      expect(outcome.failure.path).toBe('/docs/bin.md');
    }
  });

  it('fails on text holding NUL bytes', () => {
    const outcome = registry.extract('/docs/nul.md', encode('abc\u0000def'));
    expect(outcome).toEqual({
      success: false,
      failure: { path: '/docs/nul.md', code: 'BINARY_CONTENT', message: 'File contains NUL bytes' },
    });
  });
});
