import { describe, it, expect } from 'vitest';
import {
  normalizeValue,
  parseFrontmatterBlock,
  splitFrontmatter,
  toFrontmatterEntries,
} from '../../../src/extraction/frontmatter.js';

describe('splitFrontmatter', () => {
  it('splits a YAML block', () => {
    expect(splitFrontmatter('---\ntitle: Hello\n---\nBody')).toEqual({
      format: 'yaml',
      raw: 'title: Hello',
      body: 'Body',
    });
  });

  it('splits a TOML block', () => {
    expect(splitFrontmatter('+++\ntitle = "T"\n+++\nbody')).toEqual({
      format: 'toml',
      raw: 'title = "T"',
      body: 'body',
    });
  });

  it('keeps the braces of a JSON block', () => {
    expect(splitFrontmatter('{\n"title": "J"\n}\nbody')).toEqual({
      format: 'json',
      raw: '{\n"title": "J"\n}',
      body: 'body',
    });
  });

  it('treats an unclosed block as body text', () => {
    const text = '---\ntitle: x\nbody';
    expect(splitFrontmatter(text)).toEqual({ format: null, raw: '', body: text });
  });

  it('normalizes CRLF line endings', () => {
    expect(splitFrontmatter('---\r\na: 1\r\n---\r\nb').body).toBe('b');
  });
});

describe('parseFrontmatterBlock', () => {
  it('reports malformed YAML instead of throwing', () => {
    const result = parseFrontmatterBlock(splitFrontmatter('---\ntitle: [oops\n---\nbody'));
    expect(result.ok).toBe(false);
  });

  it('rejects a block that is not a mapping', () => {
    const result = parseFrontmatterBlock(splitFrontmatter('---\n- a\n- b\n---\nbody'));
    expect(result).toEqual({ ok: false, reason: 'YAML frontmatter must be a mapping of keys to values' });
  });

  it('reads unquoted wikilink values as strings', () => {
    const result = parseFrontmatterBlock(splitFrontmatter('---\nrelated: [[Other Note]]\n---\n'));
    expect(result).toEqual({ ok: true, data: { related: '[[Other Note]]' } });
  });

  it('treats an empty block as no frontmatter', () => {
    expect(parseFrontmatterBlock(splitFrontmatter('---\n---\nbody'))).toEqual({ ok: true, data: {} });
  });
});

describe('normalizeValue', () => {
  it('classifies scalar values', () => {
    expect(normalizeValue(42)).toEqual({ value: '42', type: 'number' });
    expect(normalizeValue(true)).toEqual({ value: 'true', type: 'boolean' });
    expect(normalizeValue('plain')).toEqual({ value: 'plain', type: 'string' });
    expect(normalizeValue(null)).toEqual({ value: '', type: 'string' });
  });

  it('recognizes dates in strings and Date objects', () => {
    expect(normalizeValue('2024-01-15')).toEqual({ value: '2024-01-15', type: 'date' });
    expect(normalizeValue(new Date('2024-01-15T00:00:00Z'))).toEqual({
      value: '2024-01-15T00:00:00.000Z',
      type: 'date',
    });
  });

  it('renders arrays and objects as JSON', () => {
    expect(normalizeValue(['a', 'b'])).toEqual({ value: '["a","b"]', type: 'array' });
    expect(normalizeValue({ a: 1 })).toEqual({ value: '{"a":1}', type: 'object' });
  });

  it('flattens top-level keys into entries', () => {
    expect(toFrontmatterEntries({ title: 'T', draft: false })).toEqual([
      { key: 'title', value: 'T', type: 'string' },
      { key: 'draft', value: 'false', type: 'boolean' },
    ]);
  });
});
