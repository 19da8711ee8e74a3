import { describe, it, expect } from 'vitest';
import { extractLinks, isInternalTarget } from '../../../src/extraction/links.js';

const STANDARD = { wikilinks: false, embeds: false, shortcodes: false };

describe('extractLinks', () => {
  it('extracts standard markdown links in document order', () => {
    const body = [
      'A [site](https://example.com) and [doc](./other.md "T") plus <https://auto.example>',
      'and https://bare.example/path. Also [ref][r1] and [r2].',
      '',
      '[r1]: https://ref.example',
      '[r2]: notes/r2.md',
      '',
    ].join('\n');

    expect(extractLinks(body, STANDARD)).toEqual([
      { text: 'site', target: 'https://example.com', kind: 'markdown', isInternal: false },
      { text: 'doc', target: './other.md', kind: 'markdown', isInternal: true },
      { text: null, target: 'https://auto.example', kind: 'autolink', isInternal: false },
      { text: null, target: 'https://bare.example/path', kind: 'autolink', isInternal: false },
      { text: 'ref', target: 'https://ref.example', kind: 'reference', isInternal: false },
      { text: 'r2', target: 'notes/r2.md', kind: 'reference', isInternal: true },
    ]);
  });

  it('records images as embeds', () => {
    expect(extractLinks('![diagram](img/d.png)', STANDARD)).toEqual([
      { text: 'diagram', target: 'img/d.png', kind: 'embed', isInternal: true },
    ]);
  });

  it('extracts wikilinks and embeds when the dialect enables them', () => {
    const body = 'See [[Target Note|Alias]] and [[Plain]] and ![[image.png]]';
    expect(extractLinks(body, { wikilinks: true, embeds: true, shortcodes: false })).toEqual([
      { text: 'Alias', target: 'Target Note', kind: 'wikilink', isInternal: true },
      { text: 'Plain', target: 'Plain', kind: 'wikilink', isInternal: true },
      { text: null, target: 'image.png', kind: 'embed', isInternal: true },
    ]);
  });

  it('leaves wikilinks alone in standard markdown', () => {
    expect(extractLinks('See [[Plain]]', STANDARD)).toEqual([]);
  });

  it('extracts static-site cross references', () => {
    const body = '{{< ref "posts/a.md" >}} and {% link _posts/b.md %}';
    expect(extractLinks(body, { wikilinks: false, embeds: false, shortcodes: true })).toEqual([
      { text: null, target: 'posts/a.md', kind: 'shortcode', isInternal: true },
      { text: null, target: '_posts/b.md', kind: 'shortcode', isInternal: true },
    ]);
  });
});

describe('isInternalTarget', () => {
  it('treats URLs with a scheme as external', () => {
    expect(isInternalTarget('https://example.com')).toBe(false);
    expect(isInternalTarget('mailto:someone@example.com')).toBe(false);
    expect(isInternalTarget('//cdn.example.com/x.js')).toBe(false);
  });

  it('treats relative paths and anchors as internal', () => {
    expect(isInternalTarget('notes/a.md')).toBe(true);
    expect(isInternalTarget('#section')).toBe(true);
  });
});
