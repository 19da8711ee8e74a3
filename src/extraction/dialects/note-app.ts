/**
 * Personal knowledge-base notes (vault-style apps)
 *
 * Adds `![[embed]]` transclusions and `tags:: a, b` inline property lines on
 * top of the wiki dialect. Recognized by markers no other dialect uses:
 * embeds, callouts, block ids, inline fields and alias/css frontmatter keys.
 */

import { WikiLinkDialect } from './wiki-link.js';
import { rawBracketTags } from '../tags.js';
import { splitFrontmatter, type FrontmatterData } from '../frontmatter.js';
import type { LinkSyntax } from '../links.js';

const MARKERS = [
  /!\[\[[^[\]\n]+\]\]/,
  /^[ \t]*>[ \t]*\[![A-Za-z-]+\]/m,
  /[ \t]\^[A-Za-z0-9-]+[ \t]*$/m,
  /^[ \t]*[A-Za-z_][\w-]*::[ \t]/m,
];

const NOTE_APP_KEYS = /^(?:aliases|cssclass|cssclasses|publish)[ \t]*:/m;

const TAG_PROPERTY = /^[ \t]*tags::[ \t]*(.+)$/gm;

export class NoteAppDialect extends WikiLinkDialect {
  override readonly name: string = 'note-app';

  protected override readonly linkSyntax: LinkSyntax = {
    wikilinks: true,
    embeds: true,
    shortcodes: false,
  };

  override canHandle(_path: string, text: string): boolean {
    if (MARKERS.some((marker) => marker.test(text))) {
      return true;
    }
    const split = splitFrontmatter(text);
    return split.format === 'yaml' && NOTE_APP_KEYS.test(split.raw);
  }

  protected override dialectTags(body: string, _frontmatter: FrontmatterData): string[] {
    const tags = rawBracketTags(body);
    for (const match of body.matchAll(TAG_PROPERTY)) {
      for (const part of (match[1] ?? '').split(',')) {
        tags.push(part.trim());
      }
    }
    return tags;
  }
}
