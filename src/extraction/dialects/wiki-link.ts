/**
 * Wiki-style markdown: `[[Target|alias]]` cross references and
 * `#[[Multi Word]]` bracketed tags
 */

import { MarkdownDialect } from './base.js';
import { rawBracketTags } from '../tags.js';
import type { LinkSyntax } from '../links.js';
import type { FrontmatterData } from '../frontmatter.js';

const WIKILINK_PRESENT = /\[\[[^[\]\n]+\]\]/;

export class WikiLinkDialect extends MarkdownDialect {
  readonly name: string = 'wikilink';

  protected override readonly linkSyntax: LinkSyntax = {
    wikilinks: true,
    embeds: false,
    shortcodes: false,
  };

  canHandle(_path: string, text: string): boolean {
    return WIKILINK_PRESENT.test(text);
  }

  protected override dialectTags(body: string, _frontmatter: FrontmatterData): string[] {
    return rawBracketTags(body);
  }
}
