/**
 * Static-site generator content (Hugo, Jekyll and similar)
 *
 * Taxonomy keys (`categories`, `series`) are reported as dialect tags and
 * `{{< ref >}}` / `{% link %}` cross references as shortcode links.
 */

import { MarkdownDialect } from './base.js';
import { rawFrontmatterTags } from '../tags.js';
import { splitFrontmatter, type FrontmatterData } from '../frontmatter.js';
import type { LinkSyntax } from '../links.js';

const SITE_KEYS = /^["']?(?:layout|permalink|draft|weight|slug|lastmod|publishDate|expiryDate)["']?[ \t]*[:=]/m;
const TEMPLATE_TAGS = /\{\{[<%]|\{%[ \t]*(?:link|post_url|include|highlight)\b/;
const SITE_DIRS = /(?:^|[\\/])_(?:posts|drafts)[\\/]/;

const TAXONOMY_KEYS = ['categories', 'category', 'series'] as const;

export class StaticSiteDialect extends MarkdownDialect {
  readonly name = 'static-site';

  protected override readonly linkSyntax: LinkSyntax = {
    wikilinks: false,
    embeds: false,
    shortcodes: true,
  };

  protected override readonly frontmatterTagKeys: readonly string[] = ['tags', 'tag', 'keywords'];

  canHandle(path: string, text: string): boolean {
    if (SITE_DIRS.test(path) || TEMPLATE_TAGS.test(text)) {
      return true;
    }
    const split = splitFrontmatter(text);
    if (split.format === 'toml') {
      return true;
    }
    return split.format !== null && SITE_KEYS.test(split.raw);
  }

  protected override dialectTags(_body: string, frontmatter: FrontmatterData): string[] {
    return rawFrontmatterTags(frontmatter, TAXONOMY_KEYS);
  }
}
