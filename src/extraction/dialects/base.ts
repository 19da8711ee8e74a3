/**
 * Base markdown dialect
 *
 * A dialect declares whether it recognizes a document (`canHandle`) and
 * turns decoded text into an ExtractedDocument (`parse`). Subclasses tune the
 * link syntax and contribute dialect-specific tags through hooks.
 */

import { basename, extname } from 'node:path';
import {
  splitFrontmatter,
  parseFrontmatterBlock,
  toFrontmatterEntries,
  type FrontmatterData,
} from '../frontmatter.js';
import { extractHeadings, toPlainText, countWords } from '../markdown.js';
import { extractLinks, type LinkSyntax } from '../links.js';
import {
  FRONTMATTER_TAG_KEYS,
  dedupeTags,
  rawFrontmatterTags,
  rawInlineTags,
  toTags,
} from '../tags.js';
import type {
  DialectName,
  ExtractedDocument,
  ExtractedTag,
  ExtractionWarning,
  Heading,
} from '../types.js';

export abstract class MarkdownDialect {
  abstract readonly name: DialectName;

  /**
   * Link forms recognized beyond standard markdown
   */
  protected readonly linkSyntax: LinkSyntax = {
    wikilinks: false,
    embeds: false,
    shortcodes: false,
  };

  /**
   * Frontmatter keys whose values become `frontmatter` tags
   */
  protected readonly frontmatterTagKeys: readonly string[] = FRONTMATTER_TAG_KEYS;

  /**
   * Whether this dialect recognizes the document
   */
  abstract canHandle(path: string, text: string): boolean;

  /**
   * Tags only this dialect understands (source `dialect`)
   */
  protected dialectTags(_body: string, _frontmatter: FrontmatterData): string[] {
    return [];
  }

  /**
   * Extract the structured record. Malformed frontmatter becomes a warning.
   */
  parse(path: string, text: string): ExtractedDocument {
    const warnings: ExtractionWarning[] = [];
    const split = splitFrontmatter(text);
    const parsed = parseFrontmatterBlock(split);

    let data: FrontmatterData = {};
    if (parsed.ok) {
      data = parsed.data;
    } else {
      warnings.push({ path, code: 'MALFORMED_FRONTMATTER', message: parsed.reason });
    }

    const body = split.body;
    const headings = extractHeadings(body);
    const tags: ExtractedTag[] = [
      ...toTags(rawFrontmatterTags(data, this.frontmatterTagKeys), 'frontmatter'),
      ...toTags(rawInlineTags(body), 'content'),
      ...toTags(this.dialectTags(body, data), 'dialect'),
    ];

    return {
      path,
      dialect: this.name,
      title: resolveTitle(path, data, headings),
      frontmatterFormat: split.format,
      frontmatter: toFrontmatterEntries(data),
      tags: dedupeTags(tags),
      links: extractLinks(body, this.linkSyntax),
      headings,
      body,
      wordCount: countWords(toPlainText(body)),
      warnings,
    };
  }
}

/**
 * Title from a `title` frontmatter string, else the first level-1 heading,
 * else the file name without its extension
 */
export function resolveTitle(
  path: string,
  frontmatter: FrontmatterData,
  headings: Heading[]
): string {
  const fromFrontmatter = frontmatter.title;
  if (typeof fromFrontmatter === 'string' && fromFrontmatter.trim() !== '') {
    return fromFrontmatter.trim();
  }
  const h1 = headings.find((heading) => heading.level === 1);
  if (h1 !== undefined) {
    return h1.text;
  }
  const file = basename(path);
  return file.slice(0, file.length - extname(file).length);
}
