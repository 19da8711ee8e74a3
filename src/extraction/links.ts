/**
 * Link extraction
 *
 * Each recognized construct is blanked out of a working copy once matched,
 * so a URL inside `[text](url)` is not reported again as a bare URL.
 * Links inside code are still reported.
 */

import type { ExtractedLink, LinkKind } from './types.js';

/**
 * Which dialect-specific link forms to recognize on top of standard markdown
 */
export interface LinkSyntax {
  wikilinks: boolean;
  embeds: boolean;
  shortcodes: boolean;
}

interface Located {
  index: number;
  link: ExtractedLink;
}

const EXTERNAL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;
const OPAQUE_SCHEME = /^(?:mailto|tel|sms|data|javascript|urn|news|xmpp|magnet):/i;

/**
 * Whether a target stays inside the collection
 */
export function isInternalTarget(target: string): boolean {
  return !(EXTERNAL_SCHEME.test(target) || OPAQUE_SCHEME.test(target) || target.startsWith('//'));
}

function normalizeLabel(label: string): string {
  return label.trim().replace(/\s+/g, ' ').toLowerCase();
}

function unwrapAngle(target: string): string {
  const trimmed = target.trim();
  return trimmed.startsWith('<') && trimmed.endsWith('>') ? trimmed.slice(1, -1) : trimmed;
}

/**
 * Working copy whose matched spans are overwritten with spaces
 */
class Scanner {
  private text: string;
  readonly found: Located[] = [];

  constructor(body: string) {
    this.text = body;
  }

  /**
   * Run a global regex over the unmatched text. The callback returns the
   * link to record, or null to leave the span untouched.
   */
  scan(pattern: RegExp, onMatch: (match: RegExpExecArray) => ExtractedLink | null): void {
    this.each(pattern, (match) => {
      const link = onMatch(match);
      if (link !== null) {
        this.found.push({ index: match.index, link });
        this.blank(match.index, match[0].length);
      }
    });
  }

  /**
   * Blank spans without recording a link
   */
  consume(pattern: RegExp, onMatch: (match: RegExpExecArray) => void): void {
    this.each(pattern, (match) => {
      onMatch(match);
      this.blank(match.index, match[0].length);
    });
  }

  private each(pattern: RegExp, visit: (match: RegExpExecArray) => void): void {
    pattern.lastIndex = 0;
    let match: RegExpExecArray | null;
    // Blanking keeps offsets stable, so exec can continue on the edited text
    while ((match = pattern.exec(this.text)) !== null) {
      visit(match);
    }
  }

  private blank(start: number, length: number): void {
    const span = this.text.slice(start, start + length).replace(/[^\n]/g, ' ');
    this.text = this.text.slice(0, start) + span + this.text.slice(start + length);
  }
}

function link(text: string | null, target: string, kind: LinkKind): ExtractedLink {
  return { text, target, kind, isInternal: isInternalTarget(target) };
}

function wikiParts(inner: string): { target: string; alias: string | null } | null {
  const pipe = inner.indexOf('|');
  const target = (pipe === -1 ? inner : inner.slice(0, pipe)).replace(/\s+/g, ' ').trim();
  if (target === '') return null;
  const alias = pipe === -1 ? null : inner.slice(pipe + 1).replace(/\s+/g, ' ').trim();
  return { target, alias: alias === '' ? null : alias };
}

const REFERENCE_DEFINITION =
  /^ {0,3}\[([^\]\n]+)\]:[ \t]*(<[^>\n]*>|\S+)(?:[ \t]+(?:"[^"\n]*"|'[^'\n]*'|\([^)\n]*\)))?[ \t]*$/gm;
const HUGO_REF = /\{\{[<%]\s*(?:rel)?ref\s+"([^"]+)"\s*[%>]\}\}/g;
const JEKYLL_LINK = /\{%\s*(?:link|post_url)\s+(\S+)\s*%\}/g;
const EMBED = /!\[\[([^[\]]+)\]\]/g;
const WIKILINK = /\[\[([^[\]]+)\]\]/g;
const DESTINATION = String.raw`(<[^>\n]*>|[^\s()]*(?:\([^\s()]*\)[^\s()]*)*)`;
const TITLE = String.raw`(?:\s+(?:"[^"]*"|'[^']*'|\([^)]*\)))?`;
const IMAGE = new RegExp(String.raw`!\[([^\]]*)\]\(\s*${DESTINATION}${TITLE}\s*\)`, 'g');
const INLINE = new RegExp(String.raw`\[([^\]]*)\]\(\s*${DESTINATION}${TITLE}\s*\)`, 'g');
const FULL_REFERENCE = /\[([^\]]+)\]\[([^\]]*)\]/g;
const SHORTCUT_REFERENCE = /\[([^\]]+)\](?![[(:])/g;
const ANGLE_AUTOLINK = /<([a-z][a-z0-9+.-]{1,31}:[^\s<>]*)>/gi;
const EMAIL_AUTOLINK = /<([^\s@<>]+@[^\s@<>]+\.[^\s@<>]+)>/g;
const BARE_URL = /\b(?:https?|ftp):\/\/[^\s<>"'`[\]()]+/gi;

/**
 * Extract links from a markdown body in document order
 */
export function extractLinks(body: string, syntax: LinkSyntax): ExtractedLink[] {
  const scanner = new Scanner(body);
  const definitions = new Map<string, string>();

  scanner.consume(REFERENCE_DEFINITION, (match) => {
    const label = normalizeLabel(match[1] ?? '');
    // First definition wins
    if (!definitions.has(label)) {
      definitions.set(label, unwrapAngle(match[2] ?? ''));
    }
  });

  if (syntax.shortcodes) {
    scanner.scan(HUGO_REF, (match) => link(null, (match[1] ?? '').trim(), 'shortcode'));
    scanner.scan(JEKYLL_LINK, (match) => link(null, (match[1] ?? '').trim(), 'shortcode'));
  }

  if (syntax.embeds) {
    scanner.scan(EMBED, (match) => {
      const parts = wikiParts(match[1] ?? '');
      return parts === null ? null : link(parts.alias, parts.target, 'embed');
    });
  }

  if (syntax.wikilinks) {
    scanner.scan(WIKILINK, (match) => {
      const parts = wikiParts(match[1] ?? '');
      return parts === null ? null : link(parts.alias ?? parts.target, parts.target, 'wikilink');
    });
  }

  scanner.scan(IMAGE, (match) => {
    const alt = (match[1] ?? '').trim();
    return link(alt === '' ? null : alt, unwrapAngle(match[2] ?? ''), 'embed');
  });

  scanner.scan(INLINE, (match) => {
    const text = (match[1] ?? '').replace(/\s+/g, ' ').trim();
    return link(text === '' ? null : text, unwrapAngle(match[2] ?? ''), 'markdown');
  });

  scanner.scan(FULL_REFERENCE, (match) => {
    const text = (match[1] ?? '').replace(/\s+/g, ' ').trim();
    const label = match[2] === undefined || match[2].trim() === '' ? text : match[2];
    const target = definitions.get(normalizeLabel(label));
    return target === undefined ? null : link(text, target, 'reference');
  });

  scanner.scan(SHORTCUT_REFERENCE, (match) => {
    const text = (match[1] ?? '').replace(/\s+/g, ' ').trim();
    const target = definitions.get(normalizeLabel(text));
    return target === undefined ? null : link(text, target, 'reference');
  });

  scanner.scan(ANGLE_AUTOLINK, (match) => link(null, match[1] ?? '', 'autolink'));
  scanner.scan(EMAIL_AUTOLINK, (match) => link(null, `mailto:${match[1] ?? ''}`, 'autolink'));

  scanner.scan(BARE_URL, (match) => {
    const url = match[0].replace(/[.,;:!?*_~]+$/, '');
    return link(null, url, 'autolink');
  });

  return scanner.found.sort((a, b) => a.index - b.index).map((entry) => entry.link);
}
