/**
 * Structural helpers for markdown bodies: headings, plain text, word count
 */

import type { Heading } from './types.js';

const FENCE_OPEN = /^ {0,3}(`{3,}|~{3,})/;
const ATX_HEADING = /^ {0,3}(#{1,6})(?:[ \t]+(.*?))?(?:[ \t]+#+)?[ \t]*$/;
const SETEXT_UNDERLINE = /^ {0,3}(=+|-+)[ \t]*$/;
const BLOCK_START = /^ {0,3}(?:[-*+][ \t]|\d+[.)][ \t]|>|\||<)/;

/**
 * Tracks fenced code blocks line by line
 */
class FenceTracker {
  private open: { char: string; length: number } | null = null;

  /**
   * Feed one line; returns true while the line belongs to a fence
   * (including the fence delimiters themselves)
   */
  consume(line: string): boolean {
    const match = FENCE_OPEN.exec(line);
    if (this.open === null) {
      if (match?.[1] !== undefined) {
        this.open = { char: match[1].charAt(0), length: match[1].length };
        return true;
      }
      return false;
    }

    const fence = match?.[1];
    if (
      fence !== undefined &&
      fence.charAt(0) === this.open.char &&
      fence.length >= this.open.length &&
      line.trim() === fence
    ) {
      this.open = null;
    }
    return true;
  }
}

function cleanHeadingText(raw: string): string {
  return raw
    .replace(/\[\[([^\]|]+)\|([^\]]+)\]\]/g, '$2')
    .replace(/\[\[([^\]]+)\]\]/g, '$1')
    .replace(/!?\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/[*_`~]/g, '')
    .trim();
}

/**
 * Extract ATX and setext headings, ignoring fenced code
 */
export function extractHeadings(body: string): Heading[] {
  const lines = body.split('\n');
  const headings: Heading[] = [];
  const fences = new FenceTracker();
  // Candidate paragraph line for a setext underline
  let previous: { text: string; line: number } | null = null;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i] ?? '';

    if (fences.consume(line)) {
      previous = null;
      continue;
    }

    const atx = ATX_HEADING.exec(line);
    if (atx?.[1] !== undefined) {
      const text = cleanHeadingText(atx[2] ?? '');
      if (text !== '') {
        headings.push({ level: atx[1].length, text, line: i + 1 });
      }
      previous = null;
      continue;
    }

    const underline = SETEXT_UNDERLINE.exec(line);
    if (underline?.[1] !== undefined && previous !== null) {
      headings.push({
        level: underline[1].startsWith('=') ? 1 : 2,
        text: cleanHeadingText(previous.text),
        line: previous.line,
      });
      previous = null;
      continue;
    }

    if (line.trim() === '' || BLOCK_START.test(line)) {
      previous = null;
    } else {
      // Only the last line of a paragraph can be underlined
      previous = { text: line.trim(), line: i + 1 };
    }
  }

  return headings;
}

/**
 * Drop fenced code blocks from a body
 */
export function stripFencedCode(body: string): string {
  const fences = new FenceTracker();
  return body
    .split('\n')
    .filter((line) => !fences.consume(line))
    .join('\n');
}

/**
 * Reduce a markdown body to the prose a reader sees
 */
export function toPlainText(body: string): string {
  return stripFencedCode(body)
    .replace(/<!--[\s\S]*?-->/g, ' ')
    .replace(/\{\{[<%][\s\S]*?[%>]\}\}/g, ' ')
    .replace(/\{%[\s\S]*?%\}/g, ' ')
    .replace(/^ {0,3}\[[^\]\n]+\]:.*$/gm, ' ')
    .replace(/!\[\[([^\]]*)\]\]/g, ' ')
    .replace(/\[\[([^\]|]+)\|([^\]]+)\]\]/g, '$2')
    .replace(/\[\[([^\]]+)\]\]/g, '$1')
    .replace(/!\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]*)\]\([^)]*\)/g, '$1')
    .replace(/\[([^\]]*)\]\[[^\]]*\]/g, '$1')
    .replace(/<[^>\n]+>/g, ' ')
    .replace(/^ {0,3}#{1,6}[ \t]+/gm, '')
    .replace(/^ {0,3}(?:=+|-+|\*{3,}|_{3,})[ \t]*$/gm, ' ')
    .replace(/^[ \t]*>[ \t]?/gm, '')
    .replace(/^[ \t]*(?:[-*+]|\d+[.)])[ \t]+(?:\[[ xX]\][ \t]+)?/gm, '')
    .replace(/[*_~`]/g, '');
}

/**
 * Count words: whitespace separated runs holding a letter or digit
 */
export function countWords(text: string): number {
  let count = 0;
  for (const token of text.split(/\s+/)) {
    if (/[\p{L}\p{N}]/u.test(token)) {
      count++;
    }
  }
  return count;
}
