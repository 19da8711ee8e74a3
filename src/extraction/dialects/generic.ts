/**
 * Plain markdown. Accepts every document.
 */

import { MarkdownDialect } from './base.js';

export class GenericDialect extends MarkdownDialect {
  readonly name = 'generic';

  canHandle(_path: string, _text: string): boolean {
    return true;
  }
}
