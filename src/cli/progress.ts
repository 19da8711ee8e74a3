/**
 * Progress display for CLI
 *
 * Displays indexing progress to stderr for clean stdout output.
 */

import type { IndexingProgressEvent } from '../indexer/types.js';

/**
 * Progress display options
 */
export interface ProgressOptions {
  /** Suppress progress output */
  quiet?: boolean;
  /** Output in JSON format (disables progress display) */
  json?: boolean;
}

/**
 * Handles progress output to stderr with in-place updates on a terminal
 */
export class ProgressDisplay {
  private readonly quiet: boolean;
  private readonly json: boolean;
  private readonly isTerminal: boolean;
  private lastLineLength = 0;
  private totalFiles = 0;

  constructor(
    options: ProgressOptions = {},
    private readonly stream: NodeJS.WriteStream = process.stderr
  ) {
    this.quiet = options.quiet === true;
    this.json = options.json === true;
    this.isTerminal = stream.isTTY === true;
  }

  private clearLine(): void {
    if (this.isTerminal) {
      this.stream.write('\r' + ' '.repeat(this.lastLineLength) + '\r');
    }
  }

  /**
   * Write a progress line (in-place update)
   */
  private writeLine(text: string): void {
    if (this.isTerminal) {
      this.clearLine();
      this.stream.write(text);
      this.lastLineLength = text.length;
    }
  }

  /**
   * Write a permanent message (moves to new line)
   */
  private writeMessage(text: string): void {
    this.clearLine();
    this.stream.write(text + '\n');
    this.lastLineLength = 0;
  }

  handleProgress(event: IndexingProgressEvent): void {
    if (this.quiet || this.json) {
      return;
    }

    switch (event.type) {
      case 'started':
        this.writeMessage(`Indexing ${event.root}`);
        break;

      case 'files_listed':
        this.totalFiles = event.totalFiles ?? 0;
        this.writeMessage(`Found ${this.totalFiles} markdown files`);
        break;

      case 'file_indexed':
      case 'file_skipped': {
        const processed = event.filesProcessed ?? 0;
        const percent = this.totalFiles > 0 ? Math.round((processed / this.totalFiles) * 100) : 0;
        const file = event.currentFile ?? '';
        const shortFile = file.length > 40 ? '...' + file.slice(-37) : file;
        this.writeLine(`[${percent}%] ${processed}/${this.totalFiles} ${shortFile}`);
        break;
      }

      case 'file_failed':
        this.writeMessage(`Failed: ${event.currentFile ?? ''}: ${event.error ?? 'unknown error'}`);
        break;

      case 'deleted':
        this.writeMessage(`Removed: ${event.currentFile ?? ''}`);
        break;

      case 'completed':
        this.clearLine();
        this.lastLineLength = 0;
        break;
    }
  }

  createCallback(): (event: IndexingProgressEvent) => void {
    return (event: IndexingProgressEvent): void => {
      this.handleProgress(event);
    };
  }

  /**
   * Finalize progress display (ensure clean state)
   */
  finish(): void {
    if (this.isTerminal && this.lastLineLength > 0) {
      this.clearLine();
    }
  }
}

export function createProgressDisplay(options: ProgressOptions = {}): ProgressDisplay {
  return new ProgressDisplay(options);
}
