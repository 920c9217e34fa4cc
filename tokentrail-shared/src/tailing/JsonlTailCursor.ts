/**
 * Cursor over an append-only JSONL log.
 *
 * Tracks the number of complete lines already consumed. A poll re-reads
 * the file only when its mtime or size changed, skips the consumed lines
 * and decodes the rest, so replaying the same file never yields a record
 * twice. A line with no terminating newline is left for a later poll
 * unless the cursor is drained.
 *
 * @module tailing/JsonlTailCursor
 */

import { ParseError } from '../errors';
import { splitCompleteLines, parseJsonLine } from '../parsers/jsonl';
import { readContent, sameVersion, statVersion } from './fileState';
import type { FileVersion } from './fileState';
import type { PollOptions, PollResult, SourceCursor, TailDiagnostic } from './types';

export class JsonlTailCursor implements SourceCursor {
  readonly filePath: string;
  private lastVersion: FileVersion | null = null;
  private consumed = 0;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** Lines consumed so far, blank and malformed ones included. */
  get consumedLineCount(): number {
    return this.consumed;
  }

  get lastMtimeMs(): number | null {
    return this.lastVersion?.mtimeMs ?? null;
  }

  poll(options: PollOptions = {}): PollResult {
    const stat = statVersion(this.filePath);
    if (!stat.ok) return { records: [], diagnostics: [stat.diagnostic] };
    if (!options.drain && sameVersion(this.lastVersion, stat.version)) {
      return { records: [], diagnostics: [] };
    }

    const read = readContent(this.filePath);
    if (!read.ok) return { records: [], diagnostics: [read.diagnostic] };

    const { complete, remainder } = splitCompleteLines(read.content);
    const lines = options.drain && remainder.trim() ? [...complete, remainder] : complete;
    const diagnostics: TailDiagnostic[] = [];
    const records: unknown[] = [];

    if (lines.length < this.consumed) {
      const message = `${this.filePath} shrank from ${this.consumed} to ${lines.length} lines; waiting for new lines`;
      diagnostics.push({ kind: 'parse', source: this.filePath, message, error: new ParseError(this.filePath, message) });
    }

    for (let i = this.consumed; i < lines.length; i++) {
      const result = parseJsonLine(lines[i]);
      if (result.kind === 'record') {
        records.push(result.value);
      } else if (result.kind === 'error') {
        const message = `Malformed JSON at ${this.filePath}:${i + 1}: ${result.error.message}`;
        diagnostics.push({
          kind: 'parse',
          source: this.filePath,
          line: i + 1,
          message,
          error: new ParseError(this.filePath, message, { cause: result.error }),
        });
      }
    }

    this.consumed = Math.max(this.consumed, lines.length);
    this.lastVersion = stat.version;
    return { records, diagnostics };
  }
}
