/**
 * Cursor over a JSON document that is rewritten wholesale on every update.
 *
 * Each changed poll re-parses the whole document and forwards only messages
 * whose id has not been seen. Messages without an id are keyed by their
 * position in the message list. A document that fails to parse (often a
 * write caught half-way) is skipped without recording the new mtime, so the
 * next poll retries it.
 *
 * @module tailing/DocumentCursor
 */

import { ParseError, errorMessage } from '../errors';
import { readContent, sameVersion, statVersion } from './fileState';
import type { FileVersion } from './fileState';
import type { DocumentLayout, PollOptions, PollResult, SourceCursor, TailDiagnostic } from './types';

export class DocumentCursor implements SourceCursor {
  readonly filePath: string;
  private readonly layout: DocumentLayout;
  private readonly seen = new Set<string>();
  private lastVersion: FileVersion | null = null;

  constructor(filePath: string, layout: DocumentLayout) {
    this.filePath = filePath;
    this.layout = layout;
  }

  get seenMessageCount(): number {
    return this.seen.size;
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

    let document: unknown;
    try {
      document = JSON.parse(read.content);
    } catch (err) {
      return { records: [], diagnostics: [this.parseDiagnostic(`Malformed JSON in ${this.filePath}: ${errorMessage(err)}`, err)] };
    }

    const messages = this.layout.splitDocument(document);
    if (!messages) {
      return { records: [], diagnostics: [this.parseDiagnostic(`Unexpected document shape in ${this.filePath}`)] };
    }

    const records: unknown[] = [];
    messages.forEach((message, index) => {
      const key = this.layout.messageId(message) ?? `#${index}`;
      if (this.seen.has(key)) return;
      this.seen.add(key);
      records.push(message);
    });

    this.lastVersion = stat.version;
    return { records, diagnostics: [] };
  }

  private parseDiagnostic(message: string, cause?: unknown): TailDiagnostic {
    return {
      kind: 'parse',
      source: this.filePath,
      message,
      error: new ParseError(this.filePath, message, cause === undefined ? undefined : { cause }),
    };
  }
}
