/**
 * Shared types for the tailing cursors.
 */

import type { ParseError, TransientIOError } from '../errors';

export type DiagnosticKind = 'parse' | 'io';

/** A skipped record or a failed read. Cursors report these instead of throwing. */
export interface TailDiagnostic {
  kind: DiagnosticKind;
  source: string;
  message: string;
  /** 1-based line number for JSONL parse failures. */
  line?: number;
  error: ParseError | TransientIOError;
}

export interface PollResult {
  /** Decoded raw records not seen by any earlier poll, in file order. */
  records: unknown[];
  diagnostics: TailDiagnostic[];
}

export interface PollOptions {
  /**
   * Treat the source as complete: a trailing line without a newline is
   * consumed and an unchanged mtime does not short-circuit the read.
   */
  drain?: boolean;
}

/** Incremental reader over one log source. */
export interface SourceCursor {
  readonly filePath: string;
  poll(options?: PollOptions): PollResult;
}

/** How a whole-document source is split into messages. */
export interface DocumentLayout {
  /** Returns the message list, or null if the document has the wrong shape. */
  splitDocument(document: unknown): unknown[] | null;
  /** Stable id of a message, if it has one. */
  messageId(message: unknown): string | undefined;
}
