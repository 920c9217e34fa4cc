/**
 * Line splitting and decoding for append-only JSONL logs.
 */

export interface SplitLines {
  /** Lines terminated by a newline, without the terminator. */
  complete: string[];
  /** Text after the last newline; a line still being written. */
  remainder: string;
}

export function splitCompleteLines(content: string): SplitLines {
  const parts = content.split('\n');
  const remainder = parts.pop() ?? '';
  return {
    complete: parts.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line)),
    remainder,
  };
}

export type LineResult =
  | { kind: 'blank' }
  | { kind: 'record'; value: unknown }
  | { kind: 'error'; error: Error };

/** Decodes one line. Blank lines are not errors. */
export function parseJsonLine(line: string): LineResult {
  const trimmed = line.trim();
  if (!trimmed) return { kind: 'blank' };
  try {
    return { kind: 'record', value: JSON.parse(trimmed) };
  } catch (error) {
    return { kind: 'error', error: error instanceof Error ? error : new Error(String(error)) };
  }
}
