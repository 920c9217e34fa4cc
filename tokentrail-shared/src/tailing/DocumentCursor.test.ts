import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DocumentCursor } from './DocumentCursor';
import type { DocumentLayout } from './types';

const layout: DocumentLayout = {
  splitDocument(document) {
    if (typeof document !== 'object' || document === null || !('messages' in document)) return null;
    return Array.isArray(document.messages) ? document.messages : null;
  },
  messageId(message) {
    if (typeof message === 'object' && message !== null && 'id' in message && typeof message.id === 'string') {
      return message.id;
    }
    return undefined;
  },
};

let dir: string;
let file: string;

function writeDoc(messages: unknown[]): void {
  fs.writeFileSync(file, JSON.stringify({ sessionId: 's-1', messages }));
}

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tt-doc-'));
  file = path.join(dir, 'session-1.json');
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('DocumentCursor', () => {
  it('forwards each message id once across rewrites', () => {
    const cursor = new DocumentCursor(file, layout);
    writeDoc([{ id: 'a' }, { id: 'b' }]);
    expect(cursor.poll().records).toEqual([{ id: 'a' }, { id: 'b' }]);

    writeDoc([{ id: 'a' }, { id: 'b' }, { id: 'c', extra: true }]);
    expect(cursor.poll().records).toEqual([{ id: 'c', extra: true }]);
    expect(cursor.seenMessageCount).toBe(3);
  });

  it('yields nothing when the document is re-read unchanged', () => {
    const cursor = new DocumentCursor(file, layout);
    writeDoc([{ id: 'a' }]);
    cursor.poll();
    expect(cursor.poll().records).toEqual([]);
    expect(cursor.poll({ drain: true }).records).toEqual([]);
  });

  it('keys messages without an id by position', () => {
    const cursor = new DocumentCursor(file, layout);
    writeDoc([{ text: 'first' }]);
    expect(cursor.poll().records).toEqual([{ text: 'first' }]);

    writeDoc([{ text: 'first' }, { text: 'second' }]);
    expect(cursor.poll().records).toEqual([{ text: 'second' }]);
  });

  it('skips a half-written document and retries it next poll', () => {
    const cursor = new DocumentCursor(file, layout);
    fs.writeFileSync(file, '{"messages": [{"id": "a"}');
    const first = cursor.poll();
    expect(first.records).toEqual([]);
    expect(first.diagnostics[0].kind).toBe('parse');
    expect(cursor.lastMtimeMs).toBeNull();

    writeDoc([{ id: 'a' }]);
    expect(cursor.poll().records).toEqual([{ id: 'a' }]);
  });

  it('rejects documents of the wrong shape', () => {
    const cursor = new DocumentCursor(file, layout);
    fs.writeFileSync(file, '[1,2,3]');
    const result = cursor.poll();
    expect(result.diagnostics[0].message).toContain('Unexpected document shape');
  });

  it('reports a missing file as io', () => {
    const cursor = new DocumentCursor(path.join(dir, 'gone.json'), layout);
    expect(cursor.poll().diagnostics[0].kind).toBe('io');
  });
});
