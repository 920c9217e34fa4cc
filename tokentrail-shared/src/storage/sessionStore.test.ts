import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  activeFilePath,
  listStoredSessions,
  loadSession,
  removeActiveSession,
  resolveSessionRef,
  saveActiveSession,
  saveSession,
  sessionFilePath,
} from './sessionStore';
import { StorageError } from '../errors';
import { makeCall, makeSnapshot, makeToolStats } from '../testing/snapshots';
import type { SessionSnapshot } from '../types/session';

function withPlatform(snapshot: SessionSnapshot, platform: SessionSnapshot['session']['platform']): SessionSnapshot {
  return { ...snapshot, session: { ...snapshot.session, platform } };
}

describe('sessionStore', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tt-store-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('lays files out by platform and start date', () => {
    const snap = makeSnapshot({ id: 'abc', startTime: '2025-11-30T23:30:00.000Z' });
    expect(sessionFilePath(dir, snap)).toBe(path.join(dir, 'codex-cli', '2025-11-30', 'abc.json'));
    expect(activeFilePath(dir, 'a/b')).toBe(path.join(dir, 'active', 'a_b.json'));
  });

  it('saves and loads a snapshot unchanged', () => {
    const snap = makeSnapshot({
      id: 'abc',
      totalTokens: 1000,
      tools: { zen: { chat: makeToolStats([makeCall({ call_id: 'c1', success: true })]) } },
      smells: ['CHATTY'],
    });
    const filePath = saveSession(dir, snap);
    expect(fs.existsSync(filePath)).toBe(true);
    expect(loadSession(filePath)).toEqual(snap);
    expect(fs.readdirSync(path.dirname(filePath))).toEqual(['abc.json']);
  });

  it('returns null for missing, malformed or foreign files', () => {
    const bad = path.join(dir, 'bad.json');
    fs.writeFileSync(bad, '{not json');
    const wrongShape = path.join(dir, 'shape.json');
    fs.writeFileSync(wrongShape, JSON.stringify({ schema_version: 1 }));
    const future = path.join(dir, 'future.json');
    fs.writeFileSync(future, JSON.stringify({ ...makeSnapshot(), schema_version: 99 }));

    expect(loadSession(path.join(dir, 'absent.json'))).toBeNull();
    expect(loadSession(bad)).toBeNull();
    expect(loadSession(wrongShape)).toBeNull();
    expect(loadSession(future)).toBeNull();
  });

  it('raises StorageError when the directory cannot be created', () => {
    fs.writeFileSync(path.join(dir, 'codex-cli'), 'blocking file');
    expect(() => saveSession(dir, makeSnapshot())).toThrow(StorageError);
  });

  it('writes and removes the active mirror', () => {
    const snap = makeSnapshot({ id: 'live' });
    const filePath = saveActiveSession(dir, snap);
    expect(filePath).toBe(path.join(dir, 'active', 'live.json'));
    expect(loadSession(filePath)?.session.id).toBe('live');

    removeActiveSession(dir, 'live');
    expect(fs.existsSync(filePath)).toBe(false);
    removeActiveSession(dir, 'live');
  });

  it('lists sessions newest first and filters by platform', () => {
    saveSession(dir, makeSnapshot({ id: 'old', startTime: '2025-11-28T10:00:00.000Z' }));
    saveSession(dir, makeSnapshot({ id: 'new', startTime: '2025-11-30T10:00:00.000Z' }));
    saveSession(dir, withPlatform(makeSnapshot({ id: 'gem', startTime: '2025-11-29T10:00:00.000Z' }), 'gemini-cli'));
    saveActiveSession(dir, makeSnapshot({ id: 'live' }));

    expect(listStoredSessions(dir).map(s => s.sessionId)).toEqual(['new', 'gem', 'old']);
    expect(listStoredSessions(dir, { platform: 'gemini-cli' }).map(s => s.sessionId)).toEqual(['gem']);
    expect(listStoredSessions(dir, { limit: 1 }).map(s => s.date)).toEqual(['2025-11-30']);
  });

  it('lists nothing for a missing directory', () => {
    expect(listStoredSessions(path.join(dir, 'absent'))).toEqual([]);
  });

  it('resolves references by path, id and unique prefix', () => {
    const first = saveSession(dir, makeSnapshot({ id: 'alpha-1' }));
    saveSession(dir, makeSnapshot({ id: 'alpha-2' }));
    const beta = saveSession(dir, makeSnapshot({ id: 'beta' }));

    expect(resolveSessionRef(dir, first)).toBe(first);
    expect(resolveSessionRef(dir, 'alpha-1')).toBe(first);
    expect(resolveSessionRef(dir, 'be')).toBe(beta);
    expect(resolveSessionRef(dir, 'alpha')).toBeNull();
    expect(resolveSessionRef(dir, 'zzz')).toBeNull();
  });
});
