/**
 * Session snapshot persistence.
 *
 * Finalized sessions are stored at
 *   <sessionsDir>/<platform>/<YYYY-MM-DD>/<sessionId>.json
 * and the live session is mirrored at <sessionsDir>/active/<sessionId>.json.
 * Every write goes through a temp file and a rename, so readers never see
 * a partial snapshot.
 *
 * @module storage/sessionStore
 */

import * as fs from 'fs';
import * as path from 'path';
import { StorageError, errorMessage } from '../errors';
import { sanitizeFileName } from '../paths';
import { PLATFORM_IDS } from '../types/events';
import type { PlatformId } from '../types/events';
import { SNAPSHOT_SCHEMA_VERSION } from '../types/session';
import type { SessionSnapshot } from '../types/session';
import { sessionSnapshotSchema } from './schema';

const ACTIVE_DIR = 'active';

export interface StoredSessionInfo {
  path: string;
  sessionId: string;
  platform: PlatformId;
  /** YYYY-MM-DD directory the file lives in. */
  date: string;
  mtime: Date;
}

export interface ListSessionsOptions {
  platform?: PlatformId;
  limit?: number;
}

/** UTC date of the session start, or of `fallback` when the start is unparseable. */
function sessionDate(startTime: string, fallback: Date = new Date()): string {
  const ms = Date.parse(startTime);
  return (Number.isNaN(ms) ? fallback : new Date(ms)).toISOString().slice(0, 10);
}

export function sessionFilePath(sessionsDir: string, snapshot: SessionSnapshot): string {
  return path.join(
    sessionsDir,
    snapshot.session.platform,
    sessionDate(snapshot.session.start_time),
    `${sanitizeFileName(snapshot.session.id)}.json`,
  );
}

export function activeFilePath(sessionsDir: string, sessionId: string): string {
  return path.join(sessionsDir, ACTIVE_DIR, `${sanitizeFileName(sessionId)}.json`);
}

/**
 * Writes JSON atomically via a sibling temp file. Any failure to create
 * the directory or write the file is a StorageError.
 */
export function writeJsonAtomic(filePath: string, data: unknown): void {
  const dir = path.dirname(filePath);
  try {
    fs.mkdirSync(dir, { recursive: true });
  } catch (err) {
    throw new StorageError(dir, `Cannot create ${dir}: ${errorMessage(err)}`, { cause: err });
  }

  const tmpPath = `${filePath}.${process.pid}.tmp`;
  try {
    fs.writeFileSync(tmpPath, JSON.stringify(data, null, 2) + '\n', 'utf-8');
    fs.renameSync(tmpPath, filePath);
  } catch (err) {
    try {
      fs.rmSync(tmpPath, { force: true });
    } catch {
      // Best-effort cleanup; the write error below is what matters
    }
    throw new StorageError(filePath, `Cannot write ${filePath}: ${errorMessage(err)}`, { cause: err });
  }
}

/** Persists a finalized session and returns its path. */
export function saveSession(sessionsDir: string, snapshot: SessionSnapshot): string {
  const filePath = sessionFilePath(sessionsDir, snapshot);
  writeJsonAtomic(filePath, snapshot);
  return filePath;
}

/** Mirrors the live session so other processes can read it. */
export function saveActiveSession(sessionsDir: string, snapshot: SessionSnapshot): string {
  const filePath = activeFilePath(sessionsDir, snapshot.session.id);
  writeJsonAtomic(filePath, snapshot);
  return filePath;
}

export function removeActiveSession(sessionsDir: string, sessionId: string): void {
  try {
    fs.rmSync(activeFilePath(sessionsDir, sessionId), { force: true });
  } catch (err) {
    console.error(`Failed to remove active session file for ${sessionId}: ${errorMessage(err)}`);
  }
}

/**
 * Loads and validates a snapshot. Returns null if the file is missing,
 * malformed, fails validation or has another schema version.
 */
export function loadSession(filePath: string): SessionSnapshot | null {
  let decoded: unknown;
  try {
    decoded = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch {
    return null;
  }
  const result = sessionSnapshotSchema.safeParse(decoded);
  if (!result.success || result.data.schema_version !== SNAPSHOT_SCHEMA_VERSION) return null;
  return result.data;
}

function readDirNames(dir: string): string[] {
  try {
    return fs.readdirSync(dir, { withFileTypes: true }).filter(e => e.isDirectory()).map(e => e.name);
  } catch {
    return [];
  }
}

/** Finalized sessions, newest first. */
export function listStoredSessions(sessionsDir: string, options: ListSessionsOptions = {}): StoredSessionInfo[] {
  const platforms = options.platform ? [options.platform] : PLATFORM_IDS;
  const results: StoredSessionInfo[] = [];

  for (const platform of platforms) {
    const platformDir = path.join(sessionsDir, platform);
    for (const date of readDirNames(platformDir)) {
      if (!/^\d{4}-\d{2}-\d{2}$/.test(date)) continue;
      const dateDir = path.join(platformDir, date);
      let files: string[];
      try {
        files = fs.readdirSync(dateDir);
      } catch {
        continue;
      }
      for (const file of files) {
        if (!file.endsWith('.json')) continue;
        const fullPath = path.join(dateDir, file);
        try {
          const stats = fs.statSync(fullPath);
          results.push({ path: fullPath, sessionId: path.basename(file, '.json'), platform, date, mtime: stats.mtime });
        } catch {
          // Skip files removed while listing
        }
      }
    }
  }

  results.sort((a, b) => b.date.localeCompare(a.date) || b.mtime.getTime() - a.mtime.getTime());
  return options.limit !== undefined ? results.slice(0, options.limit) : results;
}

/**
 * Resolves a session reference (an existing file path, a session id, or a
 * unique id prefix) to a snapshot path.
 */
export function resolveSessionRef(sessionsDir: string, ref: string): string | null {
  if (ref.endsWith('.json') && fs.existsSync(ref)) return ref;
  const all = listStoredSessions(sessionsDir);
  const exact = all.find(s => s.sessionId === ref);
  if (exact) return exact.path;
  const prefixed = all.filter(s => s.sessionId.startsWith(ref));
  return prefixed.length === 1 ? prefixed[0].path : null;
}
