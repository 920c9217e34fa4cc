/**
 * Filesystem-based platform auto-detection.
 * Picks whichever agent CLI wrote a session most recently.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getCodexHome, getGeminiHome } from '../paths';
import type { PlatformId } from '../types/events';

function getMostRecentMtime(dir: string, depth = 0): number {
  try {
    if (!fs.existsSync(dir)) return 0;
    let latest = 0;
    const entries = fs.readdirSync(dir);
    for (const entry of entries) {
      try {
        const full = path.join(dir, entry);
        const stats = fs.statSync(full);
        const mtime = stats.isDirectory() && depth < 3
          ? Math.max(stats.mtime.getTime(), getMostRecentMtime(full, depth + 1))
          : stats.mtime.getTime();
        if (mtime > latest) latest = mtime;
      } catch { /* skip */ }
    }
    return latest;
  } catch {
    return 0;
  }
}

/**
 * Returns all platform IDs whose session directories exist.
 * Ordered by most-recent activity first.
 */
export function getAllDetectedPlatforms(): PlatformId[] {
  const codexSessions = path.join(getCodexHome(), 'sessions');
  const geminiTmp = path.join(getGeminiHome(), 'tmp');

  const available: Array<{ id: PlatformId; mtime: number }> = [];
  if (fs.existsSync(codexSessions)) available.push({ id: 'codex-cli', mtime: getMostRecentMtime(codexSessions) });
  if (fs.existsSync(geminiTmp)) available.push({ id: 'gemini-cli', mtime: getMostRecentMtime(geminiTmp) });

  available.sort((a, b) => b.mtime - a.mtime);
  return available.map(a => a.id);
}

/**
 * Detects the platform to track. An explicit id wins; otherwise the most
 * recently active platform, or null when neither CLI has left sessions.
 */
export function detectPlatform(override?: PlatformId | 'auto'): PlatformId | null {
  if (override && override !== 'auto') return override;
  return getAllDetectedPlatforms()[0] ?? null;
}
