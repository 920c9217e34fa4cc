/**
 * Path resolution for tokentrail's own config and for the agent CLIs'
 * session directories. Every location honours an environment override.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { createHash } from 'crypto';

/**
 * Gets the tokentrail config directory.
 * $TOKENTRAIL_HOME, else ~/.config/tokentrail on Unix, %APPDATA%/tokentrail on Windows.
 */
export function getConfigDir(): string {
  const envHome = process.env.TOKENTRAIL_HOME;
  if (envHome) return envHome;
  if (process.platform === 'win32') {
    return path.join(process.env.APPDATA || os.homedir(), 'tokentrail');
  }
  return path.join(os.homedir(), '.config', 'tokentrail');
}

/** ~/.config/tokentrail/config.json */
export function getConfigPath(): string {
  return path.join(getConfigDir(), 'config.json');
}

/** Default root for persisted session snapshots. */
export function getDefaultSessionsDir(): string {
  return path.join(getConfigDir(), 'sessions');
}

/**
 * Gets the Codex home directory.
 * Respects CODEX_HOME, defaults to ~/.codex/
 */
export function getCodexHome(): string {
  const envHome = process.env.CODEX_HOME;
  if (envHome) return envHome;
  return path.join(os.homedir(), '.codex');
}

/**
 * Gets the Gemini CLI home directory.
 * Respects GEMINI_HOME, defaults to ~/.gemini/
 */
export function getGeminiHome(): string {
  const envHome = process.env.GEMINI_HOME;
  if (envHome) return envHome;
  return path.join(os.homedir(), '.gemini');
}

/**
 * Gemini CLI keys its per-project temp directory by the SHA-256 of the
 * absolute project root.
 */
export function getGeminiProjectHash(projectRoot: string): string {
  return createHash('sha256').update(path.resolve(projectRoot)).digest('hex');
}

/**
 * Derives a human-readable project name from a working directory.
 * Resolves symlinks first so aliases of the same checkout agree.
 */
export function getProjectName(cwd?: string): string {
  const dir = cwd || process.cwd();
  let resolved: string;
  try {
    resolved = fs.realpathSync(dir);
  } catch {
    resolved = path.resolve(dir);
  }
  return path.basename(resolved) || resolved;
}

/** Replaces characters that are unsafe in a file name. */
export function sanitizeFileName(name: string): string {
  return name.replace(/[/\\:*?"<>|]/g, '_');
}
