/**
 * Per-invocation context shared by every command: global flags, the loaded
 * config and the session store location.
 */

import type { Command } from 'commander';
import { detectPlatform, isPlatformId, loadConfig, loadSession, resolveSessionRef, errorMessage } from 'tokentrail-shared';
import type { PlatformId, SessionSnapshot, TokentrailConfig } from 'tokentrail-shared';

export interface GlobalOptions {
  json: boolean;
  verbose: boolean;
  sessionsDir?: string;
}

export interface CommandContext extends GlobalOptions {
  config: TokentrailConfig;
  sessionsDir: string;
}

export function readGlobalOptions(cmd: Command): GlobalOptions {
  const opts = cmd.parent?.opts() ?? {};
  return {
    json: opts.json === true,
    verbose: opts.verbose === true,
    sessionsDir: typeof opts.sessionsDir === 'string' ? opts.sessionsDir : undefined,
  };
}

export function createContext(cmd: Command): CommandContext {
  const global = readGlobalOptions(cmd);
  const config = loadConfig();
  return { ...global, config, sessionsDir: global.sessionsDir ?? config.sessionsDir };
}

/** Loads a stored session by path, id or unique id prefix. */
export function loadSessionRef(sessionsDir: string, ref: string): SessionSnapshot {
  const filePath = resolveSessionRef(sessionsDir, ref);
  if (!filePath) throw new Error(`Session ${ref} not found in ${sessionsDir}`);
  const snapshot = loadSession(filePath);
  if (!snapshot) throw new Error(`Cannot read session file ${filePath}`);
  return snapshot;
}

/**
 * Resolves `--platform`: an explicit id, or `auto` (the default) for the
 * CLI that wrote a session most recently.
 */
export function resolvePlatform(value: unknown): PlatformId {
  if (value === undefined || value === 'auto') {
    const detected = detectPlatform();
    if (!detected) throw new Error('No Codex CLI or Gemini CLI sessions found; pass --platform and --session-file');
    return detected;
  }
  if (typeof value !== 'string' || !isPlatformId(value)) {
    throw new Error(`Unknown platform "${String(value)}" (expected codex-cli, gemini-cli or auto)`);
  }
  return value;
}

export function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`${name} must be a positive integer, got "${value}"`);
  return n;
}

const DATE_ONLY = /^\d{4}-\d{2}-\d{2}$/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Parses `YYYY-MM-DD` (UTC) or a full ISO timestamp. With `endOfDay`, a bare
 * date stands for the last millisecond of that day.
 */
export function parseDateOption(value: string, name: string, endOfDay = false): Date {
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) throw new Error(`${name} must be a date (YYYY-MM-DD or ISO 8601), got "${value}"`);
  return new Date(endOfDay && DATE_ONLY.test(value) ? ms + DAY_MS - 1 : ms);
}

export function writeJson(value: unknown): void {
  process.stdout.write(JSON.stringify(value, null, 2) + '\n');
}

export function exitWithError(err: unknown): never {
  process.stderr.write(`Error: ${errorMessage(err)}\n`);
  process.exit(1);
}
