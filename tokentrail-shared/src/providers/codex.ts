/**
 * Codex CLI platform: rollout adapter and session locator.
 *
 * Codex stores sessions as append-only JSONL rollout files in:
 *   ~/.codex/sessions/YYYY/MM/DD/rollout-<timestamp>-<uuid>.jsonl
 *
 * Token usage arrives on `event_msg/token_count` lines as a delta since the
 * last report; MCP calls arrive as `response_item/function_call` lines and
 * carry no tokens of their own.
 */

import * as fs from 'fs';
import * as path from 'path';
import { getCodexHome } from '../paths';
import { MCP_PREFIX, SESSION_SENTINEL } from '../types/events';
import type { CanonicalEvent, PlatformId, SessionTokenDelta, ToolCallEvent } from '../types/events';
import {
  codexFunctionCallSchema,
  codexMessageSchema,
  codexRolloutLineSchema,
  codexSessionMetaSchema,
  codexTokenCountSchema,
  codexTurnContextSchema,
} from '../types/codex';
import type { CodexSessionMeta, CodexTokenUsage } from '../types/codex';
import { parseMcpToolName } from './toolNames';
import { modelDisplayName } from './models';
import { contentSignature } from '../signature';
import type { DiscoveryOptions, JsonlPlatformAdapter, SessionFileInfo, SessionLocator } from './types';

// ── Helpers ──

/** Get the sessions base directory. */
export function getCodexSessionsDir(): string {
  return path.join(getCodexHome(), 'sessions');
}

/** Test if a filename is a Codex rollout file. */
function isRolloutFile(filename: string): boolean {
  return filename.startsWith('rollout-') && filename.endsWith('.jsonl');
}

/**
 * Extract session UUID from a rollout filename.
 * Format: rollout-<timestamp>-<uuid>.jsonl -> <uuid>
 */
export function extractCodexSessionId(filename: string): string {
  const base = path.basename(filename, '.jsonl');
  const parts = base.split('-');
  if (parts.length >= 6) {
    const possibleUuid = parts.slice(-5).join('-');
    if (/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i.test(possibleUuid)) {
      return possibleUuid;
    }
  }
  return base.replace(/^rollout-/, '');
}

/**
 * Recursively find all non-empty rollout files under a directory.
 * Handles the YYYY/MM/DD subdirectory structure.
 */
function findRolloutFiles(dir: string): SessionFileInfo[] {
  const results: SessionFileInfo[] = [];

  try {
    if (!fs.existsSync(dir)) return results;
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        results.push(...findRolloutFiles(fullPath));
      } else if (entry.isFile() && isRolloutFile(entry.name)) {
        try {
          const stats = fs.statSync(fullPath);
          if (stats.size > 0) {
            results.push({
              path: fullPath,
              sessionId: extractCodexSessionId(entry.name),
              mtime: stats.mtime,
              size: stats.size,
            });
          }
        } catch {
          // Skip inaccessible files
        }
      }
    }
  } catch {
    // Skip inaccessible directories
  }

  return results;
}

/** Reads the first line of a file without loading the rest. */
function readFirstLine(filePath: string, maxBytes = 256 * 1024): string | null {
  let fd: number;
  try {
    fd = fs.openSync(filePath, 'r');
  } catch {
    return null;
  }
  try {
    const buf = Buffer.alloc(maxBytes);
    const bytesRead = fs.readSync(fd, buf, 0, maxBytes, 0);
    const text = buf.toString('utf-8', 0, bytesRead);
    const nl = text.indexOf('\n');
    return nl === -1 ? text : text.substring(0, nl);
  } finally {
    fs.closeSync(fd);
  }
}

/** Read session_meta from the beginning of a rollout file. */
export function readCodexSessionMeta(rolloutPath: string): CodexSessionMeta | null {
  const first = readFirstLine(rolloutPath)?.trim();
  if (!first) return null;
  let decoded: unknown;
  try {
    decoded = JSON.parse(first);
  } catch {
    return null;
  }
  const line = codexRolloutLineSchema.safeParse(decoded);
  if (!line.success || line.data.type !== 'session_meta') return null;
  const meta = codexSessionMetaSchema.safeParse(line.data.payload);
  return meta.success ? meta.data : null;
}

function withinRange(mtime: Date, options: DiscoveryOptions): boolean {
  if (options.since && mtime < options.since) return false;
  if (options.until && mtime > options.until) return false;
  return true;
}

// ── Locator ──

export class CodexSessionLocator implements SessionLocator {
  readonly platform: PlatformId = 'codex-cli';
  private readonly sessionsDir: string;

  constructor(sessionsDir: string = getCodexSessionsDir()) {
    this.sessionsDir = sessionsDir;
  }

  listSessions(options: DiscoveryOptions = {}): SessionFileInfo[] {
    return findRolloutFiles(this.sessionsDir)
      .filter(f => withinRange(f.mtime, options))
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime())
      .map(f => {
        const cwd = readCodexSessionMeta(f.path)?.cwd;
        return cwd ? { ...f, project: cwd } : f;
      });
  }

  findLatest(options: DiscoveryOptions = {}): SessionFileInfo | null {
    return this.listSessions(options)[0] ?? null;
  }
}

// ── Adapter ──

function tokenDelta(usage: CodexTokenUsage): { input: number; output: number; cacheRead: number } {
  return {
    input: usage.input_tokens ?? 0,
    output: (usage.output_tokens ?? 0) + (usage.reasoning_output_tokens ?? 0),
    cacheRead: usage.cached_input_tokens ?? 0,
  };
}

function decodeArguments(raw: string | undefined): Record<string, unknown> {
  if (!raw) return {};
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return { ...parsed };
    }
  } catch {
    // Arguments are free-form; unparseable ones are recorded as empty.
  }
  return {};
}

export class CodexAdapter implements JsonlPlatformAdapter {
  readonly platform: PlatformId = 'codex-cli';
  readonly sourceKind = 'jsonl';

  private model = '';
  private cwd: string | undefined;
  private cliVersion: string | undefined;
  private gitInfo: Record<string, unknown> | null = null;
  private sessionId: string | undefined;

  parse(record: unknown): CanonicalEvent[] {
    const line = codexRolloutLineSchema.safeParse(record);
    if (!line.success) return [];
    const timestamp = line.data.timestamp || new Date().toISOString();
    const payload = line.data.payload;

    switch (line.data.type) {
      case 'session_meta': {
        const meta = codexSessionMetaSchema.safeParse(payload);
        if (meta.success) {
          this.sessionId = meta.data.id ?? this.sessionId;
          this.cwd = meta.data.cwd ?? this.cwd;
          this.cliVersion = meta.data.cli_version ?? this.cliVersion;
          this.gitInfo = meta.data.git ?? this.gitInfo;
        }
        return [];
      }
      case 'turn_context': {
        const ctx = codexTurnContextSchema.safeParse(payload);
        if (ctx.success && ctx.data.model && !this.model) this.model = ctx.data.model;
        return [];
      }
      case 'event_msg':
        return this.parseTokenCount(payload, timestamp);
      case 'response_item':
        return this.parseResponseItem(payload, timestamp);
      default:
        return [];
    }
  }

  platformMetadata(): Record<string, unknown> {
    return {
      model: this.model || null,
      model_name: modelDisplayName(this.model) || null,
      cli_version: this.cliVersion ?? null,
      session_cwd: this.cwd ?? null,
      session_id: this.sessionId ?? null,
      git_info: this.gitInfo,
    };
  }

  workingDirectory(): string | undefined {
    return this.cwd;
  }

  // Rollouts carry no session bounds; event timestamps define them.
  sessionStartTime(): string | undefined {
    return undefined;
  }

  sessionEndTime(): string | undefined {
    return undefined;
  }

  private parseTokenCount(payload: unknown, timestamp: string): CanonicalEvent[] {
    const count = codexTokenCountSchema.safeParse(payload);
    if (!count.success || !count.data.info) return [];
    const usage = count.data.info.last_token_usage || count.data.info.total_token_usage;
    if (!usage) return [];

    const delta = tokenDelta(usage);
    if (delta.input + delta.output + delta.cacheRead === 0) return [];

    const event: SessionTokenDelta = {
      kind: 'session',
      toolName: SESSION_SENTINEL,
      timestamp,
      input: delta.input,
      output: delta.output,
      cacheCreated: 0,
      cacheRead: delta.cacheRead,
      messages: 0,
    };
    if (this.model) event.model = this.model;
    return [event];
  }

  private parseResponseItem(payload: unknown, timestamp: string): CanonicalEvent[] {
    const call = codexFunctionCallSchema.safeParse(payload);
    if (call.success) {
      if (!call.data.name.startsWith(MCP_PREFIX)) return [];
      const parsed = parseMcpToolName(call.data.name);
      if (!parsed) return [];

      const parameters = decodeArguments(call.data.arguments);
      const event: ToolCallEvent = {
        kind: 'tool',
        toolName: call.data.name,
        server: parsed.server,
        tool: parsed.tool,
        timestamp,
        tokens: { input: 0, output: 0, cacheCreated: 0, cacheRead: 0 },
        parameters,
      };
      if (Object.keys(parameters).length > 0) event.contentSignature = contentSignature(parameters);
      if (call.data.call_id) event.callId = call.data.call_id;
      if (this.model) event.model = this.model;
      return [event];
    }

    const message = codexMessageSchema.safeParse(payload);
    if (message.success && message.data.role === 'assistant') {
      const event: SessionTokenDelta = {
        kind: 'session',
        toolName: SESSION_SENTINEL,
        timestamp,
        input: 0,
        output: 0,
        cacheCreated: 0,
        cacheRead: 0,
        messages: 1,
      };
      if (this.model) event.model = this.model;
      return [event];
    }
    return [];
  }
}
