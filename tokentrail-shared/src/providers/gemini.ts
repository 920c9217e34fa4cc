/**
 * Gemini CLI platform: chat document adapter and session locator.
 *
 * Gemini CLI writes each session as one JSON document in
 *   ~/.gemini/tmp/<sha256(project root)>/chats/session-*.json
 * and rewrites the whole file as messages are added. Token counts are
 * reported per agent message, with the tool share broken out separately.
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { getGeminiHome, getGeminiProjectHash } from '../paths';
import { MCP_PREFIX, SESSION_SENTINEL } from '../types/events';
import type { CanonicalEvent, PlatformId, SessionTokenDelta, ToolCallEvent } from '../types/events';
import { geminiMessageSchema, geminiSessionSchema } from '../types/gemini';
import type { GeminiTokens, GeminiToolCall } from '../types/gemini';
import { parseMcpToolName } from './toolNames';
import type { ParsedToolName } from './toolNames';
import { modelDisplayName } from './models';
import { contentSignature } from '../signature';
import type { DiscoveryOptions, DocumentPlatformAdapter, SessionFileInfo, SessionLocator } from './types';

// ── Locator ──

export interface ProjectHashInfo {
  hash: string;
  chatsDir: string;
  /** Newest session file mtime in the chats directory. */
  mtime: Date;
}

export interface GeminiLocatorOptions {
  geminiHome?: string;
  /** Explicit project hash; wins over `projectRoot`. */
  projectHash?: string;
  /** Project root whose hash is preferred when it has sessions. */
  projectRoot?: string;
}

function isSessionFile(filename: string): boolean {
  return filename.startsWith('session-') && filename.endsWith('.json');
}

/** `session-2025-11-30T10-00-abc.json` -> `2025-11-30T10-00-abc` */
export function extractGeminiSessionId(filename: string): string {
  return path.basename(filename, '.json').replace(/^session-/, '');
}

function listSessionFiles(chatsDir: string): SessionFileInfo[] {
  const results: SessionFileInfo[] = [];
  let names: string[];
  try {
    names = fs.readdirSync(chatsDir);
  } catch {
    return results;
  }
  for (const name of names) {
    if (!isSessionFile(name)) continue;
    const fullPath = path.join(chatsDir, name);
    try {
      const stats = fs.statSync(fullPath);
      if (stats.isFile()) {
        results.push({ path: fullPath, sessionId: extractGeminiSessionId(name), mtime: stats.mtime, size: stats.size });
      }
    } catch {
      // Skip inaccessible files
    }
  }
  return results;
}

export class GeminiSessionLocator implements SessionLocator {
  readonly platform: PlatformId = 'gemini-cli';
  private readonly geminiHome: string;
  private readonly projectHash: string | undefined;
  private readonly projectRoot: string | undefined;

  constructor(options: GeminiLocatorOptions = {}) {
    this.geminiHome = options.geminiHome ?? getGeminiHome();
    this.projectHash = options.projectHash;
    this.projectRoot = options.projectRoot;
  }

  /** Project directories that contain at least one session, newest first. */
  listProjectHashes(): ProjectHashInfo[] {
    const tmpDir = path.join(this.geminiHome, 'tmp');
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(tmpDir, { withFileTypes: true });
    } catch {
      return [];
    }

    const results: ProjectHashInfo[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory() || !/^[0-9a-f]{64}$/.test(entry.name)) continue;
      const chatsDir = path.join(tmpDir, entry.name, 'chats');
      const sessions = listSessionFiles(chatsDir);
      if (sessions.length === 0) continue;
      const newest = Math.max(...sessions.map(s => s.mtime.getTime()));
      results.push({ hash: entry.name, chatsDir, mtime: new Date(newest) });
    }
    return results.sort((a, b) => b.mtime.getTime() - a.mtime.getTime());
  }

  /**
   * Explicit hash first, then the hash of the project root if Gemini has
   * sessions for it, then the most recently active project.
   */
  resolveProjectHash(): string | null {
    if (this.projectHash) return this.projectHash;
    const known = this.listProjectHashes();
    if (this.projectRoot) {
      const calculated = getGeminiProjectHash(this.projectRoot);
      if (known.some(k => k.hash === calculated)) return calculated;
    }
    return known[0]?.hash ?? null;
  }

  listSessions(options: DiscoveryOptions = {}): SessionFileInfo[] {
    const hash = this.resolveProjectHash();
    if (!hash) return [];
    const chatsDir = path.join(this.geminiHome, 'tmp', hash, 'chats');
    return listSessionFiles(chatsDir)
      .filter(f => (!options.since || f.mtime >= options.since) && (!options.until || f.mtime <= options.until))
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime())
      .map(f => ({ ...f, project: hash }));
  }

  findLatest(options: DiscoveryOptions = {}): SessionFileInfo | null {
    return this.listSessions(options)[0] ?? null;
  }
}

// ── Adapter ──

const messageIdSchema = z.object({ id: z.string().min(1) });

interface McpCall {
  call: GeminiToolCall;
  name: ParsedToolName;
}

function firstMcpCall(calls: GeminiToolCall[] | undefined): McpCall | null {
  for (const call of calls ?? []) {
    if (!call.name.startsWith(MCP_PREFIX)) continue;
    const name = parseMcpToolName(call.name);
    if (name) return { call, name };
  }
  return null;
}

export class GeminiAdapter implements DocumentPlatformAdapter {
  readonly platform: PlatformId = 'gemini-cli';
  readonly sourceKind = 'document';

  private model = '';
  private thoughtsTokens = 0;
  private sessionId: string | undefined;
  private projectHash: string | undefined;
  private startTime: string | undefined;
  private lastUpdated: string | undefined;

  /** Returns the message list and records the document's session fields. */
  splitDocument(document: unknown): unknown[] | null {
    const parsed = geminiSessionSchema.safeParse(document);
    if (!parsed.success) return null;
    this.sessionId = parsed.data.sessionId ?? this.sessionId;
    this.projectHash = parsed.data.projectHash ?? this.projectHash;
    this.startTime = parsed.data.startTime ?? this.startTime;
    this.lastUpdated = parsed.data.lastUpdated ?? this.lastUpdated;
    return parsed.data.messages;
  }

  messageId(message: unknown): string | undefined {
    const parsed = messageIdSchema.safeParse(message);
    return parsed.success ? parsed.data.id : undefined;
  }

  /**
   * Only agent (`gemini`) messages count. Each yields an optional tool
   * call (the first MCP call in the message, which claims the message's
   * `tool` token count) followed by the session token delta.
   */
  parse(record: unknown): CanonicalEvent[] {
    const parsed = geminiMessageSchema.safeParse(record);
    if (!parsed.success) return [];
    const msg = parsed.data;
    if (msg.type !== 'gemini') return [];

    if (msg.model && !this.model) this.model = msg.model;

    const tokens: GeminiTokens = msg.tokens ?? {};
    const thoughts = tokens.thoughts ?? 0;
    this.thoughtsTokens += thoughts;

    const timestamp = msg.timestamp || new Date().toISOString();
    const events: CanonicalEvent[] = [];

    const mcp = firstMcpCall(msg.toolCalls);
    if (mcp) events.push(this.toolEvent(mcp, tokens.tool ?? 0, timestamp));

    const delta: SessionTokenDelta = {
      kind: 'session',
      toolName: SESSION_SENTINEL,
      timestamp,
      input: tokens.input ?? 0,
      output: (tokens.output ?? 0) + thoughts,
      cacheCreated: 0,
      cacheRead: tokens.cached ?? 0,
      messages: 1,
    };
    if (this.model) delta.model = this.model;
    events.push(delta);
    return events;
  }

  platformMetadata(): Record<string, unknown> {
    return {
      model: this.model || null,
      model_name: modelDisplayName(this.model) || null,
      session_id: this.sessionId ?? null,
      project_hash: this.projectHash ?? null,
      session_start: this.startTime ?? null,
      thoughts_tokens: this.thoughtsTokens,
    };
  }

  workingDirectory(): string | undefined {
    return undefined;
  }

  sessionStartTime(): string | undefined {
    return this.startTime;
  }

  sessionEndTime(): string | undefined {
    return this.lastUpdated;
  }

  private toolEvent({ call, name }: McpCall, toolTokens: number, fallbackTimestamp: string): ToolCallEvent {
    const parameters = call.args ? { ...call.args } : {};
    const event: ToolCallEvent = {
      kind: 'tool',
      toolName: call.name,
      server: name.server,
      tool: name.tool,
      timestamp: call.timestamp || fallbackTimestamp,
      tokens: { input: 0, output: toolTokens, cacheCreated: 0, cacheRead: 0 },
      parameters,
    };
    if (call.status !== undefined) event.success = call.status === 'success';
    if (Object.keys(parameters).length > 0) event.contentSignature = contentSignature(parameters);
    if (call.id) event.callId = call.id;
    if (this.model) event.model = this.model;
    return event;
  }
}
