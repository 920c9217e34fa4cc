/**
 * SessionAggregate: the mutable accumulator for one tracked session.
 *
 * Canonical events are applied in arrival order. Each `apply()` validates
 * the whole event before touching any state, so a rejected event leaves the
 * aggregate exactly as it was. Tool-call tokens roll up into the server and
 * tool totals; session totals only move on `__session__` deltas.
 *
 * Once finalized the aggregate is frozen and further events throw.
 *
 * @module aggregation/SessionAggregate
 */

import { randomUUID } from 'crypto';
import type { CanonicalEvent, PlatformId, TokenCounts, ToolCallEvent } from '../types/events';
import { SESSION_SENTINEL, emptyTokenCounts, sumTokenCounts } from '../types/events';
import type {
  CallRecord,
  ServerSessionSnapshot,
  SessionSnapshot,
  ToolStatsSnapshot,
} from '../types/session';
import { SNAPSHOT_SCHEMA_VERSION } from '../types/session';
import { parseMcpToolName } from '../providers/toolNames';
import { modelDisplayName } from '../providers/models';
import { detectSmells, DEFAULT_SMELL_THRESHOLDS } from '../analytics/smells';
import type { SmellThresholds } from '../analytics/smells';
import { SessionFinalizedError } from '../errors';
import type { DiagnosticKind } from '../tailing/types';

// ── Types ──

/** Session-level token totals with derived fields kept current. */
export interface TokenTotals extends TokenCounts {
  total: number;
  /** cache_read / (input + cache_created + cache_read), or 0. */
  cacheEfficiency: number;
}

export interface SessionAggregateOptions {
  platform: PlatformId;
  project: string;
  sessionId?: string;
  /** ISO start time. Defaults to the first event's timestamp. */
  startTime?: string;
  workingDirectory?: string;
  /** Retained call records per tool. Default 500. */
  callHistoryCap?: number;
  smellThresholds?: SmellThresholds;
  /** Clock used for the default finalize time. */
  now?: () => Date;
}

interface ToolState {
  calls: number;
  totalTokens: number;
  history: CallRecord[];
}

interface ServerState {
  totalCalls: number;
  totalTokens: number;
  tools: Map<string, ToolState>;
}

const DEFAULT_CALL_HISTORY_CAP = 500;

// ── Helpers ──

function isValidCount(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

function validCounts(t: TokenCounts): boolean {
  return isValidCount(t.input) && isValidCount(t.output) && isValidCount(t.cacheCreated) && isValidCount(t.cacheRead);
}

function timeOf(iso: string): number | null {
  const ms = Date.parse(iso);
  return Number.isNaN(ms) ? null : ms;
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

export function computeCacheEfficiency(t: TokenCounts): number {
  const denominator = t.input + t.cacheCreated + t.cacheRead;
  return denominator > 0 ? t.cacheRead / denominator : 0;
}

// ── Aggregate ──

export class SessionAggregate {
  readonly id: string;
  readonly platform: PlatformId;
  readonly project: string;

  private readonly callHistoryCap: number;
  private readonly smellThresholds: SmellThresholds;
  private readonly now: () => Date;
  private readonly createdAt: string;

  private model = '';
  private workingDirectory: string;
  private startTime: string | null;
  private startMs: number | null;
  private lastActivityMs: number | null = null;

  private readonly tokens: TokenCounts = emptyTokenCounts();
  private messageCount = 0;
  private totalCalls = 0;
  private uniqueTools = 0;
  private readonly servers = new Map<string, ServerState>();
  private readonly sourceFiles: string[] = [];
  private platformMetadata: Record<string, unknown> = {};
  private parseErrors = 0;
  private ioErrors = 0;

  private finalSnapshot: Readonly<SessionSnapshot> | null = null;

  constructor(options: SessionAggregateOptions) {
    this.id = options.sessionId ?? randomUUID();
    this.platform = options.platform;
    this.project = options.project;
    this.workingDirectory = options.workingDirectory ?? '';
    this.callHistoryCap = options.callHistoryCap ?? DEFAULT_CALL_HISTORY_CAP;
    this.smellThresholds = options.smellThresholds ?? DEFAULT_SMELL_THRESHOLDS;
    this.now = options.now ?? (() => new Date());
    this.createdAt = this.now().toISOString();
    this.startTime = options.startTime ?? null;
    this.startMs = this.startTime ? timeOf(this.startTime) : null;
  }

  // ── Accessors ──

  get isFinalized(): boolean {
    return this.finalSnapshot !== null;
  }

  get tokenTotals(): TokenTotals {
    return {
      ...this.tokens,
      total: sumTokenCounts(this.tokens),
      cacheEfficiency: computeCacheEfficiency(this.tokens),
    };
  }

  /** Latest event timestamp seen, as ISO. */
  get lastActivityTime(): string | null {
    return this.lastActivityMs === null ? null : new Date(this.lastActivityMs).toISOString();
  }

  /** True once any tokens or tool calls have been recorded. */
  hasData(): boolean {
    return sumTokenCounts(this.tokens) > 0 || this.totalCalls > 0;
  }

  // ── Mutation ──

  /**
   * Applies one canonical event. Returns false (and changes nothing) when
   * the event is rejected.
   */
  apply(event: CanonicalEvent): boolean {
    this.assertOpen();

    if (event.kind === 'session') {
      if (event.toolName !== SESSION_SENTINEL || !validCounts(event) || !isValidCount(event.messages)) {
        return false;
      }
      this.tokens.input += event.input;
      this.tokens.output += event.output;
      this.tokens.cacheCreated += event.cacheCreated;
      this.tokens.cacheRead += event.cacheRead;
      this.messageCount += event.messages;
      this.observe(event.timestamp, event.model);
      return true;
    }

    const parsed = parseMcpToolName(event.toolName);
    if (!parsed || !validCounts(event.tokens)) return false;
    if (event.durationMs !== undefined && !isValidCount(event.durationMs)) return false;

    this.recordToolCall(parsed.server, parsed.tool, event);
    this.observe(event.timestamp, event.model);
    return true;
  }

  addSourceFile(filePath: string): void {
    this.assertOpen();
    if (!this.sourceFiles.includes(filePath)) this.sourceFiles.push(filePath);
  }

  setWorkingDirectory(dir: string): void {
    this.assertOpen();
    if (!this.workingDirectory) this.workingDirectory = dir;
  }

  setPlatformMetadata(metadata: Record<string, unknown>): void {
    this.assertOpen();
    this.platformMetadata = { ...metadata };
  }

  recordDiagnostic(kind: DiagnosticKind): void {
    if (this.isFinalized) return;
    if (kind === 'parse') this.parseErrors++;
    else this.ioErrors++;
  }

  /**
   * Freezes the aggregate and returns its final snapshot. Calling it again
   * returns the same snapshot.
   */
  finalize(endTime?: string): Readonly<SessionSnapshot> {
    if (this.finalSnapshot) return this.finalSnapshot;
    const end = endTime ?? this.now().toISOString();
    this.finalSnapshot = deepFreeze(this.buildSnapshot('complete', end));
    return this.finalSnapshot;
  }

  /** Point-in-time snapshot; the final one once finalized. */
  toSnapshot(): SessionSnapshot {
    if (this.finalSnapshot) return structuredClone(this.finalSnapshot);
    return this.buildSnapshot('active', null);
  }

  /**
   * Moves the session start back to `timestamp` when it is earlier than the
   * current one. Unparseable values are ignored. Does not count as data.
   */
  setStartTime(timestamp: string): void {
    this.assertOpen();
    const ms = timeOf(timestamp);
    if (ms === null) return;
    if (this.startMs === null || ms < this.startMs) {
      this.startMs = ms;
      this.startTime = timestamp;
    }
  }

  // ── Internals ──

  private assertOpen(): void {
    if (this.finalSnapshot) throw new SessionFinalizedError(this.id);
  }

  private observe(timestamp: string, model: string | undefined): void {
    if (model && !this.model) this.model = model;
    const ms = timeOf(timestamp);
    if (ms === null) return;
    if (this.startMs === null) {
      this.startMs = ms;
      this.startTime = timestamp;
    }
    if (this.lastActivityMs === null || ms > this.lastActivityMs) this.lastActivityMs = ms;
  }

  private recordToolCall(serverName: string, toolName: string, event: ToolCallEvent): void {
    const callTokens = sumTokenCounts(event.tokens);

    let server = this.servers.get(serverName);
    if (!server) {
      server = { totalCalls: 0, totalTokens: 0, tools: new Map() };
      this.servers.set(serverName, server);
    }
    let tool = server.tools.get(toolName);
    if (!tool) {
      tool = { calls: 0, totalTokens: 0, history: [] };
      server.tools.set(toolName, tool);
      this.uniqueTools++;
    }

    const record: CallRecord = {
      timestamp: event.timestamp,
      total_tokens: callTokens,
      input_tokens: event.tokens.input,
      output_tokens: event.tokens.output,
      cache_created_tokens: event.tokens.cacheCreated,
      cache_read_tokens: event.tokens.cacheRead,
    };
    if (event.durationMs !== undefined) record.duration_ms = event.durationMs;
    if (event.success !== undefined) record.success = event.success;
    if (event.contentSignature) record.content_signature = event.contentSignature;
    if (event.callId) record.call_id = event.callId;

    tool.calls++;
    tool.totalTokens += callTokens;
    tool.history.push(record);
    if (tool.history.length > this.callHistoryCap) {
      tool.history.splice(0, tool.history.length - this.callHistoryCap);
    }

    server.totalCalls++;
    server.totalTokens += callTokens;
    this.totalCalls++;
  }

  private buildSnapshot(status: 'active' | 'complete', endTime: string | null): SessionSnapshot {
    const totals = this.tokenTotals;
    const endMs = endTime ? timeOf(endTime) : this.lastActivityMs;
    const durationSeconds = this.startMs !== null && endMs !== null
      ? Math.max(0, (endMs - this.startMs) / 1000)
      : 0;

    const serverSessions: Record<string, ServerSessionSnapshot> = {};
    let mcpTokens = 0;
    for (const [name, server] of this.servers) {
      const tools: Record<string, ToolStatsSnapshot> = {};
      for (const [toolName, tool] of server.tools) {
        tools[toolName] = {
          calls: tool.calls,
          total_tokens: tool.totalTokens,
          avg_tokens: tool.calls > 0 ? tool.totalTokens / tool.calls : 0,
          call_history: tool.history.map(r => ({ ...r })),
        };
      }
      serverSessions[name] = { total_calls: server.totalCalls, total_tokens: server.totalTokens, tools };
      mcpTokens += server.totalTokens;
    }

    const snapshot: SessionSnapshot = {
      schema_version: SNAPSHOT_SCHEMA_VERSION,
      session: {
        id: this.id,
        platform: this.platform,
        project: this.project,
        model: this.model,
        model_name: modelDisplayName(this.model),
        working_directory: this.workingDirectory,
        start_time: this.startTime ?? this.createdAt,
        end_time: endTime,
        duration_seconds: durationSeconds,
        message_count: this.messageCount,
        source_files: [...this.sourceFiles],
        status,
      },
      token_usage: {
        input_tokens: totals.input,
        output_tokens: totals.output,
        cache_created_tokens: totals.cacheCreated,
        cache_read_tokens: totals.cacheRead,
        total_tokens: totals.total,
        cache_efficiency: totals.cacheEfficiency,
      },
      mcp_summary: {
        total_calls: this.totalCalls,
        unique_tools: this.uniqueTools,
        total_tokens: mcpTokens,
      },
      server_sessions: serverSessions,
      smells: [],
      platform_metadata: { ...this.platformMetadata },
      data_quality: { parse_errors: this.parseErrors, io_errors: this.ioErrors },
    };
    snapshot.smells = detectSmells(snapshot, this.smellThresholds);
    return snapshot;
  }
}
