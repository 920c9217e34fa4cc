/**
 * Canonical event model shared by every platform adapter.
 *
 * Adapters translate vendor-specific log records into these two shapes;
 * the session aggregate never sees anything else.
 *
 * @module types/events
 */

/** Reserved tool name marking a pure session-level token delta. */
export const SESSION_SENTINEL = '__session__';

/** Prefix every MCP tool name carries (`mcp__<server>__<tool>`). */
export const MCP_PREFIX = 'mcp__';

/** Server name used for tools that do not go through an MCP server. */
export const BUILTIN_SERVER = 'builtin';

/** Supported agent CLIs. */
export type PlatformId = 'codex-cli' | 'gemini-cli';

export const PLATFORM_IDS: readonly PlatformId[] = ['codex-cli', 'gemini-cli'];

/** Token counts carried by a single event. */
export interface TokenCounts {
  input: number;
  output: number;
  cacheCreated: number;
  cacheRead: number;
}

/** Session-level token usage not attributable to a single tool call. */
export interface SessionTokenDelta extends TokenCounts {
  kind: 'session';
  toolName: typeof SESSION_SENTINEL;
  /** ISO 8601 timestamp from the source record. */
  timestamp: string;
  /** Assistant messages represented by this delta (0 or 1). */
  messages: number;
  model?: string;
}

/** One MCP tool invocation. */
export interface ToolCallEvent {
  kind: 'tool';
  /** Full MCP name, e.g. `mcp__zen__chat`. */
  toolName: string;
  server: string;
  tool: string;
  timestamp: string;
  tokens: TokenCounts;
  durationMs?: number;
  success?: boolean;
  parameters: Record<string, unknown>;
  contentSignature?: string;
  callId?: string;
  model?: string;
}

export type CanonicalEvent = SessionTokenDelta | ToolCallEvent;

export function emptyTokenCounts(): TokenCounts {
  return { input: 0, output: 0, cacheCreated: 0, cacheRead: 0 };
}

export function sumTokenCounts(t: TokenCounts): number {
  return t.input + t.output + t.cacheCreated + t.cacheRead;
}

export function isPlatformId(value: string): value is PlatformId {
  return value === 'codex-cli' || value === 'gemini-cli';
}
