/**
 * Persisted session snapshot format.
 *
 * This is the read-model produced by `SessionAggregate.toSnapshot()` and
 * written by the session store. Field names are snake_case because the
 * files are meant to be consumed by other tools as plain JSON.
 *
 * @module types/session
 */

import type { PlatformId } from './events';

/** Bump when the on-disk format changes incompatibly. */
export const SNAPSHOT_SCHEMA_VERSION = 1;

export type SessionStatus = 'active' | 'complete';

export interface CallRecord {
  timestamp: string;
  total_tokens: number;
  input_tokens: number;
  output_tokens: number;
  cache_created_tokens: number;
  cache_read_tokens: number;
  duration_ms?: number;
  success?: boolean;
  content_signature?: string;
  call_id?: string;
}

export interface ToolStatsSnapshot {
  calls: number;
  total_tokens: number;
  avg_tokens: number;
  /** Most recent calls, oldest first. Bounded; `calls` keeps counting past the cap. */
  call_history: CallRecord[];
}

export interface ServerSessionSnapshot {
  total_calls: number;
  total_tokens: number;
  tools: Record<string, ToolStatsSnapshot>;
}

export interface TokenUsageSnapshot {
  input_tokens: number;
  output_tokens: number;
  cache_created_tokens: number;
  cache_read_tokens: number;
  total_tokens: number;
  cache_efficiency: number;
}

export interface McpSummary {
  total_calls: number;
  unique_tools: number;
  total_tokens: number;
}

export type SmellSeverity = 'info' | 'warning' | 'high';

export interface Smell {
  /** Stable identifier, e.g. `CHATTY`. */
  pattern: string;
  severity: SmellSeverity;
  /** `server.tool` the smell refers to; absent for session-wide smells. */
  tool?: string;
  description: string;
}

export interface SessionInfo {
  id: string;
  platform: PlatformId;
  project: string;
  model: string;
  model_name: string;
  working_directory: string;
  start_time: string;
  end_time: string | null;
  duration_seconds: number;
  message_count: number;
  source_files: string[];
  status: SessionStatus;
}

export interface DataQuality {
  parse_errors: number;
  io_errors: number;
}

export interface SessionSnapshot {
  schema_version: number;
  session: SessionInfo;
  token_usage: TokenUsageSnapshot;
  mcp_summary: McpSummary;
  server_sessions: Record<string, ServerSessionSnapshot>;
  smells: Smell[];
  platform_metadata: Record<string, unknown>;
  data_quality: DataQuality;
}
