/**
 * zod schema for persisted session snapshots. Files that fail it are
 * treated as unreadable.
 */

import { z } from 'zod';
import type { SessionSnapshot } from '../types/session';

const count = z.number().nonnegative();

const callRecordSchema = z.object({
  timestamp: z.string(),
  total_tokens: count,
  input_tokens: count,
  output_tokens: count,
  cache_created_tokens: count,
  cache_read_tokens: count,
  duration_ms: count.optional(),
  success: z.boolean().optional(),
  content_signature: z.string().optional(),
  call_id: z.string().optional(),
});

const toolStatsSchema = z.object({
  calls: count,
  total_tokens: count,
  avg_tokens: count,
  call_history: z.array(callRecordSchema),
});

const serverSessionSchema = z.object({
  total_calls: count,
  total_tokens: count,
  tools: z.record(toolStatsSchema),
});

const smellSchema = z.object({
  pattern: z.string(),
  severity: z.enum(['info', 'warning', 'high']),
  tool: z.string().optional(),
  description: z.string(),
});

export const sessionSnapshotSchema: z.ZodType<SessionSnapshot> = z.object({
  schema_version: z.number().int(),
  session: z.object({
    id: z.string(),
    platform: z.enum(['codex-cli', 'gemini-cli']),
    project: z.string(),
    model: z.string(),
    model_name: z.string(),
    working_directory: z.string(),
    start_time: z.string(),
    end_time: z.string().nullable(),
    duration_seconds: count,
    message_count: count,
    source_files: z.array(z.string()),
    status: z.enum(['active', 'complete']),
  }),
  token_usage: z.object({
    input_tokens: count,
    output_tokens: count,
    cache_created_tokens: count,
    cache_read_tokens: count,
    total_tokens: count,
    cache_efficiency: z.number().min(0).max(1),
  }),
  mcp_summary: z.object({
    total_calls: count,
    unique_tools: count,
    total_tokens: count,
  }),
  server_sessions: z.record(serverSessionSchema),
  smells: z.array(smellSchema),
  platform_metadata: z.record(z.unknown()),
  data_quality: z.object({
    parse_errors: count,
    io_errors: count,
  }),
});
