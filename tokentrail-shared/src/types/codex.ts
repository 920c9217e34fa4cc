/**
 * Codex CLI rollout format.
 *
 * Rollouts are append-only JSONL files under
 *   ~/.codex/sessions/YYYY/MM/DD/rollout-<timestamp>-<uuid>.jsonl
 * Every line is `{ timestamp, type, payload }`. Only the line types this
 * package reads are modelled; everything else passes through untouched.
 *
 * @module types/codex
 */

import { z } from 'zod';

export const codexRolloutLineSchema = z.object({
  timestamp: z.string().optional(),
  type: z.string(),
  payload: z.unknown().optional(),
});

export type CodexRolloutLine = z.infer<typeof codexRolloutLineSchema>;

export const codexSessionMetaSchema = z.object({
  id: z.string().optional(),
  cwd: z.string().optional(),
  cli_version: z.string().optional(),
  originator: z.string().optional(),
  git: z.record(z.unknown()).nullable().optional(),
});

export type CodexSessionMeta = z.infer<typeof codexSessionMetaSchema>;

export const codexTurnContextSchema = z.object({
  model: z.string().optional(),
  cwd: z.string().optional(),
});

const tokenCount = z.number().nonnegative().optional();

export const codexTokenUsageSchema = z.object({
  input_tokens: tokenCount,
  cached_input_tokens: tokenCount,
  output_tokens: tokenCount,
  reasoning_output_tokens: tokenCount,
  total_tokens: tokenCount,
});

export type CodexTokenUsage = z.infer<typeof codexTokenUsageSchema>;

export const codexTokenCountSchema = z.object({
  type: z.literal('token_count'),
  info: z.object({
    last_token_usage: codexTokenUsageSchema.nullable().optional(),
    total_token_usage: codexTokenUsageSchema.nullable().optional(),
  }).nullable().optional(),
});

export const codexFunctionCallSchema = z.object({
  type: z.literal('function_call'),
  name: z.string(),
  arguments: z.string().optional(),
  call_id: z.string().optional(),
});

export const codexMessageSchema = z.object({
  type: z.literal('message'),
  role: z.string(),
});
