/**
 * Gemini CLI chat session format.
 *
 * Sessions live at ~/.gemini/tmp/<sha256(project root)>/chats/session-*.json
 * and are rewritten wholesale as the conversation grows, so they are read
 * as whole documents and deduplicated by message id.
 *
 * @module types/gemini
 */

import { z } from 'zod';

const tokenCount = z.number().nonnegative().optional();

export const geminiTokensSchema = z.object({
  input: tokenCount,
  output: tokenCount,
  cached: tokenCount,
  thoughts: tokenCount,
  tool: tokenCount,
  total: tokenCount,
});

export type GeminiTokens = z.infer<typeof geminiTokensSchema>;

export const geminiToolCallSchema = z.object({
  id: z.string().optional(),
  name: z.string(),
  args: z.record(z.unknown()).optional(),
  status: z.string().optional(),
  timestamp: z.string().optional(),
});

export type GeminiToolCall = z.infer<typeof geminiToolCallSchema>;

export const geminiMessageSchema = z.object({
  id: z.string().optional(),
  type: z.string(),
  timestamp: z.string().optional(),
  model: z.string().optional(),
  toolCalls: z.array(geminiToolCallSchema).optional(),
  tokens: geminiTokensSchema.nullable().optional(),
});

export type GeminiMessage = z.infer<typeof geminiMessageSchema>;

/** Document envelope. Messages stay unvalidated here so one bad entry does not reject the file. */
export const geminiSessionSchema = z.object({
  sessionId: z.string().optional(),
  projectHash: z.string().optional(),
  startTime: z.string().optional(),
  lastUpdated: z.string().optional(),
  messages: z.array(z.unknown()),
});

export type GeminiSession = z.infer<typeof geminiSessionSchema>;

/** Everything in the document except the message list. */
export type GeminiSessionHeader = Omit<GeminiSession, 'messages'>;
