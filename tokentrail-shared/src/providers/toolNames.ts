/**
 * MCP tool name handling.
 *
 * Names follow `mcp__<server>__<tool>`. The server is the first segment
 * after the prefix; the tool is everything after the next `__`, which may
 * itself contain double underscores.
 */

import { MCP_PREFIX } from '../types/events';

export interface ParsedToolName {
  server: string;
  tool: string;
}

/** Splits an MCP tool name, or returns null if it is not one. */
export function parseMcpToolName(name: string): ParsedToolName | null {
  if (!name.startsWith(MCP_PREFIX)) return null;
  const rest = name.slice(MCP_PREFIX.length);
  const sep = rest.indexOf('__');
  if (sep <= 0) return null;
  const server = rest.slice(0, sep);
  const tool = rest.slice(sep + 2);
  if (!tool) return null;
  return { server, tool };
}

export function isMcpToolName(name: string): boolean {
  return parseMcpToolName(name) !== null;
}

/** `server.tool` key used by analytics and smells. */
export function toolKey(server: string, tool: string): string {
  return `${server}.${tool}`;
}
