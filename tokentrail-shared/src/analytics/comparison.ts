/**
 * Multi-session comparison against a baseline.
 *
 * @module analytics/comparison
 */

import type { SessionSnapshot } from '../types/session';
import { BUILTIN_SERVER } from '../types/events';
import { toolKey } from '../providers/toolNames';

export const TOP_TOOL_CHANGES = 5;

export interface ToolChange {
  /** `server.tool` */
  key: string;
  deltaTokens: number;
}

export interface Comparison {
  baseline: SessionSnapshot;
  comparisons: SessionSnapshot[];
  /** `comparison.total - baseline.total`, one per comparison session. */
  tokenDeltas: number[];
  /** Percentage-point change in MCP share, one per comparison session. */
  mcpShareDeltas: number[];
  /** Largest absolute per-tool deltas summed over every comparison. */
  toolChanges: ToolChange[];
  /** pattern → presence in [baseline, ...comparisons]. */
  smellMatrix: Record<string, boolean[]>;
}

/**
 * MCP tokens as a percentage of the session total; 0 for an empty session.
 *
 * Tool-call tokens are not part of `token_usage.total_tokens`, so the share
 * can exceed 100 (gemini-cli reports a message's tool tokens separately).
 */
export function mcpSharePct(snapshot: SessionSnapshot): number {
  const total = snapshot.token_usage.total_tokens;
  return total > 0 ? (snapshot.mcp_summary.total_tokens / total) * 100 : 0;
}

function toolTokens(snapshot: SessionSnapshot): Map<string, number> {
  const out = new Map<string, number>();
  for (const [serverName, server] of Object.entries(snapshot.server_sessions)) {
    if (serverName === BUILTIN_SERVER) continue;
    for (const [toolName, stats] of Object.entries(server.tools)) {
      out.set(toolKey(serverName, toolName), stats.total_tokens);
    }
  }
  return out;
}

/**
 * Compares sessions in selection order; the first is the baseline.
 * Returns null when fewer than two sessions are given.
 */
export function compareSessions(sessions: readonly SessionSnapshot[]): Comparison | null {
  if (sessions.length < 2) return null;
  const [baseline, ...comparisons] = sessions;

  const baseTotal = baseline.token_usage.total_tokens;
  const baseShare = mcpSharePct(baseline);
  const tokenDeltas = comparisons.map(c => c.token_usage.total_tokens - baseTotal);
  const mcpShareDeltas = comparisons.map(c => mcpSharePct(c) - baseShare);

  const baseTools = toolTokens(baseline);
  const sums = new Map<string, number>();
  for (const comp of comparisons) {
    const compTools = toolTokens(comp);
    const keys = new Set([...baseTools.keys(), ...compTools.keys()]);
    for (const key of keys) {
      const delta = (compTools.get(key) ?? 0) - (baseTools.get(key) ?? 0);
      sums.set(key, (sums.get(key) ?? 0) + delta);
    }
  }
  const toolChanges = [...sums.entries()]
    .map(([key, deltaTokens]) => ({ key, deltaTokens }))
    .sort((a, b) => Math.abs(b.deltaTokens) - Math.abs(a.deltaTokens) || a.key.localeCompare(b.key))
    .slice(0, TOP_TOOL_CHANGES);

  const perSession = sessions.map(s => new Set(s.smells.map(smell => smell.pattern).filter(Boolean)));
  const patterns = new Set<string>();
  for (const set of perSession) for (const p of set) patterns.add(p);
  const smellMatrix: Record<string, boolean[]> = {};
  for (const pattern of [...patterns].sort()) {
    smellMatrix[pattern] = perSession.map(set => set.has(pattern));
  }

  return { baseline, comparisons, tokenDeltas, mcpShareDeltas, toolChanges, smellMatrix };
}
