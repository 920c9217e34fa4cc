/**
 * Per-tool token statistics: nearest-rank percentiles and a sparkline
 * histogram over the retained call history.
 *
 * @module analytics/percentiles
 */

import type { CallRecord, SessionSnapshot, Smell } from '../types/session';
import { toolKey } from '../providers/toolNames';

const HISTOGRAM_BLOCKS = ['▁', '▂', '▃', '▄', '▅', '▆', '▇', '█'];
export const HISTOGRAM_BINS = 10;

/**
 * Nearest-rank percentile over an ascending copy of `values`.
 * Index is `ceil(p/100 * n) - 1`, clamped to the array. Empty input gives 0.
 */
export function computePercentile(values: readonly number[], p: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  const idx = Math.min(Math.max(rank, 0), sorted.length - 1);
  return sorted[idx];
}

/** Bin counts over fixed-width bins spanning [min, max]. A zero range puts everything in bin 0. */
export function histogramBins(values: readonly number[], bins = HISTOGRAM_BINS): number[] {
  const counts = new Array<number>(bins).fill(0);
  if (values.length === 0) return counts;
  const min = Math.min(...values);
  const max = Math.max(...values);
  const range = max - min;
  for (const v of values) {
    const idx = range === 0 ? 0 : Math.min(Math.floor(((v - min) / range) * bins), bins - 1);
    counts[idx]++;
  }
  return counts;
}

/** Renders bin counts as block characters scaled to the tallest bin; empty bins are spaces. */
export function generateHistogram(values: readonly number[], bins = HISTOGRAM_BINS): string {
  if (values.length === 0) return '';
  const counts = histogramBins(values, bins);
  const tallest = Math.max(...counts);
  return counts
    .map(c => {
      if (c === 0) return ' ';
      const level = Math.min(Math.max(Math.ceil((c / tallest) * HISTOGRAM_BLOCKS.length), 1), HISTOGRAM_BLOCKS.length);
      return HISTOGRAM_BLOCKS[level - 1];
    })
    .join('');
}

export interface ToolDetail {
  server: string;
  tool: string;
  calls: number;
  totalTokens: number;
  avgTokens: number;
  minTokens: number;
  maxTokens: number;
  p50Tokens: number;
  p95Tokens: number;
  histogram: string;
  smells: Smell[];
  callHistory: CallRecord[];
}

/** Drill-down for one tool, or null if the session never called it. */
export function toolDetail(snapshot: SessionSnapshot, server: string, tool: string): ToolDetail | null {
  const serverSession = Object.hasOwn(snapshot.server_sessions, server) ? snapshot.server_sessions[server] : undefined;
  if (!serverSession || !Object.hasOwn(serverSession.tools, tool)) return null;
  const stats = serverSession.tools[tool];

  const tokens = stats.call_history.map(c => c.total_tokens);
  const key = toolKey(server, tool);

  return {
    server,
    tool,
    calls: stats.calls,
    totalTokens: stats.total_tokens,
    avgTokens: stats.avg_tokens,
    minTokens: tokens.length > 0 ? Math.min(...tokens) : 0,
    maxTokens: tokens.length > 0 ? Math.max(...tokens) : 0,
    p50Tokens: computePercentile(tokens, 50),
    p95Tokens: computePercentile(tokens, 95),
    histogram: generateHistogram(tokens),
    smells: snapshot.smells.filter(s => s.tool === key),
    callHistory: stats.call_history,
  };
}
