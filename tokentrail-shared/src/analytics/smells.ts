/**
 * Usage smell detection over a session snapshot.
 *
 * @module analytics/smells
 */

import type { SessionSnapshot, Smell } from '../types/session';
import { toolKey } from '../providers/toolNames';

export interface SmellThresholds {
  /** Minimum retained calls before variance is judged. */
  highVarianceMinCalls: number;
  /** Coefficient of variation (std / mean) above which a tool is flagged. */
  highVarianceCv: number;
  /** Calls above which a tool is considered chatty. */
  chattyCalls: number;
  /** Identical-parameter calls at which duplicates are reported. */
  duplicateCalls: number;
  lowCacheHitRatio: number;
  /** Input-side tokens required before cache efficiency is judged. */
  lowCacheHitMinTokens: number;
}

export const DEFAULT_SMELL_THRESHOLDS: SmellThresholds = {
  highVarianceMinCalls: 5,
  highVarianceCv: 1.0,
  chattyCalls: 20,
  duplicateCalls: 3,
  lowCacheHitRatio: 0.2,
  lowCacheHitMinTokens: 10_000,
};

function mean(values: number[]): number {
  return values.reduce((a, b) => a + b, 0) / values.length;
}

function populationStdDev(values: number[], avg: number): number {
  return Math.sqrt(values.reduce((acc, v) => acc + (v - avg) ** 2, 0) / values.length);
}

/** Detects smells in stable order: per tool (servers and tools sorted), then session-wide. */
export function detectSmells(
  snapshot: SessionSnapshot,
  thresholds: SmellThresholds = DEFAULT_SMELL_THRESHOLDS,
): Smell[] {
  const smells: Smell[] = [];

  for (const server of Object.keys(snapshot.server_sessions).sort()) {
    const tools = snapshot.server_sessions[server].tools;
    for (const tool of Object.keys(tools).sort()) {
      const stats = tools[tool];
      const key = toolKey(server, tool);
      const tokens = stats.call_history.map(c => c.total_tokens);

      if (tokens.length >= thresholds.highVarianceMinCalls) {
        const avg = mean(tokens);
        if (avg > 0) {
          const cv = populationStdDev(tokens, avg) / avg;
          if (cv > thresholds.highVarianceCv) {
            smells.push({
              pattern: 'HIGH_VARIANCE',
              severity: 'warning',
              tool: key,
              description: `Token usage varies widely between calls (CV ${cv.toFixed(2)})`,
            });
          }
        }
      }

      if (stats.calls > thresholds.chattyCalls) {
        smells.push({
          pattern: 'CHATTY',
          severity: 'info',
          tool: key,
          description: `Called ${stats.calls} times in one session`,
        });
      }

      const signatures = new Map<string, number>();
      for (const call of stats.call_history) {
        if (!call.content_signature) continue;
        signatures.set(call.content_signature, (signatures.get(call.content_signature) ?? 0) + 1);
      }
      const maxRepeats = Math.max(0, ...signatures.values());
      if (maxRepeats >= thresholds.duplicateCalls) {
        smells.push({
          pattern: 'DUPLICATE_CALLS',
          severity: 'warning',
          tool: key,
          description: `Same parameters sent ${maxRepeats} times`,
        });
      }
    }
  }

  const usage = snapshot.token_usage;
  const inputSide = usage.input_tokens + usage.cache_created_tokens + usage.cache_read_tokens;
  if (inputSide >= thresholds.lowCacheHitMinTokens && usage.cache_efficiency < thresholds.lowCacheHitRatio) {
    smells.push({
      pattern: 'LOW_CACHE_HIT',
      severity: 'info',
      description: `Only ${(usage.cache_efficiency * 100).toFixed(1)}% of input tokens served from cache`,
    });
  }

  return smells;
}
