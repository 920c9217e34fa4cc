/**
 * Time-bucketed activity with z-score spike detection.
 *
 * Bucket width adapts to session length:
 *   < 10 min → 30 s, < 1 h → 60 s, < 4 h → 5 min, otherwise 15 min.
 *
 * @module analytics/timeline
 */

import type { SessionSnapshot } from '../types/session';
import { BUILTIN_SERVER } from '../types/events';

export const SPIKE_Z_THRESHOLD = 2.0;

export interface TimelineBucket {
  index: number;
  /** Offset of the bucket start from session start. */
  startSeconds: number;
  durationSeconds: number;
  mcpTokens: number;
  builtinTokens: number;
  totalTokens: number;
  callCount: number;
  isSpike: boolean;
  /** Z-score when the bucket is a spike, else 0. */
  spikeMagnitude: number;
}

export interface Timeline {
  durationSeconds: number;
  bucketSeconds: number;
  buckets: TimelineBucket[];
  spikes: TimelineBucket[];
  /**
   * True when calls left every bucket empty (no usable timestamps, or calls
   * that carry no tokens of their own) and the session total was spread evenly.
   */
  approximate: boolean;
  maxTokensPerBucket: number;
  /** Mean over non-zero buckets. */
  avgTokensPerBucket: number;
  stdDev: number;
  totalTokens: number;
  totalMcpTokens: number;
  totalBuiltinTokens: number;
}

export function bucketWidthFor(durationSeconds: number): number {
  if (durationSeconds < 600) return 30;
  if (durationSeconds < 3600) return 60;
  if (durationSeconds < 14400) return 300;
  return 900;
}

export function bucketCountFor(durationSeconds: number, width: number): number {
  return Math.ceil(Math.max(0, durationSeconds) / width) + 1;
}

/** Bucket for an offset; negative offsets land in bucket 0, late ones in the last bucket. */
export function bucketIndexFor(offsetSeconds: number, width: number, count: number): number {
  return Math.min(Math.floor(Math.max(0, offsetSeconds) / width), count - 1);
}

function parseTime(value: string | null | undefined): number | null {
  if (!value) return null;
  const ms = Date.parse(value);
  return Number.isNaN(ms) ? null : ms;
}

/**
 * Marks spikes in place and returns them with the statistics used.
 * Mean and population standard deviation are taken over non-zero buckets only.
 */
export function detectSpikes(buckets: TimelineBucket[]): { spikes: TimelineBucket[]; mean: number; stdDev: number } {
  const values = buckets.map(b => b.totalTokens).filter(v => v > 0);
  if (values.length === 0) return { spikes: [], mean: 0, stdDev: 0 };

  const mean = values.reduce((a, b) => a + b, 0) / values.length;
  const variance = values.reduce((acc, v) => acc + (v - mean) ** 2, 0) / values.length;
  const stdDev = variance > 0 ? Math.sqrt(variance) : 0;

  const spikes: TimelineBucket[] = [];
  if (stdDev > 0) {
    for (const bucket of buckets) {
      if (bucket.totalTokens <= 0) continue;
      const z = (bucket.totalTokens - mean) / stdDev;
      if (z > SPIKE_Z_THRESHOLD) {
        bucket.isSpike = true;
        bucket.spikeMagnitude = z;
        spikes.push(bucket);
      }
    }
  }
  return { spikes, mean, stdDev };
}

export function computeTimeline(snapshot: SessionSnapshot): Timeline {
  const durationSeconds = Math.max(0, snapshot.session.duration_seconds);
  const width = bucketWidthFor(durationSeconds);
  const count = bucketCountFor(durationSeconds, width);

  const buckets: TimelineBucket[] = Array.from({ length: count }, (_, index) => ({
    index,
    startSeconds: index * width,
    durationSeconds: width,
    mcpTokens: 0,
    builtinTokens: 0,
    totalTokens: 0,
    callCount: 0,
    isSpike: false,
    spikeMagnitude: 0,
  }));

  const startMs = parseTime(snapshot.session.start_time);

  for (const [serverName, server] of Object.entries(snapshot.server_sessions)) {
    const builtin = serverName === BUILTIN_SERVER;
    for (const stats of Object.values(server.tools)) {
      for (const call of stats.call_history) {
        const callMs = parseTime(call.timestamp);
        if (callMs === null) continue;
        const offset = startMs === null ? 0 : (callMs - startMs) / 1000;
        const bucket = buckets[bucketIndexFor(offset, width, count)];
        bucket.totalTokens += call.total_tokens;
        bucket.callCount++;
        if (builtin) bucket.builtinTokens += call.total_tokens;
        else bucket.mcpTokens += call.total_tokens;
      }
    }
  }

  const approximate = snapshot.token_usage.total_tokens > 0 && buckets.every(b => b.totalTokens === 0);
  if (approximate) {
    const perBucket = Math.floor(snapshot.token_usage.total_tokens / count);
    for (const bucket of buckets) {
      bucket.totalTokens = perBucket;
      bucket.builtinTokens = perBucket;
    }
  }

  const { spikes, mean, stdDev } = detectSpikes(buckets);

  return {
    durationSeconds,
    bucketSeconds: width,
    buckets,
    spikes,
    approximate,
    maxTokensPerBucket: Math.max(...buckets.map(b => b.totalTokens)),
    avgTokensPerBucket: mean,
    stdDev,
    totalTokens: buckets.reduce((a, b) => a + b.totalTokens, 0),
    totalMcpTokens: buckets.reduce((a, b) => a + b.mcpTokens, 0),
    totalBuiltinTokens: buckets.reduce((a, b) => a + b.builtinTokens, 0),
  };
}
