/**
 * `tokentrail timeline <session>`: token activity per time bucket with spikes marked.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { computeTimeline } from 'tokentrail-shared';
import type { Timeline } from 'tokentrail-shared';
import { createContext, exitWithError, loadSessionRef, writeJson } from '../context';
import { bar, formatDuration, formatNumber, sectionHeader } from '../formatters';

function printTimeline(sessionId: string, timeline: Timeline): void {
  const out = process.stdout;
  out.write(sectionHeader(`Timeline ${sessionId}`, 70));
  out.write(chalk.dim(
    `  ${formatDuration(timeline.durationSeconds)} in ${timeline.buckets.length} buckets of ${formatDuration(timeline.bucketSeconds)}` +
    `, ${formatNumber(timeline.totalTokens)} tokens\n`,
  ));
  if (timeline.approximate) {
    out.write(chalk.yellow('  No per-call token timings; session total spread evenly\n'));
  }
  out.write('\n');

  for (const bucket of timeline.buckets) {
    const offset = formatDuration(bucket.startSeconds).padStart(8);
    const mcp = bar(bucket.mcpTokens, timeline.maxTokensPerBucket);
    const builtin = bar(bucket.builtinTokens, timeline.maxTokensPerBucket);
    const marker = bucket.isSpike ? chalk.red(` ▲ z=${bucket.spikeMagnitude.toFixed(1)}`) : '';
    out.write(
      `  ${chalk.dim(offset)} ${formatNumber(bucket.totalTokens).padStart(7)} ` +
      `${chalk.cyan(mcp)}${chalk.dim(builtin)}${marker}\n`,
    );
  }
  out.write('\n');

  if (timeline.spikes.length > 0) {
    out.write(chalk.red(`  ${timeline.spikes.length} spike(s)`) +
      chalk.dim(` (mean ${formatNumber(timeline.avgTokensPerBucket)}, std dev ${formatNumber(timeline.stdDev)})\n`));
  }
}

export async function timelineAction(ref: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const snapshot = loadSessionRef(ctx.sessionsDir, ref);
    const timeline = computeTimeline(snapshot);
    if (ctx.json) writeJson(timeline);
    else printTimeline(snapshot.session.id, timeline);
  } catch (err) {
    exitWithError(err);
  }
}
