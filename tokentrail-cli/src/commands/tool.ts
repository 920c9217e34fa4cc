/**
 * `tokentrail tool <session> <server> <tool>`: per-call statistics for one tool.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { toolDetail, toolKey } from 'tokentrail-shared';
import type { ToolDetail } from 'tokentrail-shared';
import { createContext, exitWithError, loadSessionRef, writeJson } from '../context';
import { formatNumber, sectionHeader, severityColor } from '../formatters';

const RECENT_CALLS = 10;

function printToolDetail(detail: ToolDetail): void {
  const out = process.stdout;
  out.write(sectionHeader(toolKey(detail.server, detail.tool)));
  out.write(`  ${chalk.dim('Calls:'.padEnd(12))}${chalk.bold(formatNumber(detail.calls))}\n`);
  out.write(`  ${chalk.dim('Tokens:'.padEnd(12))}${formatNumber(detail.totalTokens)}\n`);
  out.write(`  ${chalk.dim('Average:'.padEnd(12))}${formatNumber(detail.avgTokens)}\n`);
  out.write(`  ${chalk.dim('Min / Max:'.padEnd(12))}${formatNumber(detail.minTokens)} / ${formatNumber(detail.maxTokens)}\n`);
  out.write(`  ${chalk.dim('p50 / p95:'.padEnd(12))}${formatNumber(detail.p50Tokens)} / ${formatNumber(detail.p95Tokens)}\n`);
  if (detail.histogram) out.write(`  ${chalk.dim('Histogram:'.padEnd(12))}${chalk.cyan(detail.histogram)}\n`);
  if (detail.callHistory.length < detail.calls) {
    out.write(chalk.dim(`  Statistics cover the last ${detail.callHistory.length} of ${detail.calls} calls\n`));
  }
  out.write('\n');

  if (detail.smells.length > 0) {
    for (const smell of detail.smells) {
      out.write(`  ${severityColor(smell.severity)(smell.pattern)} ${smell.description}\n`);
    }
    out.write('\n');
  }

  const recent = detail.callHistory.slice(-RECENT_CALLS);
  if (recent.length > 0) {
    out.write(sectionHeader('Recent Calls'));
    for (const call of recent) {
      const status = call.success === false ? chalk.red(' failed') : '';
      const duration = call.duration_ms !== undefined ? chalk.dim(` ${call.duration_ms}ms`) : '';
      out.write(`  ${chalk.dim(call.timestamp)}  ${formatNumber(call.total_tokens).padStart(8)}${duration}${status}\n`);
    }
  }
}

export async function toolAction(
  ref: string,
  server: string,
  tool: string,
  _opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const snapshot = loadSessionRef(ctx.sessionsDir, ref);
    const detail = toolDetail(snapshot, server, tool);
    if (!detail) throw new Error(`Session ${snapshot.session.id} has no calls to ${toolKey(server, tool)}`);
    if (ctx.json) writeJson(detail);
    else printToolDetail(detail);
  } catch (err) {
    exitWithError(err);
  }
}
