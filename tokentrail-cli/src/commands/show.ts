/**
 * `tokentrail show <session>`: summary of one stored session.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { estimateCost, pricingFromTable, mcpSharePct } from 'tokentrail-shared';
import type { PricingTable, SessionSnapshot } from 'tokentrail-shared';
import { createContext, exitWithError, loadSessionRef, writeJson } from '../context';
import { formatCost, formatDuration, formatNumber, formatRatio, sectionHeader, severityColor } from '../formatters';

function line(label: string, value: string): string {
  return `  ${chalk.dim((label + ':').padEnd(16))}${value}\n`;
}

export function printSessionSummary(snapshot: SessionSnapshot, pricing: PricingTable): void {
  const { session, token_usage: usage, mcp_summary: mcp } = snapshot;
  const out = process.stdout;

  out.write(sectionHeader(`Session ${session.id}`));
  out.write(line('Platform', session.platform));
  out.write(line('Project', session.project));
  if (session.model) out.write(line('Model', session.model_name || session.model));
  out.write(line('Started', session.start_time));
  out.write(line('Duration', formatDuration(session.duration_seconds)));
  out.write(line('Messages', formatNumber(session.message_count)));
  out.write(line('Status', session.status));
  out.write('\n');

  out.write(sectionHeader('Token Usage'));
  out.write(line('Total', chalk.bold(formatNumber(usage.total_tokens))));
  out.write(line('  Input', formatNumber(usage.input_tokens)));
  out.write(line('  Output', formatNumber(usage.output_tokens)));
  out.write(line('  Cache write', formatNumber(usage.cache_created_tokens)));
  out.write(line('  Cache read', formatNumber(usage.cache_read_tokens)));
  out.write(line('Cache hit', formatRatio(usage.cache_efficiency)));
  const cost = estimateCost(usage, session.model, pricingFromTable(pricing));
  if (cost !== null) out.write(line('Est. cost', chalk.green(formatCost(cost))));
  out.write('\n');

  out.write(sectionHeader('MCP Usage'));
  out.write(line('Calls', formatNumber(mcp.total_calls)));
  out.write(line('Unique tools', formatNumber(mcp.unique_tools)));
  out.write(line('MCP tokens', `${formatNumber(mcp.total_tokens)} (${mcpSharePct(snapshot).toFixed(1)}%)`));

  const servers = Object.entries(snapshot.server_sessions).sort((a, b) => b[1].total_tokens - a[1].total_tokens);
  for (const [serverName, server] of servers) {
    out.write(`\n  ${chalk.cyan(serverName)} ${chalk.dim(`${server.total_calls} calls, ${formatNumber(server.total_tokens)} tokens`)}\n`);
    const tools = Object.entries(server.tools).sort((a, b) => b[1].total_tokens - a[1].total_tokens);
    for (const [toolName, stats] of tools) {
      out.write(
        `    ${chalk.yellow(toolName.padEnd(28))}` +
        `${formatNumber(stats.calls).padStart(6)} calls` +
        `${formatNumber(stats.total_tokens).padStart(10)}` +
        chalk.dim(`  avg ${formatNumber(stats.avg_tokens)}`) + '\n',
      );
    }
  }
  out.write('\n');

  if (snapshot.smells.length > 0) {
    out.write(sectionHeader('Smells'));
    for (const smell of snapshot.smells) {
      const color = severityColor(smell.severity);
      const target = smell.tool ? chalk.dim(` ${smell.tool}`) : '';
      out.write(`  ${color(smell.pattern.padEnd(18))}${target} ${smell.description}\n`);
    }
    out.write('\n');
  }

  const { parse_errors: parseErrors, io_errors: ioErrors } = snapshot.data_quality;
  if (parseErrors + ioErrors > 0) {
    out.write(chalk.dim(`${parseErrors} unparseable records, ${ioErrors} read failures skipped\n`));
  }
}

export async function showAction(ref: string, _opts: Record<string, unknown>, cmd: Command): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const snapshot = loadSessionRef(ctx.sessionsDir, ref);
    if (ctx.json) writeJson(snapshot);
    else printSessionSummary(snapshot, ctx.config.pricing);
  } catch (err) {
    exitWithError(err);
  }
}
