/**
 * `tokentrail compare <baseline> <other...>`: deltas against the first session.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { compareSessions, mcpSharePct } from 'tokentrail-shared';
import type { Comparison } from 'tokentrail-shared';
import { createContext, exitWithError, loadSessionRef, writeJson } from '../context';
import { formatDelta, formatNumber, sectionHeader } from '../formatters';

function signedPct(n: number): string {
  return (n > 0 ? '+' : '') + n.toFixed(1) + 'pp';
}

function colorDelta(n: number, text: string): string {
  if (n > 0) return chalk.red(text);
  if (n < 0) return chalk.green(text);
  return chalk.dim(text);
}

function printComparison(comparison: Comparison): void {
  const out = process.stdout;
  const { baseline, comparisons } = comparison;

  out.write(sectionHeader('Comparison', 70));
  out.write(chalk.dim('  Session'.padEnd(40) + 'Tokens'.padStart(10) + 'Delta'.padStart(10) + 'MCP %'.padStart(8) + 'Delta'.padStart(10)) + '\n');
  out.write(
    `  ${chalk.bold(baseline.session.id.padEnd(38))}` +
    `${formatNumber(baseline.token_usage.total_tokens).padStart(10)}` +
    `${chalk.dim('baseline'.padStart(10))}` +
    `${mcpSharePct(baseline).toFixed(1).padStart(8)}\n`,
  );
  comparisons.forEach((snap, i) => {
    const tokenDelta = comparison.tokenDeltas[i];
    const shareDelta = comparison.mcpShareDeltas[i];
    out.write(
      `  ${snap.session.id.padEnd(38)}` +
      `${formatNumber(snap.token_usage.total_tokens).padStart(10)}` +
      colorDelta(tokenDelta, formatDelta(tokenDelta).padStart(10)) +
      `${mcpSharePct(snap).toFixed(1).padStart(8)}` +
      colorDelta(shareDelta, signedPct(shareDelta).padStart(10)) + '\n',
    );
  });
  out.write('\n');

  if (comparison.toolChanges.length > 0) {
    out.write(sectionHeader('Largest Tool Changes'));
    for (const change of comparison.toolChanges) {
      out.write(`  ${chalk.yellow(change.key.padEnd(36))}${colorDelta(change.deltaTokens, formatDelta(change.deltaTokens).padStart(10))}\n`);
    }
    out.write('\n');
  }

  const patterns = Object.keys(comparison.smellMatrix).sort();
  if (patterns.length > 0) {
    out.write(sectionHeader('Smells'));
    for (const pattern of patterns) {
      const cells = comparison.smellMatrix[pattern].map(present => (present ? chalk.yellow('●') : chalk.dim('·'))).join(' ');
      out.write(`  ${pattern.padEnd(20)}${cells}\n`);
    }
  }
}

export async function compareAction(
  baselineRef: string,
  otherRefs: string[],
  _opts: Record<string, unknown>,
  cmd: Command,
): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const sessions = [baselineRef, ...otherRefs].map(ref => loadSessionRef(ctx.sessionsDir, ref));
    const comparison = compareSessions(sessions);
    if (!comparison) throw new Error('Comparison needs at least two sessions');

    if (ctx.json) {
      writeJson({
        baseline: comparison.baseline.session.id,
        comparisons: comparison.comparisons.map(s => s.session.id),
        token_deltas: comparison.tokenDeltas,
        mcp_share_deltas: comparison.mcpShareDeltas,
        tool_changes: comparison.toolChanges,
        smell_matrix: comparison.smellMatrix,
      });
    } else {
      printComparison(comparison);
    }
  } catch (err) {
    exitWithError(err);
  }
}
