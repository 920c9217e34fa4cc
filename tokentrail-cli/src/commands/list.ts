/**
 * `tokentrail list`: finalized sessions in the store, newest first.
 */

import type { Command } from 'commander';
import chalk from 'chalk';
import { isPlatformId, listStoredSessions, loadSession } from 'tokentrail-shared';
import type { ListSessionsOptions } from 'tokentrail-shared';
import { createContext, exitWithError, parsePositiveInt, writeJson } from '../context';
import { formatDuration, formatNumber, sectionHeader } from '../formatters';

const DEFAULT_LIMIT = 20;

export async function listAction(opts: Record<string, unknown>, cmd: Command): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const options: ListSessionsOptions = {
      limit: typeof opts.limit === 'string' ? parsePositiveInt(opts.limit, '--limit') : DEFAULT_LIMIT,
    };
    const platform = opts.platform;
    if (typeof platform === 'string') {
      if (!isPlatformId(platform)) throw new Error(`Unknown platform "${platform}"`);
      options.platform = platform;
    }

    const entries = listStoredSessions(ctx.sessionsDir, options).map(info => ({ info, snapshot: loadSession(info.path) }));

    if (ctx.json) {
      writeJson(entries.map(({ info, snapshot }) => ({
        session_id: info.sessionId,
        platform: info.platform,
        date: info.date,
        path: info.path,
        total_tokens: snapshot?.token_usage.total_tokens ?? null,
        mcp_calls: snapshot?.mcp_summary.total_calls ?? null,
      })));
      return;
    }

    if (entries.length === 0) {
      process.stdout.write(chalk.dim(`No sessions stored in ${ctx.sessionsDir}\n`));
      return;
    }

    process.stdout.write(sectionHeader('Sessions', 86));
    process.stdout.write(
      chalk.dim('  Date'.padEnd(14) +
        'Platform'.padEnd(12) +
        'Session'.padEnd(38) +
        'Tokens'.padStart(8) +
        'MCP'.padStart(6) +
        'Duration'.padStart(10)) + '\n',
    );
    for (const { info, snapshot } of entries) {
      const tokens = snapshot ? formatNumber(snapshot.token_usage.total_tokens) : '-';
      const calls = snapshot ? String(snapshot.mcp_summary.total_calls) : '-';
      const duration = snapshot ? formatDuration(snapshot.session.duration_seconds) : '-';
      process.stdout.write(
        `  ${info.date.padEnd(12)}` +
        `${info.platform.padEnd(12)}` +
        `${chalk.cyan(info.sessionId.padEnd(38))}` +
        `${tokens.padStart(8)}` +
        `${calls.padStart(6)}` +
        `${duration.padStart(10)}\n`,
      );
    }
  } catch (err) {
    exitWithError(err);
  }
}
