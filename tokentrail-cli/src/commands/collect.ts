/**
 * `tokentrail collect`: follow a live agent session until interrupted.
 *
 * Polls the session log, mirrors the running snapshot into the store's
 * active directory and, on SIGINT/SIGTERM, finalizes and saves it.
 */

import * as path from 'path';
import type { Command } from 'commander';
import chalk from 'chalk';
import {
  SessionTracker,
  createPlatform,
  errorMessage,
  getProjectName,
  installShutdownHooks,
  resolveSessionFile,
} from 'tokentrail-shared';
import type { PlatformId, SessionSnapshot, StopResult, TailDiagnostic } from 'tokentrail-shared';
import { createContext, exitWithError, parseDateOption, parsePositiveInt, resolvePlatform, writeJson } from '../context';
import type { CommandContext } from '../context';
import { formatNumber, formatRatio } from '../formatters';

/** Platform implied by a log file's extension when `--platform` is auto. */
function platformForFile(filePath: string): PlatformId | null {
  switch (path.extname(filePath)) {
    case '.jsonl': return 'codex-cli';
    case '.json': return 'gemini-cli';
    default: return null;
  }
}

function progressLine(snapshot: SessionSnapshot): string {
  const usage = snapshot.token_usage;
  return chalk.dim('  ') +
    `${formatNumber(usage.total_tokens).padStart(8)} tokens` +
    chalk.dim(`  cache ${formatRatio(usage.cache_efficiency)}`) +
    `  ${snapshot.mcp_summary.total_calls} MCP calls` +
    chalk.dim(`  ${snapshot.session.message_count} messages`) + '\n';
}

function diagnosticLine(diagnostic: TailDiagnostic): string {
  return chalk.dim(`  [${diagnostic.kind}] ${diagnostic.message}\n`);
}

/** Prints how a tracker ended; shared with `process`. */
export function reportStopResult(result: StopResult, ctx: CommandContext): void {
  if (ctx.json) {
    writeJson(result.status === 'empty' ? { status: 'empty' } : { ...result });
    return;
  }
  switch (result.status) {
    case 'empty':
      process.stdout.write(chalk.dim('No token usage recorded; nothing saved.\n'));
      break;
    case 'saved':
      process.stdout.write(`${chalk.green('Saved')} ${result.path}\n`);
      process.stdout.write(progressLine(result.snapshot));
      break;
    case 'unsaved':
      process.stdout.write(progressLine(result.snapshot));
      break;
  }
}

export async function collectAction(opts: Record<string, unknown>, cmd: Command): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const sessionFile = typeof opts.sessionFile === 'string' ? path.resolve(opts.sessionFile) : undefined;
    const explicitPlatform = opts.platform === undefined || opts.platform === 'auto' ? undefined : opts.platform;
    const platformId = resolvePlatform(explicitPlatform ?? (sessionFile ? platformForFile(sessionFile) ?? 'auto' : 'auto'));
    const platform = createPlatform(platformId, { projectRoot: process.cwd() });

    const since = typeof opts.since === 'string' ? parseDateOption(opts.since, '--since') : undefined;
    const until = typeof opts.until === 'string' ? parseDateOption(opts.until, '--until', true) : undefined;
    const filePath = sessionFile ?? resolveSessionFile(platform.locator, { since, until }).path;
    const project = typeof opts.project === 'string' ? opts.project : getProjectName();
    const pollIntervalMs = typeof opts.interval === 'string'
      ? parsePositiveInt(opts.interval, '--interval')
      : ctx.config.pollIntervalMs;

    const tracker = new SessionTracker({
      adapter: platform.adapter,
      filePath,
      project,
      sessionsDir: ctx.sessionsDir,
      save: opts.save !== false,
      pollIntervalMs,
      callHistoryCap: ctx.config.callHistoryCap,
      smellThresholds: ctx.config.smellThresholds,
      onDiagnostic: d => {
        if (ctx.verbose) process.stderr.write(diagnosticLine(d));
      },
      onUpdate: snapshot => {
        if (!ctx.json) process.stdout.write(progressLine(snapshot));
      },
    });

    if (!ctx.json) {
      process.stdout.write(chalk.bold(`Tracking ${platformId} session ${tracker.sessionId}\n`));
      process.stdout.write(chalk.dim(`  ${filePath}\n  Press Ctrl+C to stop.\n`));
    }

    // A signal reports and exits on its own; the loop may still wake before the exit lands.
    let stoppedBySignal = false;
    const uninstall = installShutdownHooks(tracker, {
      onStopped: result => {
        stoppedBySignal = true;
        reportStopResult(result, ctx);
      },
      onError: err => {
        stoppedBySignal = true;
        process.stderr.write(`Error: ${errorMessage(err)}\n`);
      },
    });
    try {
      const result = await tracker.run();
      if (!stoppedBySignal) reportStopResult(result, ctx);
    } finally {
      uninstall();
    }
  } catch (err) {
    exitWithError(err);
  }
}
