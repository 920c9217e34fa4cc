/**
 * `tokentrail process <file>`: batch mode over a complete session log.
 */

import * as path from 'path';
import type { Command } from 'commander';
import { createAdapter, getProjectName, processSessionFile } from 'tokentrail-shared';
import { createContext, exitWithError, resolvePlatform } from '../context';
import { reportStopResult } from './collect';
import { printSessionSummary } from './show';

export async function processAction(file: string, opts: Record<string, unknown>, cmd: Command): Promise<void> {
  try {
    const ctx = createContext(cmd);
    const filePath = path.resolve(file);
    const platformId = resolvePlatform(opts.platform);
    let diagnostics = 0;

    const result = processSessionFile({
      adapter: createAdapter(platformId),
      filePath,
      project: typeof opts.project === 'string' ? opts.project : getProjectName(),
      sessionsDir: ctx.sessionsDir,
      save: opts.save !== false,
      callHistoryCap: ctx.config.callHistoryCap,
      smellThresholds: ctx.config.smellThresholds,
      onDiagnostic: d => {
        diagnostics++;
        if (ctx.verbose) process.stderr.write(`  [${d.kind}] ${d.message}\n`);
      },
    });

    if (!ctx.json && result.status !== 'empty') {
      printSessionSummary(result.snapshot, ctx.config.pricing);
    }
    reportStopResult(result, ctx);
    if (!ctx.json && diagnostics > 0 && !ctx.verbose) {
      process.stderr.write(`${diagnostics} record(s) skipped; rerun with --verbose for details\n`);
    }
  } catch (err) {
    exitWithError(err);
  }
}
