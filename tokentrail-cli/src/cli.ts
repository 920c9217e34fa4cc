#!/usr/bin/env node

import { Command } from 'commander';
import { CLI_VERSION } from './version';

const program = new Command();

program
  .name('tokentrail')
  .description('Track and analyze MCP tool token usage in Codex CLI and Gemini CLI sessions')
  .version(CLI_VERSION)
  .option('--json', 'Output as JSON')
  .option('--sessions-dir <dir>', 'Session store directory (default: from config)')
  .option('--verbose', 'Report skipped records and read failures');

// Command modules are lazy-loaded so `--help` stays fast

const collectCmd = new Command('collect')
  .description('Follow a live session and save it when interrupted')
  .option('--platform <id>', 'Platform: codex-cli, gemini-cli, auto (default: auto)')
  .option('--session-file <path>', 'Session log to follow (default: most recent)')
  .option('--since <date>', 'Only consider session logs modified on or after this date')
  .option('--until <date>', 'Only consider session logs modified on or before this date')
  .option('--project <name>', 'Project name to record (default: cwd name)')
  .option('--interval <ms>', 'Poll interval in milliseconds (default: from config)')
  .option('--no-save', 'Do not write snapshots to the session store')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { collectAction } = await import('./commands/collect');
    return collectAction(_opts, cmd);
  });
program.addCommand(collectCmd);

const processCmd = new Command('process')
  .description('Aggregate a complete session log in one pass')
  .argument('<file>', 'Session log file')
  .requiredOption('--platform <id>', 'Platform: codex-cli, gemini-cli')
  .option('--project <name>', 'Project name to record (default: cwd name)')
  .option('--no-save', 'Print the result without storing it')
  .action(async (file: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { processAction } = await import('./commands/process');
    return processAction(file, _opts, cmd);
  });
program.addCommand(processCmd);

const listCmd = new Command('list')
  .description('List stored sessions, newest first')
  .option('--platform <id>', 'Only sessions from this platform')
  .option('--limit <n>', 'Maximum number of sessions (default: 20)')
  .action(async (_opts: Record<string, unknown>, cmd: Command) => {
    const { listAction } = await import('./commands/list');
    return listAction(_opts, cmd);
  });
program.addCommand(listCmd);

const showCmd = new Command('show')
  .description('Summarize a stored session')
  .argument('<session>', 'Session id, id prefix or snapshot path')
  .action(async (session: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { showAction } = await import('./commands/show');
    return showAction(session, _opts, cmd);
  });
program.addCommand(showCmd);

const toolCmd = new Command('tool')
  .description('Per-call statistics for one MCP tool')
  .argument('<session>', 'Session id, id prefix or snapshot path')
  .argument('<server>', 'MCP server name')
  .argument('<tool>', 'Tool name')
  .action(async (session: string, server: string, tool: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { toolAction } = await import('./commands/tool');
    return toolAction(session, server, tool, _opts, cmd);
  });
program.addCommand(toolCmd);

const timelineCmd = new Command('timeline')
  .description('Token activity over time with spikes marked')
  .argument('<session>', 'Session id, id prefix or snapshot path')
  .action(async (session: string, _opts: Record<string, unknown>, cmd: Command) => {
    const { timelineAction } = await import('./commands/timeline');
    return timelineAction(session, _opts, cmd);
  });
program.addCommand(timelineCmd);

const compareCmd = new Command('compare')
  .description('Compare sessions against a baseline')
  .argument('<baseline>', 'Baseline session')
  .argument('<others...>', 'Sessions to compare')
  .action(async (baseline: string, others: string[], _opts: Record<string, unknown>, cmd: Command) => {
    const { compareAction } = await import('./commands/compare');
    return compareAction(baseline, others, _opts, cmd);
  });
program.addCommand(compareCmd);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
