import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Command } from 'commander';
import { saveSession, SNAPSHOT_SCHEMA_VERSION } from 'tokentrail-shared';
import type { SessionSnapshot } from 'tokentrail-shared';
import { loadSessionRef, parseDateOption, parsePositiveInt, readGlobalOptions, resolvePlatform } from './context';
import type { GlobalOptions } from './context';

function makeSnapshot(id: string): SessionSnapshot {
  return {
    schema_version: SNAPSHOT_SCHEMA_VERSION,
    session: {
      id,
      platform: 'gemini-cli',
      project: 'demo',
      model: '',
      model_name: '',
      working_directory: '',
      start_time: '2025-11-30T10:00:00.000Z',
      end_time: '2025-11-30T10:01:00.000Z',
      duration_seconds: 60,
      message_count: 1,
      source_files: [],
      status: 'complete',
    },
    token_usage: {
      input_tokens: 100,
      output_tokens: 50,
      cache_created_tokens: 0,
      cache_read_tokens: 0,
      total_tokens: 150,
      cache_efficiency: 0,
    },
    mcp_summary: { total_calls: 0, unique_tools: 0, total_tokens: 0 },
    server_sessions: {},
    smells: [],
    platform_metadata: {},
    data_quality: { parse_errors: 0, io_errors: 0 },
  };
}

describe('readGlobalOptions', () => {
  it('reads flags from the parent command', () => {
    let captured: GlobalOptions | undefined;
    const program = new Command()
      .option('--json')
      .option('--sessions-dir <dir>')
      .option('--verbose');
    program.command('sub').action((_opts: Record<string, unknown>, cmd: Command) => {
      captured = readGlobalOptions(cmd);
    });

    program.parse(['--json', '--sessions-dir', '/data/sessions', 'sub'], { from: 'user' });
    expect(captured).toEqual({ json: true, verbose: false, sessionsDir: '/data/sessions' });
  });
});

describe('resolvePlatform', () => {
  it('accepts explicit platform ids', () => {
    expect(resolvePlatform('codex-cli')).toBe('codex-cli');
    expect(resolvePlatform('gemini-cli')).toBe('gemini-cli');
  });

  it('rejects unknown ids', () => {
    expect(() => resolvePlatform('claude')).toThrow('Unknown platform "claude" (expected codex-cli, gemini-cli or auto)');
  });
});

describe('parsePositiveInt', () => {
  it('parses positive integers only', () => {
    expect(parsePositiveInt('250', '--interval')).toBe(250);
    expect(() => parsePositiveInt('0', '--limit')).toThrow('--limit must be a positive integer, got "0"');
    expect(() => parsePositiveInt('1.5', '--limit')).toThrow('--limit must be a positive integer');
  });
});

describe('parseDateOption', () => {
  it('reads bare dates as UTC midnight', () => {
    expect(parseDateOption('2025-11-30', '--since').toISOString()).toBe('2025-11-30T00:00:00.000Z');
  });

  it('extends a bare end date to the end of that day', () => {
    expect(parseDateOption('2025-11-30', '--until', true).toISOString()).toBe('2025-11-30T23:59:59.999Z');
    expect(parseDateOption('2025-11-30T08:00:00Z', '--until', true).toISOString()).toBe('2025-11-30T08:00:00.000Z');
  });

  it('rejects values that are not dates', () => {
    expect(() => parseDateOption('yesterday', '--since')).toThrow('--since must be a date (YYYY-MM-DD or ISO 8601), got "yesterday"');
  });
});

describe('loadSessionRef', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tt-cli-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads by id prefix', () => {
    saveSession(dir, makeSnapshot('gemini-abc'));
    expect(loadSessionRef(dir, 'gemini-a').session.id).toBe('gemini-abc');
  });

  it('reports unknown sessions', () => {
    expect(() => loadSessionRef(dir, 'nope')).toThrow(`Session nope not found in ${dir}`);
  });

  it('reports unreadable files', () => {
    const bad = path.join(dir, 'broken.json');
    fs.writeFileSync(bad, '{');
    expect(() => loadSessionRef(dir, bad)).toThrow(`Cannot read session file ${bad}`);
  });
});
