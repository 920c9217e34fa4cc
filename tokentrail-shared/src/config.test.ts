import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { DEFAULT_CALL_HISTORY_CAP, DEFAULT_POLL_INTERVAL_MS, loadConfig } from './config';
import { DEFAULT_SMELL_THRESHOLDS } from './analytics/smells';

describe('loadConfig', () => {
  let dir: string;
  let configPath: string;
  const originalHome = process.env.TOKENTRAIL_HOME;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'tt-config-'));
    configPath = path.join(dir, 'config.json');
    process.env.TOKENTRAIL_HOME = dir;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    if (originalHome === undefined) delete process.env.TOKENTRAIL_HOME;
    else process.env.TOKENTRAIL_HOME = originalHome;
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadConfig(configPath)).toEqual({
      pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
      callHistoryCap: DEFAULT_CALL_HISTORY_CAP,
      sessionsDir: path.join(dir, 'sessions'),
      smellThresholds: DEFAULT_SMELL_THRESHOLDS,
      pricing: {},
    });
  });

  it('merges file values over the defaults', () => {
    fs.writeFileSync(configPath, JSON.stringify({
      pollIntervalMs: 1000,
      smellThresholds: { chattyCalls: 50 },
      pricing: { 'gpt-5.1': { input: 1.25, output: 10 } },
    }));
    const config = loadConfig(configPath);
    expect(config.pollIntervalMs).toBe(1000);
    expect(config.callHistoryCap).toBe(DEFAULT_CALL_HISTORY_CAP);
    expect(config.smellThresholds).toEqual({ ...DEFAULT_SMELL_THRESHOLDS, chattyCalls: 50 });
    expect(config.pricing).toEqual({ 'gpt-5.1': { input: 1.25, output: 10 } });
  });

  it('rejects invalid JSON', () => {
    fs.writeFileSync(configPath, '{oops');
    expect(() => loadConfig(configPath)).toThrow(`Invalid JSON in ${configPath}`);
  });

  it('lists every validation issue', () => {
    fs.writeFileSync(configPath, JSON.stringify({ pollIntervalMs: 10, callHistoryCap: 0 }));
    expect(() => loadConfig(configPath)).toThrow(
      `Invalid config ${configPath}:\n  - pollIntervalMs: Number must be greater than or equal to 50\n  - callHistoryCap: Number must be greater than 0`,
    );
  });

  it('rejects unknown keys', () => {
    fs.writeFileSync(configPath, JSON.stringify({ pollInterval: 100 }));
    expect(() => loadConfig(configPath)).toThrow(/Unrecognized key/);
  });
});
