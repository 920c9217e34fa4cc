/**
 * User configuration.
 *
 * Read from ~/.config/tokentrail/config.json (see `getConfigPath`) and
 * validated with zod. Every field is optional in the file; missing values
 * fall back to `DEFAULT_CONFIG`.
 *
 * @module config
 */

import * as fs from 'fs';
import { z } from 'zod';
import { getConfigPath, getDefaultSessionsDir } from './paths';
import { DEFAULT_SMELL_THRESHOLDS } from './analytics/smells';
import type { SmellThresholds } from './analytics/smells';
import type { PricingTable } from './analytics/cost';

export interface TokentrailConfig {
  /** Sleep between polls of the live session file. */
  pollIntervalMs: number;
  /** Per-tool bound on retained call records. */
  callHistoryCap: number;
  /** Root directory for persisted snapshots. */
  sessionsDir: string;
  smellThresholds: SmellThresholds;
  /** Optional per-model rates in USD per million tokens. */
  pricing: PricingTable;
}

export const DEFAULT_POLL_INTERVAL_MS = 500;
export const DEFAULT_CALL_HISTORY_CAP = 500;

export function defaultConfig(): TokentrailConfig {
  return {
    pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
    callHistoryCap: DEFAULT_CALL_HISTORY_CAP,
    sessionsDir: getDefaultSessionsDir(),
    smellThresholds: { ...DEFAULT_SMELL_THRESHOLDS },
    pricing: {},
  };
}

const modelPricingSchema = z.object({
  input: z.number().nonnegative(),
  output: z.number().nonnegative(),
  cacheRead: z.number().nonnegative().optional(),
  cacheWrite: z.number().nonnegative().optional(),
});

export const configFileSchema = z.object({
  pollIntervalMs: z.number().int().min(50).optional(),
  callHistoryCap: z.number().int().positive().optional(),
  sessionsDir: z.string().min(1).optional(),
  smellThresholds: z.object({
    highVarianceMinCalls: z.number().int().positive(),
    highVarianceCv: z.number().positive(),
    chattyCalls: z.number().int().positive(),
    duplicateCalls: z.number().int().min(2),
    lowCacheHitRatio: z.number().min(0).max(1),
    lowCacheHitMinTokens: z.number().nonnegative(),
  }).partial().optional(),
  pricing: z.record(modelPricingSchema).optional(),
}).strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

/** Formats zod issues as `  - path: message` lines. */
export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map(err => `  - ${err.path.join('.') || 'root'}: ${err.message}`)
    .join('\n');
}

/** Merges a validated config file over the defaults. */
export function resolveConfig(file: ConfigFile): TokentrailConfig {
  const base = defaultConfig();
  return {
    pollIntervalMs: file.pollIntervalMs ?? base.pollIntervalMs,
    callHistoryCap: file.callHistoryCap ?? base.callHistoryCap,
    sessionsDir: file.sessionsDir ?? base.sessionsDir,
    smellThresholds: { ...base.smellThresholds, ...file.smellThresholds },
    pricing: file.pricing ?? base.pricing,
  };
}

/**
 * Loads the config file. A missing file yields the defaults; an unreadable
 * or invalid one throws with every validation issue listed.
 */
export function loadConfig(filePath: string = getConfigPath()): TokentrailConfig {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return defaultConfig();
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new Error(`Invalid JSON in ${filePath}`, { cause: err });
  }

  const result = configFileSchema.safeParse(parsed);
  if (!result.success) {
    throw new Error(`Invalid config ${filePath}:\n${formatIssues(result.error)}`);
  }
  return resolveConfig(result.data);
}
