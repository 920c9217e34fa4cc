/**
 * File stat and read helpers shared by the cursors. Failures come back as
 * `io` diagnostics.
 */

import * as fs from 'fs';
import { TransientIOError, errorMessage } from '../errors';
import type { TailDiagnostic } from './types';

export interface FileVersion {
  mtimeMs: number;
  size: number;
}

export function sameVersion(a: FileVersion | null, b: FileVersion): boolean {
  return a !== null && a.mtimeMs === b.mtimeMs && a.size === b.size;
}

function ioDiagnostic(filePath: string, err: unknown): TailDiagnostic {
  const message = `Cannot read ${filePath}: ${errorMessage(err)}`;
  return { kind: 'io', source: filePath, message, error: new TransientIOError(filePath, message, { cause: err }) };
}

export type StatOutcome =
  | { ok: true; version: FileVersion }
  | { ok: false; diagnostic: TailDiagnostic };

export type ReadOutcome =
  | { ok: true; content: string }
  | { ok: false; diagnostic: TailDiagnostic };

export function statVersion(filePath: string): StatOutcome {
  try {
    const stats = fs.statSync(filePath);
    return { ok: true, version: { mtimeMs: stats.mtimeMs, size: stats.size } };
  } catch (err) {
    return { ok: false, diagnostic: ioDiagnostic(filePath, err) };
  }
}

export function readContent(filePath: string): ReadOutcome {
  try {
    return { ok: true, content: fs.readFileSync(filePath, 'utf-8') };
  } catch (err) {
    return { ok: false, diagnostic: ioDiagnostic(filePath, err) };
  }
}
