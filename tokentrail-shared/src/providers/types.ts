/**
 * Platform adapter contract.
 *
 * One adapter instance serves one tracked session. It is chosen once from
 * the platform id (see `createPlatform`) and then fed raw records by the
 * cursor matching its `sourceKind`.
 */

import type { CanonicalEvent, PlatformId } from '../types/events';
import type { DocumentLayout } from '../tailing/types';

export interface SessionFileInfo {
  path: string;
  sessionId: string;
  mtime: Date;
  size: number;
  /** Project hash (message-based platform) or recorded cwd, when known. */
  project?: string;
}

export interface DiscoveryOptions {
  /** Only files modified at or after this time. */
  since?: Date;
  /** Only files modified at or before this time. */
  until?: Date;
}

interface AdapterBase {
  readonly platform: PlatformId;
  /** Translates one raw record; returns 0, 1 or 2 events in emission order. */
  parse(record: unknown): CanonicalEvent[];
  /** Vendor-specific context collected so far (model, cli version, ...). */
  platformMetadata(): Record<string, unknown>;
  /** Working directory reported by the log, when the format records one. */
  workingDirectory(): string | undefined;
  /** Session start recorded by the source itself (a document header), if any. */
  sessionStartTime(): string | undefined;
  /** Last update recorded by the source itself, if any. */
  sessionEndTime(): string | undefined;
}

/** Append-only JSONL platform; raw records are decoded lines. */
export interface JsonlPlatformAdapter extends AdapterBase {
  readonly sourceKind: 'jsonl';
}

/** Whole-document platform; raw records are messages. */
export interface DocumentPlatformAdapter extends AdapterBase, DocumentLayout {
  readonly sourceKind: 'document';
}

export type PlatformAdapter = JsonlPlatformAdapter | DocumentPlatformAdapter;

/** Finds session files for one platform on disk. */
export interface SessionLocator {
  readonly platform: PlatformId;
  /** Newest first. */
  listSessions(options?: DiscoveryOptions): SessionFileInfo[];
  findLatest(options?: DiscoveryOptions): SessionFileInfo | null;
}
