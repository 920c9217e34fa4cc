/**
 * SessionTracker: owns one tracked session from first poll to final save.
 *
 * Ties a platform adapter, the matching cursor, the aggregate and the
 * session store together. `run()` is the poll loop; `stop()` finalizes and
 * persists exactly once and is safe to call from a signal handler while the
 * loop is sleeping.
 *
 * @module tracking/SessionTracker
 */

import { SessionAggregate } from '../aggregation/SessionAggregate';
import type { PlatformAdapter } from '../providers/types';
import { createCursor } from '../tailing/factory';
import type { PollOptions, SourceCursor, TailDiagnostic } from '../tailing/types';
import type { SessionSnapshot } from '../types/session';
import type { SmellThresholds } from '../analytics/smells';
import { DEFAULT_CALL_HISTORY_CAP, DEFAULT_POLL_INTERVAL_MS } from '../config';
import { removeActiveSession, saveActiveSession, saveSession } from '../storage/sessionStore';

export interface SessionTrackerOptions {
  adapter: PlatformAdapter;
  /** Session log to follow. */
  filePath: string;
  project: string;
  sessionsDir: string;
  sessionId?: string;
  /** When false nothing is written to the store. Default true. */
  save?: boolean;
  pollIntervalMs?: number;
  callHistoryCap?: number;
  smellThresholds?: SmellThresholds;
  onDiagnostic?: (diagnostic: TailDiagnostic) => void;
  /** Called after every poll that applied at least one event. */
  onUpdate?: (snapshot: SessionSnapshot) => void;
  now?: () => Date;
  sleep?: (ms: number) => Promise<void>;
}

export type StopResult =
  | { status: 'saved'; path: string; snapshot: Readonly<SessionSnapshot> }
  | { status: 'unsaved'; snapshot: Readonly<SessionSnapshot> }
  | { status: 'empty' };

function defaultSleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export class SessionTracker {
  readonly aggregate: SessionAggregate;
  private readonly adapter: PlatformAdapter;
  private readonly cursor: SourceCursor;
  private readonly sessionsDir: string;
  private readonly save: boolean;
  private readonly pollIntervalMs: number;
  private readonly onDiagnostic: ((diagnostic: TailDiagnostic) => void) | undefined;
  private readonly onUpdate: ((snapshot: SessionSnapshot) => void) | undefined;
  private readonly sleep: (ms: number) => Promise<void>;

  private cancelled = false;
  private running = false;
  private stopResult: StopResult | null = null;
  private activePublished = false;

  constructor(options: SessionTrackerOptions) {
    this.adapter = options.adapter;
    this.cursor = createCursor(options.adapter, options.filePath);
    this.sessionsDir = options.sessionsDir;
    this.save = options.save ?? true;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.onDiagnostic = options.onDiagnostic;
    this.onUpdate = options.onUpdate;
    this.sleep = options.sleep ?? defaultSleep;
    this.aggregate = new SessionAggregate({
      platform: options.adapter.platform,
      project: options.project,
      sessionId: options.sessionId,
      callHistoryCap: options.callHistoryCap ?? DEFAULT_CALL_HISTORY_CAP,
      smellThresholds: options.smellThresholds,
      now: options.now,
    });
    this.aggregate.addSourceFile(options.filePath);
  }

  get sessionId(): string {
    return this.aggregate.id;
  }

  get isStopped(): boolean {
    return this.stopResult !== null;
  }

  /**
   * Reads whatever the cursor has that is new and applies it. Returns the
   * number of events applied. Does not touch the store.
   */
  ingest(options: PollOptions = {}): number {
    if (this.aggregate.isFinalized) return 0;
    const { records, diagnostics } = this.cursor.poll(options);

    for (const diagnostic of diagnostics) {
      this.aggregate.recordDiagnostic(diagnostic.kind);
      this.onDiagnostic?.(diagnostic);
    }

    let applied = 0;
    for (const record of records) {
      for (const event of this.adapter.parse(record)) {
        if (this.aggregate.apply(event)) applied++;
      }
    }

    if (records.length > 0) {
      const cwd = this.adapter.workingDirectory();
      if (cwd) this.aggregate.setWorkingDirectory(cwd);
      const start = this.adapter.sessionStartTime();
      if (start) this.aggregate.setStartTime(start);
      this.aggregate.setPlatformMetadata(this.adapter.platformMetadata());
    }
    return applied;
  }

  /**
   * One loop iteration: ingest, then publish the active snapshot if anything
   * changed. Nothing is published while the session has no tokens or calls.
   */
  pollOnce(options: PollOptions = {}): number {
    const applied = this.ingest(options);
    if (applied === 0) return 0;

    const snapshot = this.aggregate.toSnapshot();
    if (this.save && this.aggregate.hasData()) {
      saveActiveSession(this.sessionsDir, snapshot);
      this.activePublished = true;
    }
    this.onUpdate?.(snapshot);
    return applied;
  }

  /**
   * Polls until `stop()` or `cancel()` is called, then returns the stop
   * result. A StorageError from publishing ends the loop and rejects.
   */
  async run(): Promise<StopResult> {
    if (this.running) throw new Error(`Session ${this.sessionId} is already running`);
    this.running = true;
    try {
      while (!this.cancelled) {
        this.pollOnce();
        if (this.cancelled) break;
        await this.sleep(this.pollIntervalMs);
      }
    } finally {
      this.running = false;
    }
    return this.stop();
  }

  /** Asks the loop to exit after its current iteration. */
  cancel(): void {
    this.cancelled = true;
  }

  /**
   * Drains the source, finalizes and persists. Sessions without tokens or
   * tool calls are not saved. Later calls return the first result.
   */
  stop(endTime?: string): StopResult {
    if (this.stopResult) return this.stopResult;
    this.cancelled = true;

    this.ingest({ drain: true });
    const snapshot = this.aggregate.finalize(endTime);

    if (!this.aggregate.hasData()) {
      this.stopResult = { status: 'empty' };
    } else if (this.save) {
      this.stopResult = { status: 'saved', path: saveSession(this.sessionsDir, snapshot), snapshot };
    } else {
      this.stopResult = { status: 'unsaved', snapshot };
    }

    if (this.activePublished) removeActiveSession(this.sessionsDir, this.sessionId);
    return this.stopResult;
  }
}

/**
 * Batch mode: reads a complete session file in one pass and finalizes it
 * with the source's own last-update time, or else the last event time, as
 * its end.
 */
export function processSessionFile(options: Omit<SessionTrackerOptions, 'sleep' | 'pollIntervalMs' | 'onUpdate'>): StopResult {
  const tracker = new SessionTracker(options);
  tracker.ingest({ drain: true });
  return tracker.stop(options.adapter.sessionEndTime() ?? tracker.aggregate.lastActivityTime ?? undefined);
}
