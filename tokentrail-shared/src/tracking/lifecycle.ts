/**
 * Process shutdown wiring for a live tracker.
 *
 * SIGINT and SIGTERM finalize the tracker once and exit with 128 + the
 * signal number, after stdout has taken everything written before it. The tracker is passed in by reference; nothing here keeps
 * module-level state.
 *
 * @module tracking/lifecycle
 */

import { constants } from 'os';
import type { StopResult } from './SessionTracker';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

/** Anything with a one-shot, idempotent stop. */
export interface Stoppable {
  stop(): StopResult;
}

/** The slice of `process` the hooks need. */
export interface SignalTarget {
  once(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
  removeListener(event: ShutdownSignal, listener: (signal: NodeJS.Signals) => void): unknown;
}

/** The slice of a writable stream `exitAfterFlush` needs. */
export interface FlushableStream {
  write(chunk: string, callback: (err?: Error | null) => void): boolean;
}

export interface ShutdownHookOptions {
  target?: SignalTarget;
  exit?: (code: number) => void;
  onStopped?: (result: StopResult, signal: ShutdownSignal) => void;
  onError?: (err: unknown) => void;
}

export function signalExitCode(signal: ShutdownSignal): number {
  return 128 + constants.signals[signal];
}

/** Exits from the callback of an empty write, which runs once earlier writes to `stream` are flushed. */
export function exitAfterFlush(
  code: number,
  stream: FlushableStream = process.stdout,
  exit: (code: number) => void = c => process.exit(c),
): void {
  stream.write('', () => exit(code));
}

/**
 * Registers the shutdown handlers and returns a function that removes
 * them. The first signal wins; both handlers are removed before the
 * tracker is stopped.
 */
export function installShutdownHooks(owner: Stoppable, options: ShutdownHookOptions = {}): () => void {
  const target = options.target ?? process;
  const exit = options.exit ?? ((code: number) => exitAfterFlush(code));

  const listeners = new Map<ShutdownSignal, () => void>();
  const uninstall = (): void => {
    for (const [signal, listener] of listeners) target.removeListener(signal, listener);
    listeners.clear();
  };

  for (const signal of SHUTDOWN_SIGNALS) {
    const listener = (): void => {
      uninstall();
      try {
        options.onStopped?.(owner.stop(), signal);
      } catch (err) {
        if (options.onError) options.onError(err);
        else console.error(err);
      }
      exit(signalExitCode(signal));
    };
    listeners.set(signal, listener);
    target.once(signal, listener);
  }

  return uninstall;
}
