/**
 * Platform selection. Every session picks its adapter and locator once,
 * from the platform id, before any record is read.
 */

import type { PlatformId } from '../types/events';
import type { DiscoveryOptions, PlatformAdapter, SessionFileInfo, SessionLocator } from './types';
import { CodexAdapter, CodexSessionLocator } from './codex';
import { GeminiAdapter, GeminiSessionLocator } from './gemini';

export interface LocatorOptions {
  /** Project root used to pick the Gemini project hash. */
  projectRoot?: string;
  /** Explicit Gemini project hash. */
  projectHash?: string;
}

export interface Platform {
  id: PlatformId;
  adapter: PlatformAdapter;
  locator: SessionLocator;
}

export function createAdapter(id: PlatformId): PlatformAdapter {
  switch (id) {
    case 'codex-cli': return new CodexAdapter();
    case 'gemini-cli': return new GeminiAdapter();
  }
}

export function createLocator(id: PlatformId, options: LocatorOptions = {}): SessionLocator {
  switch (id) {
    case 'codex-cli': return new CodexSessionLocator();
    case 'gemini-cli': return new GeminiSessionLocator({ projectRoot: options.projectRoot, projectHash: options.projectHash });
  }
}

export function createPlatform(id: PlatformId, options: LocatorOptions = {}): Platform {
  return { id, adapter: createAdapter(id), locator: createLocator(id, options) };
}

export interface ResolveSessionOptions extends DiscoveryOptions {
  /** Session id, id fragment or path; the newest session when absent. */
  sessionId?: string;
}

/**
 * Resolves a session file by id fragment or path, defaulting to the newest
 * one inside the optional modification window. Throws when nothing matches.
 */
export function resolveSessionFile(locator: SessionLocator, options: ResolveSessionOptions = {}): SessionFileInfo {
  const { sessionId, since, until } = options;
  const sessions = locator.listSessions({ since, until });
  if (sessions.length === 0) {
    const window = since || until ? ' in the requested time range' : '';
    throw new Error(`No ${locator.platform} sessions found${window}`);
  }
  if (!sessionId) return sessions[0];

  const match = sessions.find(s => s.sessionId === sessionId || s.path === sessionId || s.path.includes(sessionId));
  if (!match) {
    const available = sessions.slice(0, 5).map(s => s.sessionId).join(', ');
    throw new Error(`Session ${sessionId} not found. Available: ${available}`);
  }
  return match;
}
