/**
 * Public API for tokentrail-shared.
 */

// Canonical events
export type {
  PlatformId,
  TokenCounts,
  SessionTokenDelta,
  ToolCallEvent,
  CanonicalEvent,
} from './types/events';
export {
  SESSION_SENTINEL,
  MCP_PREFIX,
  BUILTIN_SERVER,
  PLATFORM_IDS,
  emptyTokenCounts,
  sumTokenCounts,
  isPlatformId,
} from './types/events';

// Snapshot read-model
export type {
  CallRecord,
  ToolStatsSnapshot,
  ServerSessionSnapshot,
  TokenUsageSnapshot,
  McpSummary,
  Smell,
  SmellSeverity,
  SessionInfo,
  SessionStatus,
  DataQuality,
  SessionSnapshot,
} from './types/session';
export { SNAPSHOT_SCHEMA_VERSION } from './types/session';

// Vendor formats
export type { CodexRolloutLine, CodexSessionMeta, CodexTokenUsage } from './types/codex';
export type { GeminiMessage, GeminiSession, GeminiSessionHeader, GeminiTokens, GeminiToolCall } from './types/gemini';

// Errors
export type { ErrorCode } from './errors';
export {
  TokentrailError,
  ParseError,
  TransientIOError,
  StorageError,
  SessionFinalizedError,
  errorMessage,
} from './errors';

// Paths & config
export {
  getConfigDir,
  getConfigPath,
  getDefaultSessionsDir,
  getCodexHome,
  getGeminiHome,
  getGeminiProjectHash,
  getProjectName,
  sanitizeFileName,
} from './paths';
export type { TokentrailConfig, ConfigFile } from './config';
export {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_CALL_HISTORY_CAP,
  defaultConfig,
  configFileSchema,
  resolveConfig,
  loadConfig,
} from './config';

// Platforms
export type {
  SessionFileInfo,
  DiscoveryOptions,
  JsonlPlatformAdapter,
  DocumentPlatformAdapter,
  PlatformAdapter,
  SessionLocator,
} from './providers/types';
export { CodexAdapter, CodexSessionLocator, getCodexSessionsDir, extractCodexSessionId, readCodexSessionMeta } from './providers/codex';
export type { ProjectHashInfo, GeminiLocatorOptions } from './providers/gemini';
export { GeminiAdapter, GeminiSessionLocator, extractGeminiSessionId } from './providers/gemini';
export type { LocatorOptions, Platform, ResolveSessionOptions } from './providers/registry';
export { createAdapter, createLocator, createPlatform, resolveSessionFile } from './providers/registry';
export { detectPlatform, getAllDetectedPlatforms } from './providers/detect';
export type { ParsedToolName } from './providers/toolNames';
export { parseMcpToolName, isMcpToolName, toolKey } from './providers/toolNames';
export { modelDisplayName } from './providers/models';
export { canonicalJson, contentSignature } from './signature';

// Tailing
export type {
  DiagnosticKind,
  TailDiagnostic,
  PollResult,
  PollOptions,
  SourceCursor,
  DocumentLayout,
} from './tailing/types';
export { JsonlTailCursor } from './tailing/JsonlTailCursor';
export { DocumentCursor } from './tailing/DocumentCursor';
export { createCursor } from './tailing/factory';

// Aggregation
export type { TokenTotals, SessionAggregateOptions } from './aggregation/SessionAggregate';
export { SessionAggregate, computeCacheEfficiency } from './aggregation/SessionAggregate';

// Analytics
export type { SmellThresholds } from './analytics/smells';
export { DEFAULT_SMELL_THRESHOLDS, detectSmells } from './analytics/smells';
export type { ModelPricing, PricingTable, PricingLookup } from './analytics/cost';
export { pricingFromTable, estimateCost } from './analytics/cost';
export type { ToolDetail } from './analytics/percentiles';
export { HISTOGRAM_BINS, computePercentile, histogramBins, generateHistogram, toolDetail } from './analytics/percentiles';
export type { TimelineBucket, Timeline } from './analytics/timeline';
export { SPIKE_Z_THRESHOLD, computeTimeline, detectSpikes } from './analytics/timeline';
export type { ToolChange, Comparison } from './analytics/comparison';
export { TOP_TOOL_CHANGES, compareSessions, mcpSharePct } from './analytics/comparison';

// Storage
export type { StoredSessionInfo, ListSessionsOptions } from './storage/sessionStore';
export {
  sessionFilePath,
  activeFilePath,
  saveSession,
  saveActiveSession,
  removeActiveSession,
  loadSession,
  listStoredSessions,
  resolveSessionRef,
} from './storage/sessionStore';
export { sessionSnapshotSchema } from './storage/schema';

// Tracking
export type { SessionTrackerOptions, StopResult } from './tracking/SessionTracker';
export { SessionTracker, processSessionFile } from './tracking/SessionTracker';
export type { FlushableStream, ShutdownSignal, ShutdownHookOptions, SignalTarget, Stoppable } from './tracking/lifecycle';
export { exitAfterFlush, installShutdownHooks, signalExitCode } from './tracking/lifecycle';
