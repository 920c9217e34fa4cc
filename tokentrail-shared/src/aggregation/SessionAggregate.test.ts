import { describe, it, expect } from 'vitest';
import { SessionAggregate, computeCacheEfficiency } from './SessionAggregate';
import type { SessionAggregateOptions } from './SessionAggregate';
import { SESSION_SENTINEL } from '../types/events';
import type { SessionTokenDelta, ToolCallEvent } from '../types/events';
import { SessionFinalizedError } from '../errors';

// ── Helpers ──

function makeAggregate(overrides: Partial<SessionAggregateOptions> = {}): SessionAggregate {
  return new SessionAggregate({ platform: 'codex-cli', project: 'demo', sessionId: 'sess-1', ...overrides });
}

function makeDelta(overrides: Partial<SessionTokenDelta> = {}): SessionTokenDelta {
  return {
    kind: 'session',
    toolName: SESSION_SENTINEL,
    timestamp: '2025-11-30T10:00:00.000Z',
    input: 0,
    output: 0,
    cacheCreated: 0,
    cacheRead: 0,
    messages: 0,
    ...overrides,
  };
}

function makeToolCall(overrides: Partial<ToolCallEvent> = {}): ToolCallEvent {
  return {
    kind: 'tool',
    toolName: 'mcp__zen__chat',
    server: 'zen',
    tool: 'chat',
    timestamp: '2025-11-30T10:00:05.000Z',
    tokens: { input: 0, output: 0, cacheCreated: 0, cacheRead: 0 },
    parameters: {},
    ...overrides,
  };
}

// ── Tests ──

describe('SessionAggregate token totals', () => {
  it('keeps total equal to the sum of the four fields after every apply', () => {
    const agg = makeAggregate();
    const deltas = [
      makeDelta({ input: 100, output: 20 }),
      makeDelta({ cacheRead: 500 }),
      makeDelta({ cacheCreated: 30, output: 5 }),
    ];
    for (const d of deltas) {
      agg.apply(d);
      const t = agg.tokenTotals;
      expect(t.total).toBe(t.input + t.output + t.cacheCreated + t.cacheRead);
    }
    expect(agg.tokenTotals).toMatchObject({ input: 100, output: 25, cacheCreated: 30, cacheRead: 500, total: 655 });
  });

  it('computes cache efficiency over input-side tokens', () => {
    const agg = makeAggregate();
    agg.apply(makeDelta({ input: 300, cacheRead: 1500, output: 200 }));
    expect(agg.tokenTotals.cacheEfficiency).toBeCloseTo(1500 / 1800, 10);
  });

  it('reports zero efficiency when nothing was read', () => {
    expect(computeCacheEfficiency({ input: 0, output: 50, cacheCreated: 0, cacheRead: 0 })).toBe(0);
  });

  it('counts assistant messages', () => {
    const agg = makeAggregate();
    agg.apply(makeDelta({ messages: 1, output: 1 }));
    agg.apply(makeDelta({ messages: 1 }));
    expect(agg.toSnapshot().session.message_count).toBe(2);
  });
});

describe('SessionAggregate tool calls', () => {
  it('rolls tool tokens into server and tool stats but not session totals', () => {
    const agg = makeAggregate();
    agg.apply(makeToolCall({ tokens: { input: 0, output: 120, cacheCreated: 0, cacheRead: 0 } }));
    agg.apply(makeToolCall({ tokens: { input: 0, output: 80, cacheCreated: 0, cacheRead: 0 } }));
    agg.apply(makeToolCall({ toolName: 'mcp__zen__think', tool: 'think' }));
    agg.apply(makeToolCall({ toolName: 'mcp__git__diff', server: 'git', tool: 'diff' }));

    expect(agg.tokenTotals.total).toBe(0);
    const snap = agg.toSnapshot();
    expect(snap.mcp_summary).toEqual({ total_calls: 4, unique_tools: 3, total_tokens: 200 });
    expect(snap.server_sessions.zen.total_calls).toBe(3);
    expect(snap.server_sessions.zen.total_tokens).toBe(200);
    expect(snap.server_sessions.zen.tools.chat).toMatchObject({ calls: 2, total_tokens: 200, avg_tokens: 100 });
    expect(snap.server_sessions.git.tools.diff.calls).toBe(1);
  });

  it('derives server and tool from the name', () => {
    const agg = makeAggregate();
    agg.apply(makeToolCall({ toolName: 'mcp__github__list__issues', server: 'ignored', tool: 'ignored' }));
    expect(Object.keys(agg.toSnapshot().server_sessions.github.tools)).toEqual(['list__issues']);
  });

  it('records call details in history', () => {
    const agg = makeAggregate();
    agg.apply(makeToolCall({ callId: 'call_1', success: true, durationMs: 40, contentSignature: 'abcd' }));
    expect(agg.toSnapshot().server_sessions.zen.tools.chat.call_history).toEqual([
      {
        timestamp: '2025-11-30T10:00:05.000Z',
        total_tokens: 0,
        input_tokens: 0,
        output_tokens: 0,
        cache_created_tokens: 0,
        cache_read_tokens: 0,
        duration_ms: 40,
        success: true,
        content_signature: 'abcd',
        call_id: 'call_1',
      },
    ]);
  });

  it('bounds call history but keeps counting calls', () => {
    const agg = makeAggregate({ callHistoryCap: 3 });
    for (let i = 0; i < 5; i++) {
      agg.apply(makeToolCall({ callId: `c${i}`, tokens: { input: 0, output: 10, cacheCreated: 0, cacheRead: 0 } }));
    }
    const chat = agg.toSnapshot().server_sessions.zen.tools.chat;
    expect(chat.calls).toBe(5);
    expect(chat.total_tokens).toBe(50);
    expect(chat.call_history.map(c => c.call_id)).toEqual(['c2', 'c3', 'c4']);
  });
});

describe('SessionAggregate validation', () => {
  it('rejects non-MCP tool names without any change', () => {
    const agg = makeAggregate();
    agg.apply(makeDelta({ input: 10 }));
    const before = agg.toSnapshot();

    expect(agg.apply(makeToolCall({ toolName: 'shell' }))).toBe(false);
    expect(agg.apply(makeToolCall({ toolName: 'mcp__zen' }))).toBe(false);
    expect(agg.toSnapshot()).toEqual(before);
  });

  it('rejects invalid token counts atomically', () => {
    const agg = makeAggregate();
    const before = agg.toSnapshot();

    expect(agg.apply(makeDelta({ input: 100, output: -1 }))).toBe(false);
    expect(agg.apply(makeDelta({ input: Number.NaN }))).toBe(false);
    expect(agg.apply(makeToolCall({ tokens: { input: 1, output: Infinity, cacheCreated: 0, cacheRead: 0 } }))).toBe(false);
    expect(agg.apply(makeToolCall({ durationMs: -5 }))).toBe(false);
    expect(agg.toSnapshot()).toEqual(before);
    expect(agg.hasData()).toBe(false);
  });
});

describe('SessionAggregate session fields', () => {
  it('latches the first model it sees', () => {
    const agg = makeAggregate();
    agg.apply(makeDelta({ input: 1 }));
    agg.apply(makeDelta({ input: 1, model: 'gpt-5.1' }));
    agg.apply(makeDelta({ input: 1, model: 'gpt-4o' }));
    const snap = agg.toSnapshot();
    expect(snap.session.model).toBe('gpt-5.1');
    expect(snap.session.model_name).toBe('GPT-5.1');
  });

  it('takes the start time from the first timestamped event', () => {
    const agg = makeAggregate();
    agg.apply(makeDelta({ input: 1, timestamp: '2025-11-30T10:00:00.000Z' }));
    agg.apply(makeDelta({ input: 1, timestamp: '2025-11-30T10:02:30.000Z' }));
    const snap = agg.toSnapshot();
    expect(snap.session.start_time).toBe('2025-11-30T10:00:00.000Z');
    expect(snap.session.duration_seconds).toBe(150);
    expect(snap.session.status).toBe('active');
    expect(snap.session.end_time).toBeNull();
  });

  it('prefers an explicit start time', () => {
    const agg = makeAggregate({ startTime: '2025-11-30T09:59:00.000Z' });
    agg.apply(makeDelta({ input: 1, timestamp: '2025-11-30T10:00:00.000Z' }));
    expect(agg.toSnapshot().session.duration_seconds).toBe(60);
  });

  it('moves the start back to a recorded session start without counting it as data', () => {
    const agg = makeAggregate();
    agg.setStartTime('2025-11-30T10:00:00.000Z');
    expect(agg.hasData()).toBe(false);

    agg.apply(makeDelta({ input: 1, timestamp: '2025-11-30T10:19:00.000Z' }));
    agg.setStartTime('2025-11-30T10:05:00.000Z');
    agg.setStartTime('not-a-time');
    const snap = agg.toSnapshot();
    expect(snap.session.start_time).toBe('2025-11-30T10:00:00.000Z');
    expect(snap.session.duration_seconds).toBe(1140);
  });

  it('records source files once and diagnostics counts', () => {
    const agg = makeAggregate();
    agg.addSourceFile('/tmp/a.jsonl');
    agg.addSourceFile('/tmp/a.jsonl');
    agg.recordDiagnostic('parse');
    agg.recordDiagnostic('io');
    agg.recordDiagnostic('parse');
    const snap = agg.toSnapshot();
    expect(snap.session.source_files).toEqual(['/tmp/a.jsonl']);
    expect(snap.data_quality).toEqual({ parse_errors: 2, io_errors: 1 });
  });
});

describe('SessionAggregate finalize', () => {
  it('freezes the snapshot and rejects further events', () => {
    const agg = makeAggregate();
    agg.apply(makeDelta({ input: 10, timestamp: '2025-11-30T10:00:00.000Z' }));

    const final = agg.finalize('2025-11-30T10:05:00.000Z');
    expect(final.session.status).toBe('complete');
    expect(final.session.end_time).toBe('2025-11-30T10:05:00.000Z');
    expect(final.session.duration_seconds).toBe(300);
    expect(Object.isFrozen(final)).toBe(true);
    expect(Object.isFrozen(final.token_usage)).toBe(true);

    expect(() => agg.apply(makeDelta({ input: 1 }))).toThrow(SessionFinalizedError);
    expect(agg.finalize()).toBe(final);
    expect(agg.isFinalized).toBe(true);
  });

  it('uses the injected clock when no end time is given', () => {
    const agg = makeAggregate({ now: () => new Date('2025-11-30T11:00:00.000Z') });
    agg.apply(makeDelta({ input: 10, timestamp: '2025-11-30T10:00:00.000Z' }));
    expect(agg.finalize().session.duration_seconds).toBe(3600);
  });

  it('returns mutable copies of the final snapshot', () => {
    const agg = makeAggregate();
    agg.finalize('2025-11-30T10:05:00.000Z');
    const copy = agg.toSnapshot();
    copy.smells.push({ pattern: 'X', severity: 'info', description: 'x' });
    expect(agg.toSnapshot().smells).toEqual([]);
  });
});
