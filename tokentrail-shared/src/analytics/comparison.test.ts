import { describe, it, expect } from 'vitest';
import { compareSessions, mcpSharePct } from './comparison';
import { makeCall, makeSnapshot, makeToolStats } from '../testing/snapshots';

function tools(spec: Record<string, number>) {
  const out: Record<string, Record<string, ReturnType<typeof makeToolStats>>> = {};
  for (const [key, tokens] of Object.entries(spec)) {
    const [server, tool] = key.split('.');
    out[server] = { ...out[server], [tool]: makeToolStats([makeCall({ total_tokens: tokens })]) };
  }
  return out;
}

describe('compareSessions', () => {
  it('needs at least two sessions', () => {
    expect(compareSessions([])).toBeNull();
    expect(compareSessions([makeSnapshot()])).toBeNull();
  });

  it('computes token and MCP share deltas against the first session', () => {
    const baseline = makeSnapshot({ id: 'base', totalTokens: 1000, tools: tools({ 'zen.chat': 400 }) });
    const comp = makeSnapshot({ id: 'comp', totalTokens: 1500, tools: tools({ 'zen.chat': 900 }) });

    const result = compareSessions([baseline, comp]);
    expect(result?.baseline.session.id).toBe('base');
    expect(result?.tokenDeltas).toEqual([500]);
    expect(result?.mcpShareDeltas).toHaveLength(1);
    expect(result?.mcpShareDeltas[0]).toBeCloseTo(20.0, 10);
  });

  it('sums per-tool deltas over comparisons, counting absent tools as zero', () => {
    const baseline = makeSnapshot({ totalTokens: 1000, tools: tools({ 'zen.chat': 400, 'zen.old': 50 }) });
    const comp1 = makeSnapshot({ totalTokens: 1000, tools: tools({ 'zen.chat': 900, 'git.diff': 30 }) });
    const comp2 = makeSnapshot({ totalTokens: 1000, tools: tools({ 'zen.chat': 100 }) });

    const result = compareSessions([baseline, comp1, comp2]);
    expect(result?.toolChanges).toEqual([
      { key: 'zen.chat', deltaTokens: 200 },
      { key: 'zen.old', deltaTokens: -100 },
      { key: 'git.diff', deltaTokens: 30 },
    ]);
  });

  it('keeps the five largest changes and skips builtin tools', () => {
    const baseline = makeSnapshot({ totalTokens: 10 });
    const comp = makeSnapshot({
      totalTokens: 10,
      tools: tools({ 'a.t': 1, 'b.t': 2, 'c.t': 3, 'd.t': 4, 'e.t': 5, 'f.t': 6, 'builtin.shell': 1000 }),
    });

    const result = compareSessions([baseline, comp]);
    expect(result?.toolChanges.map(c => c.key)).toEqual(['f.t', 'e.t', 'd.t', 'c.t', 'b.t']);
  });

  it('builds a sorted smell presence matrix', () => {
    const result = compareSessions([
      makeSnapshot({ smells: ['CHATTY'] }),
      makeSnapshot({ smells: ['HIGH_VARIANCE', 'CHATTY'] }),
      makeSnapshot(),
    ]);
    expect(result?.smellMatrix).toEqual({
      CHATTY: [true, true, false],
      HIGH_VARIANCE: [false, true, false],
    });
    expect(Object.keys(result?.smellMatrix ?? {})).toEqual(['CHATTY', 'HIGH_VARIANCE']);
  });
});

describe('mcpSharePct', () => {
  it('is zero for an empty session', () => {
    expect(mcpSharePct(makeSnapshot({ totalTokens: 0 }))).toBe(0);
  });

  it('exceeds 100 when tool tokens are reported outside the session total', () => {
    const snapshot = makeSnapshot({
      totalTokens: 150,
      tools: { zen: { chat: makeToolStats([makeCall({ total_tokens: 500, output_tokens: 500 })]) } },
    });
    expect(mcpSharePct(snapshot)).toBeCloseTo(333.33, 2);
  });
});
