import { describe, it, expect } from 'vitest';
import { computePercentile, histogramBins, generateHistogram, toolDetail } from './percentiles';
import { makeCall, makeSnapshot, makeToolStats } from '../testing/snapshots';

describe('computePercentile', () => {
  const tens = [10, 20, 30, 40, 50, 60, 70, 80, 90, 100];

  it('returns 0 for empty input', () => {
    expect(computePercentile([], 50)).toBe(0);
  });

  it('uses nearest rank', () => {
    expect(computePercentile(tens, 50)).toBe(50);
    expect(computePercentile(tens, 95)).toBe(100);
    expect(computePercentile(tens, 0)).toBe(10);
    expect(computePercentile(tens, 100)).toBe(100);
  });

  it('sorts a copy of unsorted input', () => {
    const values = [30, 10, 20];
    expect(computePercentile(values, 50)).toBe(20);
    expect(values).toEqual([30, 10, 20]);
  });

  it('handles a single value', () => {
    expect(computePercentile([7], 95)).toBe(7);
  });
});

describe('histogram', () => {
  it('spreads evenly spaced values one per bin', () => {
    expect(histogramBins([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toEqual([1, 1, 1, 1, 1, 1, 1, 1, 1, 1]);
    expect(generateHistogram([1, 2, 3, 4, 5, 6, 7, 8, 9, 10])).toBe('██████████');
  });

  it('puts every value in the first bin when the range is zero', () => {
    expect(histogramBins([5, 5, 5])).toEqual([3, 0, 0, 0, 0, 0, 0, 0, 0, 0]);
    expect(generateHistogram([5, 5, 5])).toBe('█' + ' '.repeat(9));
  });

  it('scales bars to the tallest bin', () => {
    expect(generateHistogram([0, 0, 0, 100])).toBe('█' + ' '.repeat(8) + '▃');
  });

  it('renders nothing for no values', () => {
    expect(generateHistogram([])).toBe('');
  });
});

describe('toolDetail', () => {
  const snapshot = makeSnapshot({
    tools: {
      zen: {
        chat: makeToolStats([
          makeCall({ total_tokens: 100 }),
          makeCall({ total_tokens: 300 }),
          makeCall({ total_tokens: 200 }),
        ]),
      },
    },
  });
  snapshot.smells = [
    { pattern: 'CHATTY', severity: 'info', tool: 'zen.chat', description: 'x' },
    { pattern: 'CHATTY', severity: 'info', tool: 'zen.other', description: 'y' },
  ];

  it('computes stats from call history', () => {
    const detail = toolDetail(snapshot, 'zen', 'chat');
    expect(detail).not.toBeNull();
    expect(detail?.calls).toBe(3);
    expect(detail?.totalTokens).toBe(600);
    expect(detail?.avgTokens).toBe(200);
    expect(detail?.minTokens).toBe(100);
    expect(detail?.maxTokens).toBe(300);
    expect(detail?.p50Tokens).toBe(200);
    expect(detail?.p95Tokens).toBe(300);
    expect(detail?.smells.map(s => s.tool)).toEqual(['zen.chat']);
  });

  it('returns null for unknown tools', () => {
    expect(toolDetail(snapshot, 'zen', 'missing')).toBeNull();
    expect(toolDetail(snapshot, 'nope', 'chat')).toBeNull();
    expect(toolDetail(snapshot, 'zen', 'constructor')).toBeNull();
  });
});
