import { describe, it, expect } from 'vitest';
import { canonicalJson, contentSignature } from './signature';

describe('canonicalJson', () => {
  it('sorts keys at every depth', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: 0 }], c: 'x' } }))
      .toBe('{"a":{"c":"x","d":[2,{"y":0,"z":1}]},"b":1}');
  });

  it('drops undefined object values', () => {
    expect(canonicalJson({ a: undefined, b: null })).toBe('{"b":null}');
  });
});

describe('contentSignature', () => {
  it('ignores key order', () => {
    expect(contentSignature({ q: 'hi', n: 3 })).toBe(contentSignature({ n: 3, q: 'hi' }));
  });

  it('differs for different content', () => {
    expect(contentSignature({ q: 'hi' })).not.toBe(contentSignature({ q: 'bye' }));
  });

  it('is 16 hex characters', () => {
    expect(contentSignature({})).toMatch(/^[0-9a-f]{16}$/);
  });
});
