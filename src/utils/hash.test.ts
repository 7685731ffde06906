import { describe, expect, it } from 'vitest';
import { canonicalJson, checksumFrom } from './hash.js';

describe('canonicalJson', () => {
  it('sorts keys at every depth and drops undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: null }], c: undefined } })).toBe(
      '{"a":{"d":[2,{"y":null,"z":1}]},"b":1}',
    );
  });
});

describe('checksumFrom', () => {
  it('ignores key order', () => {
    expect(checksumFrom({ modelId: 'm', text: 't' })).toBe(checksumFrom({ text: 't', modelId: 'm' }));
    expect(checksumFrom({ modelId: 'm', text: 't' })).not.toBe(checksumFrom({ modelId: 'm', text: 'u' }));
    expect(checksumFrom('x')).toHaveLength(64);
  });
});
