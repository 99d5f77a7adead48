import { describe, it, expect } from 'vitest';
import { randomNonce32 } from './eip3009.js';

describe('randomNonce32', () => {
  it('returns 32 bytes of lowercase hex', () => {
    expect(randomNonce32()).toMatch(/^0x[0-9a-f]{64}$/);
  });

  it('draws 1000 well-formed, pairwise distinct nonces', () => {
    const nonces = Array.from({ length: 1000 }, () => randomNonce32());
    for (const nonce of nonces) {
      expect(nonce).toMatch(/^0x[0-9a-f]{64}$/);
    }
    expect(new Set(nonces).size).toBe(1000);
  });
});
