import { describe, expect, it } from 'vitest';

import { CodecPool, PackedVector, ROUNDING_MODE, decode, encode } from '../src';

describe('package entry', () => {
  it('exposes the codec, the value type and the pool', () => {
    expect(encode(0, 0, 0, 1)).toBe(new PackedVector(0, 0, 0, 1).raw());
    expect(decode(0xffffffff).w).toBe(1);
    expect(ROUNDING_MODE).toBe('half-up');
    expect(typeof CodecPool).toBe('function');
  });
});
