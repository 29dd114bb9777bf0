import { describe, expect, it } from 'vitest';

import { ROUNDING_MODE, clampUnit, dequantizeUnorm, quantizeUnorm } from '../src/memory/quantize';

describe('quantizeUnorm', () => {
  it('scales into the full 10-bit range', () => {
    expect(quantizeUnorm(0, 10)).toBe(0);
    expect(quantizeUnorm(1, 10)).toBe(1023);
    expect(quantizeUnorm(0.444, 10)).toBe(454);
  });

  it('clamps out-of-range and non-finite input', () => {
    expect(quantizeUnorm(1.5, 10)).toBe(quantizeUnorm(1, 10));
    expect(quantizeUnorm(-0.3, 10)).toBe(quantizeUnorm(0, 10));
    expect(quantizeUnorm(Number.POSITIVE_INFINITY, 10)).toBe(1023);
    expect(quantizeUnorm(Number.NEGATIVE_INFINITY, 10)).toBe(0);
    expect(quantizeUnorm(Number.NaN, 10)).toBe(0);
    expect(quantizeUnorm(Number.NaN, 2)).toBe(0);
  });

  it('rounds exact midpoints upward', () => {
    expect(ROUNDING_MODE).toBe('half-up');
    // 0.5 * 1023 = 511.5 and 0.5 * 3 = 1.5 are exact in binary.
    expect(quantizeUnorm(0.5, 10)).toBe(512);
    expect(quantizeUnorm(0.5, 2)).toBe(2);
  });

  it('snaps the 2-bit field into four buckets', () => {
    expect(quantizeUnorm(0, 2)).toBe(0);
    expect(quantizeUnorm(0.1666, 2)).toBe(0);
    expect(quantizeUnorm(0.1667, 2)).toBe(1);
    expect(quantizeUnorm(0.2, 2)).toBe(1);
    expect(quantizeUnorm(0.4999, 2)).toBe(1);
    expect(quantizeUnorm(0.5, 2)).toBe(2);
    expect(quantizeUnorm(0.8333, 2)).toBe(2);
    expect(quantizeUnorm(0.8334, 2)).toBe(3);
    expect(quantizeUnorm(1, 2)).toBe(3);
  });
});

describe('dequantizeUnorm', () => {
  it('maps quantized steps back onto [0, 1]', () => {
    expect(dequantizeUnorm(0, 10)).toBe(0);
    expect(dequantizeUnorm(1023, 10)).toBe(1);
    expect(dequantizeUnorm(512, 10)).toBe(512 / 1023);
    expect(dequantizeUnorm(1, 2)).toBe(1 / 3);
    expect(dequantizeUnorm(3, 2)).toBe(1);
  });

  it('stays within half a step of the input', () => {
    for (const bits of [10, 2]) {
      const step = 1 / ((1 << bits) - 1);
      for (let i = 0; i <= 10_000; i++) {
        const value = i / 10_000;
        const restored = dequantizeUnorm(quantizeUnorm(value, bits), bits);
        expect(Math.abs(restored - value)).toBeLessThanOrEqual(step / 2 + 1e-12);
      }
    }
  });
});

describe('clampUnit', () => {
  it('keeps in-range values untouched', () => {
    expect(clampUnit(0.25)).toBe(0.25);
    expect(clampUnit(-2)).toBe(0);
    expect(clampUnit(7)).toBe(1);
  });
});
