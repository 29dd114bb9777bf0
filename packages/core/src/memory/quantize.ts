/**
 * Tie-breaking rule at the midpoint between two quantized steps. Inputs are
 * clamped to `[0, 1]` first, so `Math.round` always rounds halves upward.
 */
export const ROUNDING_MODE = 'half-up' as const;

export type RoundingMode = typeof ROUNDING_MODE;

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(Math.max(value, 0), 1);
}

export function quantizeUnorm(value: number, bits: number): number {
  const max = (1 << bits) - 1;
  return Math.round(clampUnit(value) * max);
}

export function dequantizeUnorm(raw: number, bits: number): number {
  const max = (1 << bits) - 1;
  return (raw & max) / max;
}
