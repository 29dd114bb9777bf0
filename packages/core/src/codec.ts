/**
 * @fileoverview Encode and decode between four unsigned-normalized components
 *   and the packed 2/10/10/10 word. Every function is total: encoding clamps
 *   out-of-range input and decoding accepts any 32-bit pattern. Bit offsets
 *   and widths come from `layout.ts`; quantization lives in `memory/quantize`.
 */
import { FIELD_W, FIELD_X, FIELD_Y, FIELD_Z, FIELD_ORDER, type FieldSpec } from './layout';
import { dequantizeUnorm, quantizeUnorm } from './memory/quantize';
import type { Vec4 } from './types';

/**
 * Coerces any number to an unsigned 32-bit word (ECMAScript ToUint32).
 * Negative values map to their two's-complement pattern, `NaN` to 0.
 */
export function toWord(value: number): number {
  return value >>> 0;
}

export function encode(x: number, y: number, z: number, w: number): number {
  return (
    (quantizeUnorm(w, FIELD_W.bits) << FIELD_W.offset) |
    (quantizeUnorm(z, FIELD_Z.bits) << FIELD_Z.offset) |
    (quantizeUnorm(y, FIELD_Y.bits) << FIELD_Y.offset) |
    (quantizeUnorm(x, FIELD_X.bits) << FIELD_X.offset)
  ) >>> 0;
}

export function encodeVec4(vector: Vec4): number {
  return encode(vector.x, vector.y, vector.z, vector.w);
}

/** Raw quantized integer stored in `field`. */
export function extractField(packed: number, field: FieldSpec): number {
  return (packed >>> field.offset) & field.max;
}

export function decodeField(packed: number, field: FieldSpec): number {
  return dequantizeUnorm(extractField(packed, field), field.bits);
}

export function decode(packed: number): Vec4 {
  return {
    x: decodeField(packed, FIELD_X),
    y: decodeField(packed, FIELD_Y),
    z: decodeField(packed, FIELD_Z),
    w: decodeField(packed, FIELD_W)
  };
}

/**
 * Re-quantizes a single field. The bits of the other three fields are
 * carried over unchanged.
 */
export function replaceField(packed: number, field: FieldSpec, value: number): number {
  const kept = packed & ~field.mask;
  return (kept | (quantizeUnorm(value, field.bits) << field.offset)) >>> 0;
}

export function encodeInto(components: ArrayLike<number>, target: Uint32Array): Uint32Array {
  for (let i = 0; i < target.length; i++) {
    const base = i * FIELD_ORDER.length;
    target[i] = encode(components[base], components[base + 1], components[base + 2], components[base + 3]);
  }
  return target;
}

export function decodeInto(packed: ArrayLike<number>, target: Float64Array): Float64Array {
  for (let i = 0; i < packed.length; i++) {
    const word = packed[i];
    const base = i * FIELD_ORDER.length;
    target[base] = decodeField(word, FIELD_X);
    target[base + 1] = decodeField(word, FIELD_Y);
    target[base + 2] = decodeField(word, FIELD_Z);
    target[base + 3] = decodeField(word, FIELD_W);
  }
  return target;
}
