/**
 * @fileoverview Bit layout of the packed 2/10/10/10 word. The layout is the
 *   reversed ("REV") convention used by `GL_UNSIGNED_INT_2_10_10_10_REV` and
 *   WebGPU's `unorm10-10-10-2`: `x` sits in the lowest ten bits and the
 *   two-bit `w` field occupies the top of the word. `codec.ts` and the
 *   vertex-buffer adapter read every offset and width from here.
 */

export type Component = 'x' | 'y' | 'z' | 'w';

export type FieldSpec = {
  name: Component;
  offset: number;
  bits: number;
  /** Largest quantized value, `(1 << bits) - 1`. */
  max: number;
  /** Field bits in place, as an unsigned 32-bit value. */
  mask: number;
};

function field(name: Component, offset: number, bits: number): FieldSpec {
  const max = (1 << bits) - 1;
  return { name, offset, bits, max, mask: (max << offset) >>> 0 };
}

export const WIDE_BITS = 10;
export const NARROW_BITS = 2;

export const FIELD_X = field('x', 0, WIDE_BITS);
export const FIELD_Y = field('y', 10, WIDE_BITS);
export const FIELD_Z = field('z', 20, WIDE_BITS);
export const FIELD_W = field('w', 30, NARROW_BITS);

export const FIELDS: Readonly<Record<Component, FieldSpec>> = {
  x: FIELD_X,
  y: FIELD_Y,
  z: FIELD_Z,
  w: FIELD_W
};

/** Logical order, which is also low-to-high bit order. */
export const FIELD_ORDER: readonly FieldSpec[] = [FIELD_X, FIELD_Y, FIELD_Z, FIELD_W];

export const BYTES_PER_VECTOR = 4;

// OpenGL enum value of GL_UNSIGNED_INT_2_10_10_10_REV.
export const GL_UNSIGNED_INT_2_10_10_10_REV = 0x8368;
export const WEBGPU_VERTEX_FORMAT = 'unorm10-10-10-2' as const;
