import { decode, decodeField, encode, encodeVec4, replaceField, toWord } from './codec';
import { FIELD_W, FIELD_X, FIELD_Y, FIELD_Z } from './layout';
import { quantizeUnorm } from './memory/quantize';
import type { Vec4 } from './types';

// Not exported, so only `fromRaw` can take the raw-word constructor path.
const RAW_WORD: unique symbol = Symbol('PackedVector.rawWord');

/**
 * Four-component vector packed into one 32-bit word.
 *
 * Components are unsigned-normalized: values are clamped to `[0, 1]` when
 * stored. `x`, `y` and `z` keep 10 bits each; `w` keeps 2 bits, so it can only
 * read back as `0`, `1/3`, `2/3` or `1`.
 *
 * The word itself (see {@link PackedVector.raw}) has the memory layout of the
 * `GL_UNSIGNED_INT_2_10_10_10_REV` vertex attribute type.
 *
 * @example
 * ```typescript
 * const color = new PackedVector(0.444, 0.555, 0.666, 0.2);
 * color.x(); // ~0.4438
 * color.w(); // 1/3
 * ```
 */
export class PackedVector {
  private readonly word: number;

  constructor(x: number, y: number, z: number, w: number);
  constructor(token: typeof RAW_WORD, word: number);
  constructor(x: number | typeof RAW_WORD, y: number, z?: number, w?: number) {
    this.word = x === RAW_WORD ? toWord(y) : encode(x, y, z ?? 0, w ?? 0);
    Object.freeze(this);
  }

  /**
   * Wraps a word produced elsewhere, e.g. read back from a vertex buffer.
   * Any number is accepted and reduced to an unsigned 32-bit pattern.
   */
  static fromRaw(word: number): PackedVector {
    return new PackedVector(RAW_WORD, word);
  }

  static fromVec4(components: Vec4): PackedVector {
    return PackedVector.fromRaw(encodeVec4(components));
  }

  x(): number {
    return decodeField(this.word, FIELD_X);
  }

  y(): number {
    return decodeField(this.word, FIELD_Y);
  }

  z(): number {
    return decodeField(this.word, FIELD_Z);
  }

  w(): number {
    return decodeField(this.word, FIELD_W);
  }

  /** Unsigned 32-bit word for binary interchange. */
  raw(): number {
    return this.word;
  }

  withX(x: number): PackedVector {
    return PackedVector.fromRaw(replaceField(this.word, FIELD_X, x));
  }

  withY(y: number): PackedVector {
    return PackedVector.fromRaw(replaceField(this.word, FIELD_Y, y));
  }

  withZ(z: number): PackedVector {
    return PackedVector.fromRaw(replaceField(this.word, FIELD_Z, z));
  }

  withW(w: number): PackedVector {
    return PackedVector.fromRaw(replaceField(this.word, FIELD_W, w));
  }

  /** Replaces the three wide fields and keeps `w`. */
  withXYZ(x: number, y: number, z: number): PackedVector {
    const w = this.word & FIELD_W.mask;
    const xyz =
      (quantizeUnorm(z, FIELD_Z.bits) << FIELD_Z.offset) |
      (quantizeUnorm(y, FIELD_Y.bits) << FIELD_Y.offset) |
      (quantizeUnorm(x, FIELD_X.bits) << FIELD_X.offset);
    return PackedVector.fromRaw((w | xyz) >>> 0);
  }

  toVec4(): Vec4 {
    return decode(this.word);
  }

  toArray(): [number, number, number, number] {
    return [this.x(), this.y(), this.z(), this.w()];
  }

  equals(other: PackedVector): boolean {
    return this.word === other.word;
  }

  toString(): string {
    const parts = this.toArray().map((value) => value.toFixed(4));
    return `PackedVector(${parts.join(', ')})`;
  }
}
