/**
 * @fileoverview Reads and writes packed 2/10/10/10 vectors inside vertex
 *   buffers. The adapter only touches bytes in an `ArrayBuffer`; handing the
 *   buffer to a graphics API is left to the caller, together with the
 *   attribute description in `VERTEX_ATTRIBUTE`.
 */
import {
  BYTES_PER_VECTOR,
  GL_UNSIGNED_INT_2_10_10_10_REV,
  PackedVector,
  WEBGPU_VERTEX_FORMAT,
  toWord
} from '@packedvec/core';

export const VERTEX_ATTRIBUTE = {
  glType: GL_UNSIGNED_INT_2_10_10_10_REV,
  size: 4,
  normalized: true,
  webgpuFormat: WEBGPU_VERTEX_FORMAT,
  byteLength: BYTES_PER_VECTOR
} as const;

export type AttributeViewOptions = {
  /** Byte offset of the first vector. Must be a multiple of 4. Default 0. */
  offset?: number;
  /** Bytes between consecutive vectors. Must be a multiple of 4. Default 4. */
  stride?: number;
  /** Number of vectors. Defaults to as many as fit after `offset`. */
  count?: number;
  /** Default true, matching the byte order GPUs consume. */
  littleEndian?: boolean;
};

export type AttributeView = {
  readonly length: number;
  get: (index: number) => PackedVector;
  set: (index: number, value: PackedVector | number) => void;
  setComponents: (index: number, x: number, y: number, z: number, w: number) => void;
  toArray: () => PackedVector[];
};

export type AttributeSource = ArrayBufferLike | ArrayBufferView;

export function writePacked(
  view: DataView,
  byteOffset: number,
  value: PackedVector | number,
  littleEndian = true
): void {
  view.setUint32(byteOffset, wordOf(value), littleEndian);
}

export function readPacked(view: DataView, byteOffset: number, littleEndian = true): PackedVector {
  return PackedVector.fromRaw(view.getUint32(byteOffset, littleEndian));
}

export function createAttributeView(source: AttributeSource, options: AttributeViewOptions = {}): AttributeView {
  const view = toDataView(source);
  const offset = options.offset ?? 0;
  const stride = options.stride ?? BYTES_PER_VECTOR;
  const littleEndian = options.littleEndian ?? true;

  if (!isAligned(offset) || offset < 0) {
    throw new RangeError(`Offset must be a non-negative multiple of 4 bytes, got ${offset}.`);
  }
  if (!isAligned(stride) || stride < BYTES_PER_VECTOR) {
    throw new RangeError(`Stride must be a positive multiple of 4 bytes, got ${stride}.`);
  }

  const length = options.count ?? fittingCount(view.byteLength, offset, stride);
  if (!Number.isInteger(length) || length < 0) {
    throw new RangeError(`Vector count must be a non-negative integer, got ${length}.`);
  }
  if (length > 0 && offset + (length - 1) * stride + BYTES_PER_VECTOR > view.byteLength) {
    throw new RangeError(`Attribute view of ${length} vectors does not fit in ${view.byteLength} bytes.`);
  }

  const byteOffsetOf = (index: number) => {
    if (!Number.isInteger(index) || index < 0 || index >= length) {
      throw new RangeError(`Index ${index} is out of range for ${length} vectors.`);
    }
    return offset + index * stride;
  };

  return {
    length,
    get(index) {
      return readPacked(view, byteOffsetOf(index), littleEndian);
    },
    set(index, value) {
      writePacked(view, byteOffsetOf(index), value, littleEndian);
    },
    setComponents(index, x, y, z, w) {
      writePacked(view, byteOffsetOf(index), new PackedVector(x, y, z, w), littleEndian);
    },
    toArray() {
      const vectors: PackedVector[] = new Array(length);
      for (let i = 0; i < length; i++) {
        vectors[i] = readPacked(view, offset + i * stride, littleEndian);
      }
      return vectors;
    }
  };
}

/**
 * Writes `values` from the start of the attribute view and returns how many
 * were written. Nothing is written when `values` holds more vectors than the
 * view has slots.
 */
export function fillAttributes(
  source: AttributeSource,
  values: Iterable<PackedVector | number>,
  options: AttributeViewOptions = {}
): number {
  const attributes = createAttributeView(source, options);
  const list = Array.from(values);
  if (list.length > attributes.length) {
    throw new RangeError(`Cannot write ${list.length} vectors into ${attributes.length} slots.`);
  }
  list.forEach((value, index) => attributes.set(index, value));
  return list.length;
}

function wordOf(value: PackedVector | number): number {
  return typeof value === 'number' ? toWord(value) : value.raw();
}

function toDataView(source: AttributeSource): DataView {
  if (ArrayBuffer.isView(source)) {
    return new DataView(source.buffer, source.byteOffset, source.byteLength);
  }
  return new DataView(source);
}

function isAligned(bytes: number) {
  return Number.isInteger(bytes) && bytes % BYTES_PER_VECTOR === 0;
}

function fittingCount(byteLength: number, offset: number, stride: number) {
  const available = byteLength - offset;
  if (available < BYTES_PER_VECTOR) return 0;
  return Math.floor((available - BYTES_PER_VECTOR) / stride) + 1;
}
