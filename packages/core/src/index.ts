export { PackedVector } from './vector';
export {
  decode,
  decodeField,
  decodeInto,
  encode,
  encodeInto,
  encodeVec4,
  extractField,
  replaceField,
  toWord
} from './codec';
export {
  BYTES_PER_VECTOR,
  FIELDS,
  FIELD_ORDER,
  FIELD_W,
  FIELD_X,
  FIELD_Y,
  FIELD_Z,
  GL_UNSIGNED_INT_2_10_10_10_REV,
  NARROW_BITS,
  WEBGPU_VERTEX_FORMAT,
  WIDE_BITS
} from './layout';
export type { Component, FieldSpec } from './layout';
export { ROUNDING_MODE, clampUnit, dequantizeUnorm, quantizeUnorm } from './memory/quantize';
export type { RoundingMode } from './memory/quantize';
export { CodecPool, resolveThreadCount } from './pool';
export type { MsgFromWorker, MsgToWorker } from './protocol';
export type { CodecPoolMode, CodecPoolOptions, Vec4 } from './types';
export { createLogger, isDebugMode } from './utils/logger';
export type { Logger } from './utils/logger';
