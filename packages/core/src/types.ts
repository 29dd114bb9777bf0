/**
 * @fileoverview Shared type definitions for packedvec: the decoded component
 *   record consumed by `codec.ts` and `vector.ts`, and the options accepted by
 *   the worker-backed `CodecPool`. The vertex-buffer adapter imports these
 *   through the package entry point.
 */

export type Vec4 = {
  readonly x: number;
  readonly y: number;
  readonly z: number;
  readonly w: number;
};

export type CodecPoolMode = 'thread' | 'inline';

export type CodecPoolOptions = {
  /**
   * `thread` runs each codec request on a worker thread; `inline` handles it
   * on the calling thread through the same message protocol.
   */
  mode?: CodecPoolMode;
  /** Worker count for `thread` mode. Defaults to `PACKEDVEC_THREADS`, else up to 4. */
  threads?: number;
};
