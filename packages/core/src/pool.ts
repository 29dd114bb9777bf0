/**
 * @fileoverview CodecPool - runs encode/decode batches on worker threads.
 *
 * The codec is pure, so any number of threads can run it at once without
 * coordination. The pool exists to move large batches off the calling thread
 * and to exercise exactly that property.
 *
 * ## Data Flow
 *
 * ```
 * pool.encode(components)
 *        ↓
 * post({ t: 'ENCODE', seq, ... }) → worker runs protocol.handleMessage
 *        ↓                                  ↓
 * pending.get(seq)               ← post({ t: 'ENCODED', seq, packed })
 *        ↓
 * promise resolves with packed words
 * ```
 *
 * Workers load `worker.ts` straight from source through tsx's CommonJS
 * register hook, so no build step is needed before the pool can start.
 *
 * @see protocol.ts for the worker-side message handling
 */
import { availableParallelism } from 'node:os';
import { createRequire } from 'node:module';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import { createProtocol, type MsgFromWorker, type MsgToWorker } from './protocol';
import type { CodecPoolMode, CodecPoolOptions } from './types';
import { createLogger } from './utils/logger';

/**
 * Upper bound for the default thread count. Codec batches are short, so more
 * threads mostly add startup time.
 */
const DEFAULT_MAX_THREADS = 4;

const WORKER_BOOTSTRAP = `
const { workerData } = require('node:worker_threads');
require(workerData.loader).register();
require(workerData.entry);
`;

type WorkerBridge = {
  postMessage: (message: MsgToWorker) => void;
  terminate: () => Promise<void>;
  onmessage: ((message: MsgFromWorker) => void) | null;
};

type PendingRequest =
  | { kind: 'encode'; bridge: number; resolve: (packed: Uint32Array) => void; reject: (error: Error) => void }
  | { kind: 'decode'; bridge: number; resolve: (components: Float64Array) => void; reject: (error: Error) => void };

export class CodecPool {
  private readonly logger = createLogger('CodecPool');
  private readonly bridges: WorkerBridge[];
  private readonly pending = new Map<number, PendingRequest>();
  // Bridges whose worker died, with the error that killed it.
  private readonly failures = new Map<number, Error>();
  private readonly mode: CodecPoolMode;
  private seq = 0;
  private cursor = 0;
  private disposed = false;

  constructor(options: CodecPoolOptions = {}) {
    this.mode = options.mode ?? 'thread';
    const size = this.mode === 'inline' ? 1 : resolveThreadCount(options.threads);
    this.bridges = [];
    for (let index = 0; index < size; index++) {
      const bridge =
        this.mode === 'inline' ? createInlineBridge() : createThreadBridge((error) => this.failBridge(index, error));
      bridge.onmessage = (message) => this.handleMessage(message);
      this.bridges.push(bridge);
    }
    this.logger.log(`started ${size} ${this.mode} worker(s)`);
  }

  get size(): number {
    return this.bridges.length;
  }

  /** Workers still accepting requests. */
  get liveSize(): number {
    return this.bridges.length - this.failures.size;
  }

  /** Packs interleaved `x, y, z, w` components, four per output word. */
  encode(components: ArrayLike<number>): Promise<Uint32Array> {
    return new Promise<Uint32Array>((resolve, reject) => {
      if (this.disposed) {
        reject(new Error('CodecPool has been disposed.'));
        return;
      }
      const seq = this.nextSeq();
      const bridge = this.nextBridge();
      this.pending.set(seq, { kind: 'encode', bridge, resolve, reject });
      this.dispatch(bridge, { t: 'ENCODE', seq, components: Float64Array.from(components) });
    });
  }

  /** Unpacks words into interleaved `x, y, z, w` components. */
  decode(packed: ArrayLike<number>): Promise<Float64Array> {
    return new Promise<Float64Array>((resolve, reject) => {
      if (this.disposed) {
        reject(new Error('CodecPool has been disposed.'));
        return;
      }
      const seq = this.nextSeq();
      const bridge = this.nextBridge();
      this.pending.set(seq, { kind: 'decode', bridge, resolve, reject });
      this.dispatch(bridge, { t: 'DECODE', seq, packed: Uint32Array.from(packed) });
    });
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    const error = new Error('CodecPool has been disposed.');
    for (const request of this.pending.values()) {
      request.reject(error);
    }
    this.pending.clear();
    await Promise.all(this.bridges.map((bridge) => bridge.terminate()));
    this.logger.log('disposed');
  }

  private dispatch(bridge: number, message: MsgToWorker) {
    const failure = this.failures.get(bridge);
    if (failure) {
      const request = this.pending.get(message.seq);
      this.pending.delete(message.seq);
      request?.reject(failure);
      return;
    }
    try {
      this.bridges[bridge].postMessage(message);
    } catch (error) {
      this.settleError(message.seq, describeError(error));
    }
  }

  private handleMessage(message: MsgFromWorker) {
    if (message.t === 'ERROR') {
      if (message.seq === null) {
        this.logger.log('worker error without sequence', message.message);
        return;
      }
      this.settleError(message.seq, message.message);
      return;
    }
    const request = this.pending.get(message.seq);
    if (!request) {
      this.logger.log(`dropping reply for unknown seq ${message.seq}`);
      return;
    }
    this.pending.delete(message.seq);
    if (message.t === 'ENCODED' && request.kind === 'encode') {
      request.resolve(message.packed);
    } else if (message.t === 'DECODED' && request.kind === 'decode') {
      request.resolve(message.components);
    } else {
      request.reject(new Error(`Reply ${message.t} does not match a ${request.kind} request.`));
    }
  }

  private settleError(seq: number, reason: string) {
    const request = this.pending.get(seq);
    if (!request) return;
    this.pending.delete(seq);
    request.reject(new Error(reason));
  }

  private failBridge(index: number, error: Error) {
    if (this.failures.has(index)) return;
    this.failures.set(index, error);
    this.logger.log(`worker ${index} failed`, error);
    for (const [seq, request] of this.pending) {
      if (request.bridge === index) {
        this.pending.delete(seq);
        request.reject(error);
      }
    }
  }

  private nextSeq() {
    this.seq += 1;
    return this.seq;
  }

  /**
   * Next live bridge in round-robin order. When every worker has died the
   * request goes to a dead bridge and `dispatch` rejects it.
   */
  private nextBridge() {
    const count = this.bridges.length;
    for (let step = 0; step < count; step++) {
      const index = (this.cursor + step) % count;
      if (!this.failures.has(index)) {
        this.cursor = (index + 1) % count;
        return index;
      }
    }
    return this.cursor;
  }
}

export function resolveThreadCount(requested?: number): number {
  const fromEnv = typeof process !== 'undefined' ? process.env.PACKEDVEC_THREADS : undefined;
  const candidate = requested ?? (fromEnv ? parseInt(fromEnv, 10) : Math.min(availableParallelism(), DEFAULT_MAX_THREADS));
  if (!Number.isInteger(candidate) || candidate < 1) {
    throw new RangeError(`Thread count must be a positive integer, got ${candidate}.`);
  }
  return candidate;
}

function createThreadBridge(onFailure: (error: Error) => void): WorkerBridge {
  const requireFromHere = createRequire(import.meta.url);
  const worker = new Worker(WORKER_BOOTSTRAP, {
    eval: true,
    workerData: {
      loader: requireFromHere.resolve('tsx/cjs/api'),
      entry: fileURLToPath(new URL('./worker.ts', import.meta.url))
    }
  });

  let listener: ((message: MsgFromWorker) => void) | null = null;
  let terminating = false;
  worker.on('message', (message: MsgFromWorker) => listener?.(message));
  worker.on('error', (error: Error) => onFailure(error));
  worker.on('exit', (code: number) => {
    if (!terminating) {
      onFailure(new Error(`Codec worker exited with code ${code}.`));
    }
  });

  return {
    postMessage: (message) => worker.postMessage(message),
    terminate: async () => {
      terminating = true;
      await worker.terminate();
    },
    get onmessage() {
      return listener;
    },
    set onmessage(handler) {
      listener = handler;
    }
  };
}

function createInlineBridge(): WorkerBridge {
  let listener: ((message: MsgFromWorker) => void) | null = null;
  const protocol = createProtocol((message) => {
    listener?.(message);
  });

  return {
    postMessage(message) {
      // Same contract as worker.ts: a throwing request fails on its own.
      try {
        protocol.handleMessage(message);
      } catch (error) {
        listener?.({ t: 'ERROR', seq: message.seq, message: describeError(error) });
      }
    },
    async terminate() {},
    get onmessage() {
      return listener;
    },
    set onmessage(handler) {
      listener = handler;
    }
  };
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
