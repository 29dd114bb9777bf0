/**
 * @fileoverview Message protocol between `CodecPool` and its workers. A
 *   request carries a batch of interleaved components (`ENCODE`) or packed
 *   words (`DECODE`) and a sequence number; the reply echoes the sequence
 *   number so the pool can settle the matching promise. The same handler
 *   runs inside `worker.ts` and, for inline pools, on the calling thread.
 */
import { decodeInto, encodeInto } from './codec';
import { FIELD_ORDER } from './layout';

export type MsgToWorker =
  | { t: 'ENCODE'; seq: number; components: Float64Array }
  | { t: 'DECODE'; seq: number; packed: Uint32Array };

export type MsgFromWorker =
  | { t: 'ENCODED'; seq: number; packed: Uint32Array }
  | { t: 'DECODED'; seq: number; components: Float64Array }
  | { t: 'ERROR'; seq: number | null; message: string };

const COMPONENTS = FIELD_ORDER.length;

export function createProtocol(post: (message: MsgFromWorker) => void) {
  function handleMessage(message: MsgToWorker) {
    switch (message.t) {
      case 'ENCODE': {
        const { components, seq } = message;
        if (components.length % COMPONENTS !== 0) {
          post({
            t: 'ERROR',
            seq,
            message: `Component count ${components.length} is not a multiple of ${COMPONENTS}.`
          });
          return;
        }
        const packed = encodeInto(components, new Uint32Array(components.length / COMPONENTS));
        post({ t: 'ENCODED', seq, packed });
        return;
      }
      case 'DECODE': {
        const { packed, seq } = message;
        const components = decodeInto(packed, new Float64Array(packed.length * COMPONENTS));
        post({ t: 'DECODED', seq, components });
        return;
      }
      default:
        post({ t: 'ERROR', seq: recoverSeq(message), message: `Unknown message type: ${describeType(message)}` });
    }
  }

  return { handleMessage };
}

function recoverSeq(message: unknown): number | null {
  if (typeof message !== 'object' || message === null || !('seq' in message)) return null;
  return typeof message.seq === 'number' ? message.seq : null;
}

function describeType(message: unknown): string {
  if (typeof message !== 'object' || message === null || !('t' in message)) return String(message);
  return String(message.t);
}
