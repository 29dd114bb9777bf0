import { describe, expect, it } from 'vitest';

import { createProtocol, type MsgFromWorker, type MsgToWorker } from '../src/protocol';

describe('codec protocol', () => {
  it('replies to ENCODE with packed words', () => {
    const messages: MsgFromWorker[] = [];
    const { handleMessage } = createProtocol((message) => {
      messages.push(message);
    });

    const encode: MsgToWorker = {
      t: 'ENCODE',
      seq: 1,
      components: new Float64Array([1, 0, 0, 0, 0.444, 0.555, 0.666, 0.2])
    };
    handleMessage(encode);

    expect(messages).toHaveLength(1);
    const [reply] = messages;
    expect(reply.t).toBe('ENCODED');
    expect(reply.seq).toBe(1);
    expect(reply.t === 'ENCODED' ? Array.from(reply.packed) : null).toEqual([0x3ff, 0x6a98e1c6]);
  });

  it('replies to DECODE with interleaved components', () => {
    const messages: MsgFromWorker[] = [];
    const { handleMessage } = createProtocol((message) => {
      messages.push(message);
    });

    handleMessage({ t: 'DECODE', seq: 7, packed: new Uint32Array([0xc00003ff, 0]) });

    const [reply] = messages;
    expect(reply.t === 'DECODED' ? Array.from(reply.components) : null).toEqual([1, 0, 0, 1, 0, 0, 0, 0]);
    expect(reply.seq).toBe(7);
  });

  it('rejects component counts that do not fill whole vectors', () => {
    const messages: MsgFromWorker[] = [];
    const { handleMessage } = createProtocol((message) => {
      messages.push(message);
    });

    handleMessage({ t: 'ENCODE', seq: 2, components: new Float64Array(5) });

    expect(messages).toEqual([
      { t: 'ERROR', seq: 2, message: 'Component count 5 is not a multiple of 4.' }
    ]);
  });

  it('reports unknown message types', () => {
    const messages: MsgFromWorker[] = [];
    const { handleMessage } = createProtocol((message) => {
      messages.push(message);
    });

    handleMessage(JSON.parse('{"t":"RESIZE","seq":9}'));
    handleMessage(JSON.parse('{"t":"RESIZE"}'));

    expect(messages).toEqual([
      { t: 'ERROR', seq: 9, message: 'Unknown message type: RESIZE' },
      { t: 'ERROR', seq: null, message: 'Unknown message type: RESIZE' }
    ]);
  });
});
