import { parentPort } from 'node:worker_threads';

import { createProtocol, type MsgToWorker } from './protocol';
import { createLogger } from './utils/logger';

const logger = createLogger('Worker');

if (!parentPort) {
  throw new Error('worker.ts must be loaded as a worker thread.');
}

const port = parentPort;

try {
  const { handleMessage } = createProtocol((message) => {
    port.postMessage(message);
  });

  port.on('message', (message: MsgToWorker) => {
    try {
      handleMessage(message);
    } catch (error) {
      logger.log('message error', error);
      port.postMessage({ t: 'ERROR', seq: message.seq, message: error instanceof Error ? error.message : String(error) });
    }
  });

  logger.log('initialized');
} catch (error) {
  logger.log('init error', error);
  port.postMessage({ t: 'ERROR', seq: null, message: String(error) });
}
