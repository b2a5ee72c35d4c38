import { parentPort, workerData } from 'node:worker_threads';

import { WHITE, type RgbColor } from '@domain/frame-sequence/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

import { FileSourceDecoder } from '../decoding/file-source-decoder.js';
import { handlePrepareFrame, type WorkerRequest } from '../processing/frame-processor-messages.js';

if (!parentPort) {
  throw new Error('Frame processor worker must be spawned as a worker thread');
}

const port = parentPort;
const logger = createChildLogger({ module: 'FrameProcessorWorker' });
const decoder = new FileSourceDecoder({ background: readBackground(workerData) });

port.on('message', (message: WorkerRequest) => {
  if (message.type === 'shutdown') {
    port.close();
    return;
  }

  handlePrepareFrame(message, decoder)
    .then((reply) => port.postMessage(reply))
    .catch((error: unknown) => {
      logger.error({ error, taskId: message.taskId }, 'Unable to post prepared frame');
    });
});

function readBackground(data: unknown): RgbColor {
  if (typeof data !== 'object' || data === null || !('background' in data)) {
    return WHITE;
  }

  const { background } = data;
  if (
    typeof background === 'object' &&
    background !== null &&
    'r' in background &&
    'g' in background &&
    'b' in background &&
    typeof background.r === 'number' &&
    typeof background.g === 'number' &&
    typeof background.b === 'number'
  ) {
    return { r: background.r, g: background.g, b: background.b };
  }

  return WHITE;
}
