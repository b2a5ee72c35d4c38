import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import type {
  FramePreparationTask,
  FrameProcessor,
  PixelBuffer,
  SourceDecoder,
} from '@domain/frame-sequence/index.js';

import { prepareFrame } from './prepare-frame.js';

const DEFAULT_CONCURRENCY = 2;

/**
 * Decodes and resamples on the calling thread, yielding to the event loop
 * before each frame so interactive work keeps running.
 */
export class InlineFrameProcessor implements FrameProcessor {
  public readonly concurrency: number;

  public constructor(
    private readonly decoder: SourceDecoder,
    options: { concurrency?: number } = {},
  ) {
    this.concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  }

  public async process(task: FramePreparationTask): Promise<PixelBuffer> {
    await yieldToEventLoop();
    return prepareFrame(this.decoder, task);
  }

  public async destroy(): Promise<void> {
    await Promise.resolve();
  }
}
