import type { FrameProcessor, RgbColor, SourceDecoder, TickScheduler } from '@domain/frame-sequence/index.js';
import { WHITE } from '@domain/frame-sequence/index.js';

import { FrameSequenceController } from '@/application/frame-sequence/index.js';
import { type AppConfig, loadConfig } from '@/config/env.js';
import {
  CachedFramePreviewer,
  CachedSourceDecoder,
  FileSourceDecoder,
  FrameSequenceExportService,
  InlineFrameProcessor,
  isCompiledWorkerAvailable,
  TimerTickScheduler,
  WorkerFrameProcessorPool,
} from '@/infrastructure/frame-sequence/index.js';
import { createChildLogger } from '@/shared/logger/pino.js';

export interface CreateFrameSequenceControllerOptions {
  readonly config?: AppConfig;
  readonly background?: RgbColor;
  readonly scheduler?: TickScheduler;
  /** Decode every source before adding it. Defaults to true. */
  readonly verifyOnAdd?: boolean;
}

const logger = createChildLogger({ module: 'createFrameSequenceController' });

/**
 * Wires a controller over the file-backed decoder, the canvas and gifenc
 * encoders and Node timers. Frames are prepared on the calling thread when the
 * worker pool size is 0 or the compiled worker is not beside this module.
 */
export function createFrameSequenceController(
  options: CreateFrameSequenceControllerOptions = {},
): FrameSequenceController {
  const config = options.config ?? loadConfig();
  const background = options.background ?? WHITE;

  const decoder = new CachedSourceDecoder(new FileSourceDecoder({ background }), {
    maxEntries: config.cacheEntries,
  });

  const processor = createFrameProcessor(config.workerPoolSize, decoder, background);

  logger.debug(
    { workers: processor.concurrency, cacheEntries: config.cacheEntries },
    'Creating frame sequence controller',
  );

  return new FrameSequenceController({
    exporter: new FrameSequenceExportService({ processor, background }),
    decoder,
    previewer: new CachedFramePreviewer(decoder, { maxEntries: config.cacheEntries }),
    scheduler: options.scheduler ?? new TimerTickScheduler(),
    verifyOnAdd: options.verifyOnAdd,
    previewMaxDimension: config.previewMaxDimension,
    onClose: () => processor.destroy(),
  });
}

function createFrameProcessor(workerPoolSize: number, decoder: SourceDecoder, background: RgbColor): FrameProcessor {
  if (workerPoolSize <= 0) {
    return new InlineFrameProcessor(decoder);
  }

  if (!isCompiledWorkerAvailable()) {
    logger.warn({ workerPoolSize }, 'Compiled frame worker not found, preparing frames on the calling thread');
    return new InlineFrameProcessor(decoder);
  }

  return new WorkerFrameProcessorPool(workerPoolSize, { background });
}

export * from '@/application/frame-sequence/index.js';
export { type AppConfig, loadConfig } from '@/config/env.js';
export * from '@domain/frame-sequence/index.js';
export * from '@/shared/errors/app-error.js';
export * from '@/shared/errors/base.error.js';
export * from '@/shared/errors/compositor-errors.js';
