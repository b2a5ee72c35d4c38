import { randomUUID } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { performance } from 'node:perf_hooks';
import { setImmediate as yieldToEventLoop } from 'node:timers/promises';

import {
  type AnimationEncoder,
  type AnimationEncoderFactory,
  type AnimationExporter,
  type ExportJob,
  type ExportOutcome,
  type ExportProgress,
  type ExportRunOptions,
  type FrameProcessor,
  type PixelBuffer,
  type RgbColor,
  WHITE,
} from '@domain/frame-sequence/index.js';

import { CancelledError, DecodeError, EncodeError } from '@/shared/errors/compositor-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';
import { frameDelayMs, sequenceDurationMs } from '@/shared/media/frameTiming.js';

import { createAnimationEncoder } from './encoding/create-animation-encoder.js';
import { computeLogicalScreen } from './encoding/logical-screen.js';

export interface FrameSequenceExportServiceOptions {
  readonly processor: FrameProcessor;
  readonly createEncoder?: AnimationEncoderFactory;
  readonly background?: RgbColor;
}

/**
 * Runs an export: frames are decoded and resampled through the frame
 * processor (possibly in parallel), then written to the encoder strictly in
 * sequence order. Output goes to a temporary file beside the destination and is
 * renamed into place only once the whole animation has been encoded.
 */
export class FrameSequenceExportService implements AnimationExporter {
  private readonly logger = createChildLogger({ module: 'FrameSequenceExportService' });

  private readonly processor: FrameProcessor;

  private readonly createEncoder: AnimationEncoderFactory;

  private readonly background: RgbColor;

  public constructor(options: FrameSequenceExportServiceOptions) {
    this.processor = options.processor;
    this.createEncoder = options.createEncoder ?? createAnimationEncoder;
    this.background = options.background ?? WHITE;
  }

  public async export(job: ExportJob, options: ExportRunOptions = {}): Promise<ExportOutcome> {
    const startedAt = performance.now();
    const destination = path.resolve(job.destination);
    const temporary = path.join(path.dirname(destination), `.${path.basename(destination)}.${randomUUID()}.partial`);
    const { settings } = job;

    try {
      const prepareStarted = performance.now();
      const frames = await this.prepareFrames(job, options);
      const prepareTimeMs = performance.now() - prepareStarted;

      const screen = computeLogicalScreen(frames);
      const delayMs = frameDelayMs(settings.fps);
      const encoder = this.createEncoder(settings.format, {
        width: screen.width,
        height: screen.height,
        delayMs,
        loopCount: settings.loopCount,
        quality: settings.quality,
        optimize: settings.optimize,
        background: this.background,
      });

      const encodeStarted = performance.now();
      const bytes = await this.encodeFrames(encoder, frames, options);
      await this.commit(bytes, temporary, destination, frames.length);
      const encodeTimeMs = performance.now() - encodeStarted;

      this.logger.debug({ jobId: job.id, destination, bytes: bytes.byteLength }, 'Animation written');

      return {
        result: {
          destination,
          format: encoder.format,
          mimeType: encoder.mimeType,
          frameCount: frames.length,
          width: screen.width,
          height: screen.height,
          delayMs,
          loopCount: settings.loopCount,
          durationMs: sequenceDurationMs(settings.fps, frames.length),
        },
        metrics: {
          prepareTimeMs,
          encodeTimeMs,
          totalTimeMs: performance.now() - startedAt,
          outputSizeBytes: bytes.byteLength,
          averageFramePreparationMs: frames.length ? prepareTimeMs / frames.length : 0,
        },
      };
    } catch (error) {
      await this.discard(temporary);
      throw error;
    }
  }

  private async discard(temporary: string): Promise<void> {
    try {
      await fs.rm(temporary, { force: true });
    } catch (cleanupError) {
      this.logger.debug({ temporary, cleanupError }, 'Unable to remove temporary export file');
    }
  }

  private async prepareFrames(job: ExportJob, options: ExportRunOptions): Promise<PixelBuffer[]> {
    const { signal, onProgress } = options;
    const total = job.frameCount;
    const prepared: Array<PixelBuffer | undefined> = new Array<PixelBuffer | undefined>(total);
    let nextIndex = 0;
    let completed = 0;
    let failure: unknown = null;

    const runner = async (): Promise<void> => {
      while (failure === null) {
        if (signal?.aborted) {
          failure = new CancelledError(completed, total);
          return;
        }

        const index = nextIndex;
        const frame = job.frames[index];
        if (!frame) {
          return;
        }
        nextIndex += 1;

        try {
          prepared[index] = await this.processor.process({
            index,
            source: frame.source,
            resolution: job.settings.resolution,
            optimize: job.settings.optimize,
          });
        } catch (error) {
          failure ??= error instanceof DecodeError ? error.atFrame(index) : error;
          return;
        }

        completed += 1;
        report(onProgress, 'prepare', completed, total);
      }
    };

    const lanes = Math.max(1, Math.min(this.processor.concurrency, total));
    await Promise.all(Array.from({ length: lanes }, runner));

    if (failure !== null) {
      throw failure;
    }

    if (signal?.aborted) {
      throw new CancelledError(completed, total);
    }

    return prepared.map((buffer, index) => {
      if (!buffer) {
        throw new DecodeError(job.frames[index]?.source ?? '', new Error('Frame was not prepared'), index);
      }
      return buffer;
    });
  }

  private async encodeFrames(
    encoder: AnimationEncoder,
    frames: readonly PixelBuffer[],
    options: ExportRunOptions,
  ): Promise<Buffer> {
    const { signal, onProgress } = options;
    const total = frames.length;

    try {
      for (const [index, frame] of frames.entries()) {
        try {
          await encoder.addFrame(frame);
        } catch (error) {
          throw new EncodeError(index, error);
        }

        report(onProgress, 'encode', index + 1, total);
        await yieldToEventLoop();

        if (signal?.aborted) {
          throw new CancelledError(index + 1, total);
        }
      }

      try {
        return await encoder.finish();
      } catch (error) {
        throw new EncodeError(total - 1, error);
      }
    } catch (error) {
      encoder.abort();
      throw error;
    }
  }

  private async commit(bytes: Buffer, temporary: string, destination: string, frameCount: number): Promise<void> {
    try {
      await fs.mkdir(path.dirname(destination), { recursive: true });
      await fs.writeFile(temporary, bytes);
      await fs.rename(temporary, destination);
    } catch (error) {
      throw new EncodeError(frameCount - 1, error);
    }
  }
}

function report(
  onProgress: ExportRunOptions['onProgress'],
  stage: ExportProgress['stage'],
  processed: number,
  total: number,
): void {
  onProgress?.({ stage, processed, total, fraction: total > 0 ? processed / total : 1 });
}
