import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  type AnimationEncoderOptions,
  DEFAULT_PROJECT_SETTINGS,
  ExportJob,
  type ExportProgress,
  type Frame,
  type ProjectSettings,
} from '@domain/frame-sequence/index.js';
import { FrameSequenceExportService } from '@/infrastructure/frame-sequence/frame-sequence-export.service.js';
import { InlineFrameProcessor } from '@/infrastructure/frame-sequence/processing/inline-frame-processor.js';
import { CancelledError, DecodeError, EncodeError } from '@/shared/errors/compositor-errors.js';

import { FakeFrameProcessor, MapSourceDecoder, RecordingEncoder } from '../../../helpers/fakes.js';
import { solid } from '../../../helpers/frames.js';
import { createTempDir, removeTempDir } from '../../../helpers/temp-dir.js';

let dir: string;

beforeEach(async () => {
  dir = await createTempDir();
});

afterEach(async () => {
  await removeTempDir(dir);
});

function frames(count: number): Frame[] {
  return Array.from({ length: count }, (_, index) => ({
    id: `frame-${index}`,
    source: `/frames/${index}.png`,
    format: 'standard' as const,
  }));
}

function job(count: number, destination: string, settings: Partial<ProjectSettings> = {}): ExportJob {
  return ExportJob.create({
    id: 'job-1',
    frames: frames(count),
    settings: { ...DEFAULT_PROJECT_SETTINGS, ...settings },
    destination,
    createdAt: new Date(0),
  });
}

function recordingFactory(failAt: number | null = null) {
  const encoders: RecordingEncoder[] = [];
  const createEncoder = (_format: ProjectSettings['format'], options: AnimationEncoderOptions) => {
    const encoder = new RecordingEncoder(options, failAt);
    encoders.push(encoder);
    return encoder;
  };
  return { encoders, createEncoder };
}

describe('FrameSequenceExportService', () => {
  it('encodes frames in order on a logical screen and writes the destination', async () => {
    const sizes = [
      [4, 2],
      [2, 6],
      [3, 3],
    ] as const;
    const processor = new FakeFrameProcessor(async (task) => {
      const [width, height] = sizes[task.index] ?? [1, 1];
      return solid(width, height, { r: task.index, g: 0, b: 0 });
    });
    const { encoders, createEncoder } = recordingFactory();
    const service = new FrameSequenceExportService({ processor, createEncoder });
    const destination = path.join(dir, 'out', 'loop.gif');
    const progress: ExportProgress[] = [];

    const outcome = await service.export(job(3, destination, { loopCount: 2 }), {
      onProgress: (event) => progress.push(event),
    });

    expect(outcome.result).toEqual({
      destination,
      format: 'gif',
      mimeType: 'image/gif',
      frameCount: 3,
      width: 4,
      height: 6,
      delayMs: 42,
      loopCount: 2,
      durationMs: 126,
    });
    expect(await fs.readFile(destination, 'utf8')).toBe('4x2,2x6,3x3');
    expect(outcome.metrics.outputSizeBytes).toBe(11);
    expect(encoders[0]?.options).toMatchObject({ width: 4, height: 6, delayMs: 42, loopCount: 2, quality: 85 });
    expect(encoders[0]?.frames.map((frame) => frame.data[0])).toEqual([0, 1, 2]);
    expect(progress.map((event) => `${event.stage}:${event.processed}/${event.total}`)).toEqual([
      'prepare:1/3',
      'prepare:2/3',
      'prepare:3/3',
      'encode:1/3',
      'encode:2/3',
      'encode:3/3',
    ]);
    expect(await fs.readdir(path.join(dir, 'out'))).toEqual(['loop.gif']);
  });

  it('passes the resolution settings to frame preparation', async () => {
    const processor = new FakeFrameProcessor(async () => solid(1, 1, { r: 0, g: 0, b: 0 }));
    const { createEncoder } = recordingFactory();
    const service = new FrameSequenceExportService({ processor, createEncoder });

    await service.export(
      job(2, path.join(dir, 'a.gif'), { resolution: { kind: 'height', height: 360 }, optimize: false }),
    );

    expect(processor.tasks).toEqual([
      { index: 0, source: '/frames/0.png', resolution: { kind: 'height', height: 360 }, optimize: false },
      { index: 1, source: '/frames/1.png', resolution: { kind: 'height', height: 360 }, optimize: false },
    ]);
  });

  it('a corrupt frame fails with its index and leaves no file behind', async () => {
    const processor = new FakeFrameProcessor(async (task) => {
      if (task.index === 1) {
        throw new DecodeError(task.source, new Error('bad huffman table'));
      }
      return solid(2, 2, { r: 0, g: 0, b: 0 });
    });
    const { encoders, createEncoder } = recordingFactory();
    const service = new FrameSequenceExportService({ processor, createEncoder });
    const destination = path.join(dir, 'broken.gif');

    const failure = service.export(job(3, destination));

    await expect(failure).rejects.toBeInstanceOf(DecodeError);
    await expect(failure).rejects.toMatchObject({ frameIndex: 1, source: '/frames/1.png' });
    expect(encoders).toHaveLength(0);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('cancellation stops at the next frame boundary', async () => {
    const processor = new FakeFrameProcessor(async () => solid(2, 2, { r: 0, g: 0, b: 0 }));
    const { encoders, createEncoder } = recordingFactory();
    const service = new FrameSequenceExportService({ processor, createEncoder });
    const abort = new AbortController();

    const failure = service.export(job(4, path.join(dir, 'cancelled.gif')), {
      signal: abort.signal,
      onProgress: (event) => {
        if (event.stage === 'encode' && event.processed === 1) {
          abort.abort();
        }
      },
    });

    await expect(failure).rejects.toBeInstanceOf(CancelledError);
    await expect(failure).rejects.toMatchObject({ metadata: { processedFrames: 1, totalFrames: 4 } });
    expect(encoders[0]?.frames).toHaveLength(1);
    expect(encoders[0]?.aborted).toBe(true);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('an already aborted signal prepares nothing', async () => {
    const processor = new FakeFrameProcessor(async () => solid(2, 2, { r: 0, g: 0, b: 0 }));
    const { createEncoder } = recordingFactory();
    const service = new FrameSequenceExportService({ processor, createEncoder });
    const abort = new AbortController();
    abort.abort();

    await expect(service.export(job(2, path.join(dir, 'x.gif')), { signal: abort.signal })).rejects.toBeInstanceOf(
      CancelledError,
    );
    expect(processor.tasks).toEqual([]);
  });

  it('encoder failures carry the frame index', async () => {
    const processor = new FakeFrameProcessor(async () => solid(2, 2, { r: 0, g: 0, b: 0 }));
    const { encoders, createEncoder } = recordingFactory(2);
    const service = new FrameSequenceExportService({ processor, createEncoder });

    const failure = service.export(job(3, path.join(dir, 'x.gif')));

    await expect(failure).rejects.toBeInstanceOf(EncodeError);
    await expect(failure).rejects.toMatchObject({ frameIndex: 2 });
    expect(encoders[0]?.aborted).toBe(true);
    expect(await fs.readdir(dir)).toEqual([]);
  });

  it('writes a real GIF through the inline processor', async () => {
    const decoder = new MapSourceDecoder(
      new Map([
        ['/frames/0.png', solid(8, 8, { r: 255, g: 255, b: 255 })],
        ['/frames/1.png', solid(8, 8, { r: 0, g: 0, b: 0 })],
      ]),
    );
    const service = new FrameSequenceExportService({ processor: new InlineFrameProcessor(decoder) });
    const destination = path.join(dir, 'real.gif');

    const outcome = await service.export(job(2, destination, { fps: 12 }));
    const bytes = await fs.readFile(destination);

    expect(bytes.toString('ascii', 0, 6)).toBe('GIF89a');
    expect(bytes.readUInt16LE(6)).toBe(8);
    expect(outcome.result.delayMs).toBe(83);
    expect(outcome.metrics.outputSizeBytes).toBe(bytes.length);
  });
});
