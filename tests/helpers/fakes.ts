import type {
  AnimationEncoder,
  AnimationEncoderOptions,
  FramePreparationTask,
  FrameProcessor,
  PixelBuffer,
  SourceDecoder,
} from '@domain/frame-sequence/index.js';

/** Decodes from an in-memory table keyed by source path. */
export class MapSourceDecoder implements SourceDecoder {
  public readonly calls: string[] = [];

  public constructor(private readonly buffers: ReadonlyMap<string, PixelBuffer | Error>) {}

  public async decode(source: string): Promise<PixelBuffer> {
    this.calls.push(source);
    const entry = this.buffers.get(source);
    if (!entry) {
      throw new Error(`No fixture for ${source}`);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry;
  }
}

/** Hands out buffers per frame index, or runs `prepare` when given. */
export class FakeFrameProcessor implements FrameProcessor {
  public readonly tasks: FramePreparationTask[] = [];

  public destroyed = false;

  public constructor(
    private readonly prepare: (task: FramePreparationTask) => Promise<PixelBuffer>,
    public readonly concurrency = 1,
  ) {}

  public async process(task: FramePreparationTask): Promise<PixelBuffer> {
    this.tasks.push(task);
    return this.prepare(task);
  }

  public async destroy(): Promise<void> {
    this.destroyed = true;
  }
}

/** Records frames and returns their dimensions joined as the output bytes. */
export class RecordingEncoder implements AnimationEncoder {
  public readonly format = 'gif' as const;

  public readonly mimeType = 'image/gif';

  public readonly frames: PixelBuffer[] = [];

  public aborted = false;

  public constructor(
    public readonly options: AnimationEncoderOptions,
    private readonly failAt: number | null = null,
  ) {}

  public async addFrame(frame: PixelBuffer): Promise<void> {
    if (this.frames.length === this.failAt) {
      throw new Error('quantizer exploded');
    }
    this.frames.push(frame);
  }

  public async finish(): Promise<Buffer> {
    return Buffer.from(this.frames.map((frame) => `${frame.width}x${frame.height}`).join(','), 'utf8');
  }

  public abort(): void {
    this.aborted = true;
  }
}
