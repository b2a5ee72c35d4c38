import { CompositorError } from './base.error.js';

export class DecodeError extends CompositorError {
  public readonly source: string;

  public constructor(source: string, cause: unknown, frameIndex?: number) {
    super({
      code: 'decode.failed',
      message: `Unable to decode source ${source}: ${describeCause(cause)}`,
      metadata: frameIndex === undefined ? { source } : { source, frameIndex },
      cause,
      exposeMessage: true,
    });
    this.source = source;
  }

  public get frameIndex(): number | undefined {
    const value = this.metadata.frameIndex;
    return typeof value === 'number' ? value : undefined;
  }

  public static unsupportedExtension(source: string, supported: readonly string[]): DecodeError {
    return new DecodeError(source, new Error(`Unsupported file extension (supported: ${supported.join(', ')})`));
  }

  public atFrame(frameIndex: number): DecodeError {
    return new DecodeError(this.source, this.cause, frameIndex);
  }
}

export class ResizeError extends CompositorError {
  public constructor(width: number, height: number, reason: string) {
    super({
      code: 'resize.degenerate-dimensions',
      message: `Cannot resize to ${width}x${height}: ${reason}`,
      metadata: { width, height },
      exposeMessage: true,
    });
  }
}

export class EncodeError extends CompositorError {
  public readonly frameIndex: number;

  public constructor(frameIndex: number, cause: unknown) {
    super({
      code: 'encode.failed',
      message: `Encoding failed at frame ${frameIndex}: ${describeCause(cause)}`,
      metadata: { frameIndex },
      cause,
      exposeMessage: true,
    });
    this.frameIndex = frameIndex;
  }
}

export class IndexError extends CompositorError {
  public readonly index: number;

  public constructor(index: number, length: number) {
    super({
      code: 'frames.index-out-of-range',
      message: `Frame index ${index} is out of range for ${length} frame(s)`,
      metadata: { index, length },
      exposeMessage: true,
    });
    this.index = index;
  }
}

export class EmptyProjectError extends CompositorError {
  public constructor() {
    super({
      code: 'export.empty-project',
      message: 'Cannot export a project without frames',
      exposeMessage: true,
    });
  }
}

export class CancelledError extends CompositorError {
  public constructor(processedFrames: number, totalFrames: number) {
    super({
      code: 'export.cancelled',
      message: 'Export was cancelled',
      metadata: { processedFrames, totalFrames },
      exposeMessage: true,
    });
  }
}

export class ProjectLockedError extends CompositorError {
  public constructor(operation: string) {
    super({
      code: 'project.locked',
      message: `Cannot ${operation} while an export is running`,
      metadata: { operation },
      exposeMessage: true,
    });
  }
}

/**
 * Not thrown: undo/redo report it as the `reason` of a result that was not applied.
 */
export const HISTORY_UNDERFLOW = 'history.underflow';

function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }

  return typeof cause === 'string' ? cause : 'unknown cause';
}
