import type { PixelBuffer } from '../value-objects/pixel-buffer.js';
import type { ResolutionTarget } from '../value-objects/project-settings.js';

export interface FramePreparationTask {
  readonly index: number;
  readonly source: string;
  readonly resolution: ResolutionTarget;
  readonly optimize: boolean;
}

/**
 * Decodes and resamples one frame. Implementations may run several tasks at
 * once; `concurrency` tells callers how many to keep in flight.
 */
export interface FrameProcessor {
  readonly concurrency: number;
  process(task: FramePreparationTask): Promise<PixelBuffer>;
  destroy(): Promise<void>;
}
