import type { PixelBuffer } from '../value-objects/pixel-buffer.js';

export interface FramePreviewer {
  /** Canonical buffer of `source` shrunk to fit a `maxDimension` square; never enlarged. */
  preview(source: string, maxDimension: number): Promise<PixelBuffer>;
}
