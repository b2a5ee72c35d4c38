import { createCanvas, ImageData } from '@napi-rs/canvas';

import type {
  AnimationEncoder,
  AnimationEncoderOptions,
  PixelBuffer,
} from '@domain/frame-sequence/index.js';

import { composeOnScreen } from './logical-screen.js';
import { extractFrameChunks, muxAnimatedWebp } from './webp-muxer.js';

export type StillWebpEncoder = (rgba: Uint8ClampedArray, width: number, height: number, quality: number) => Promise<Buffer>;

export const encodeStillWithCanvas: StillWebpEncoder = async (rgba, width, height, quality) => {
  const canvas = createCanvas(width, height);
  const ctx = canvas.getContext('2d');
  ctx.putImageData(new ImageData(rgba, width, height), 0, 0);
  return canvas.encode('webp', quality);
};

/**
 * Encodes every frame as a lossy still at the configured quality and muxes the
 * bitstreams into one animated container on `finish`.
 */
export class WebpAnimationEncoder implements AnimationEncoder {
  public readonly format = 'webp' as const;

  public readonly mimeType = 'image/webp';

  private frames: Buffer[] = [];

  public constructor(
    private readonly options: AnimationEncoderOptions,
    private readonly encodeStill: StillWebpEncoder = encodeStillWithCanvas,
  ) {}

  public async addFrame(frame: PixelBuffer): Promise<void> {
    const { width, height, quality, background } = this.options;
    const rgba = composeOnScreen(frame, { width, height }, background);
    const still = await this.encodeStill(rgba, width, height, quality);
    this.frames.push(extractFrameChunks(still));
  }

  public async finish(): Promise<Buffer> {
    const { width, height, delayMs, loopCount, background } = this.options;
    return muxAnimatedWebp(this.frames, { width, height, durationMs: delayMs, loopCount, background });
  }

  public abort(): void {
    this.frames = [];
  }
}
