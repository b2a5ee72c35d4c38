import { applyPalette, type GifEncoderStream, GIFEncoder, type PixelFormat, quantize } from 'gifenc';

import type {
  AnimationEncoder,
  AnimationEncoderOptions,
  PixelBuffer,
} from '@domain/frame-sequence/index.js';

import { clamp } from '@/shared/media/numberUtils.js';

import { composeOnScreen } from './logical-screen.js';

const PALETTE_MIN_COLORS = 2;
const PALETTE_MAX_COLORS = 256;
const PIXEL_FORMAT: PixelFormat = 'rgb565';

/** Maps quality 1-100 onto the per-frame palette size, 2 to 256 colours. */
export function gifPaletteSize(quality: number): number {
  const span = PALETTE_MAX_COLORS - PALETTE_MIN_COLORS;
  const size = PALETTE_MIN_COLORS + ((quality - 1) * span) / 99;
  return clamp(Math.round(size), PALETTE_MIN_COLORS, PALETTE_MAX_COLORS);
}

/**
 * Quantises every frame to its own palette (global for the first frame, local
 * after that) and writes the NETSCAPE loop extension with the first frame.
 */
export class GifAnimationEncoder implements AnimationEncoder {
  public readonly format = 'gif' as const;

  public readonly mimeType = 'image/gif';

  private readonly stream: GifEncoderStream = GIFEncoder();

  private readonly colors: number;

  private aborted = false;

  public constructor(private readonly options: AnimationEncoderOptions) {
    this.colors = options.optimize ? gifPaletteSize(options.quality) : PALETTE_MAX_COLORS;
  }

  public async addFrame(frame: PixelBuffer): Promise<void> {
    if (this.aborted) {
      throw new Error('GIF encoder was aborted');
    }

    const rgba = composeOnScreen(frame, this.options, this.options.background);
    const palette = quantize(rgba, this.colors, { format: PIXEL_FORMAT });
    const indexed = applyPalette(rgba, palette, PIXEL_FORMAT);

    this.stream.writeFrame(indexed, this.options.width, this.options.height, {
      palette,
      delay: this.options.delayMs,
      repeat: this.options.loopCount,
    });
  }

  public async finish(): Promise<Buffer> {
    if (this.aborted) {
      throw new Error('GIF encoder was aborted');
    }

    this.stream.finish();
    return Buffer.from(this.stream.bytes());
  }

  public abort(): void {
    this.aborted = true;
    this.stream.reset();
  }
}
