import { promises as fs } from 'node:fs';

import { createCanvas, loadImage } from '@napi-rs/canvas';
import { decompressFrames, parseGIF, type ParsedFrame } from 'gifuct-js';
import { PNG } from 'pngjs';

import {
  detectSourceKind,
  SUPPORTED_EXTENSIONS,
  type PixelBuffer,
  type RgbColor,
  type SourceDecoder,
  type SourceKind,
  WHITE,
} from '@domain/frame-sequence/index.js';

import { DecodeError } from '@/shared/errors/compositor-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { flattenRgba, toArrayBuffer } from './alpha.js';
import { developRawSensorImage, readRawSensorImage } from './raw-sensor.js';

export interface FileSourceDecoderOptions {
  /** Colour transparent pixels are flattened onto. */
  readonly background?: RgbColor;
}

/**
 * Reads a source from disk and decodes it into an opaque RGB buffer. PNG goes
 * through pngjs, GIF through gifuct-js (first frame only), JPEG and BMP through
 * the canvas image loader and DNG through the raw-sensor pipeline.
 */
export class FileSourceDecoder implements SourceDecoder {
  private readonly logger = createChildLogger({ module: 'FileSourceDecoder' });

  private readonly background: RgbColor;

  public constructor(options: FileSourceDecoderOptions = {}) {
    this.background = options.background ?? WHITE;
  }

  public async decode(source: string): Promise<PixelBuffer> {
    const kind = detectSourceKind(source);
    if (!kind) {
      throw DecodeError.unsupportedExtension(source, SUPPORTED_EXTENSIONS);
    }

    let file: Buffer;
    try {
      file = await fs.readFile(source);
    } catch (error) {
      throw new DecodeError(source, error);
    }

    try {
      const buffer = await this.decodeBuffer(kind, file);
      this.logger.debug({ source, width: buffer.width, height: buffer.height }, 'Decoded source');
      return buffer;
    } catch (error) {
      throw new DecodeError(source, error);
    }
  }

  private async decodeBuffer(kind: SourceKind, file: Buffer): Promise<PixelBuffer> {
    switch (kind) {
      case 'png': {
        const png = PNG.sync.read(file);
        return flattenRgba(png.data, png.width, png.height, this.background);
      }
      case 'gif': {
        return this.decodeGifStill(file);
      }
      case 'jpeg':
      case 'bmp': {
        return this.decodeWithCanvas(file);
      }
      case 'dng': {
        return developRawSensorImage(readRawSensorImage(file));
      }
      default: {
        const exhaustive: never = kind;
        throw new Error(`Unsupported source kind ${String(exhaustive)}`);
      }
    }
  }

  private decodeGifStill(file: Buffer): PixelBuffer {
    const gif = parseGIF(toArrayBuffer(file));
    const frames = decompressFrames(gif, true);
    const first = frames[0];

    if (!first) {
      throw new Error('GIF contains no frames');
    }

    const { width, height } = gif.lsd;
    if (width <= 0 || height <= 0) {
      throw new Error(`GIF has invalid logical screen ${width}x${height}`);
    }

    const screen = new Uint8ClampedArray(width * height * 4);
    compositePatch(screen, first.patch, first.dims, width, height);
    return flattenRgba(screen, width, height, this.background);
  }

  private async decodeWithCanvas(file: Buffer): Promise<PixelBuffer> {
    const image = await loadImage(file);
    if (image.width <= 0 || image.height <= 0) {
      throw new Error('Image has no pixels');
    }

    const canvas = createCanvas(image.width, image.height);
    const ctx = canvas.getContext('2d');
    ctx.drawImage(image, 0, 0);
    const imageData = ctx.getImageData(0, 0, image.width, image.height);
    return flattenRgba(imageData.data, image.width, image.height, this.background);
  }
}

function compositePatch(
  destination: Uint8ClampedArray,
  patch: Uint8ClampedArray,
  dims: ParsedFrame['dims'],
  width: number,
  height: number,
): void {
  const { top, left, width: patchWidth, height: patchHeight } = dims;

  for (let y = 0; y < patchHeight; y += 1) {
    const destY = top + y;
    if (destY >= height) {
      break;
    }

    for (let x = 0; x < patchWidth; x += 1) {
      const destX = left + x;
      const patchIndex = (y * patchWidth + x) * 4;
      const alpha = patch[patchIndex + 3] ?? 0;
      if (destX >= width || alpha === 0) {
        continue;
      }

      const destIndex = (destY * width + destX) * 4;
      destination[destIndex] = patch[patchIndex] ?? 0;
      destination[destIndex + 1] = patch[patchIndex + 1] ?? 0;
      destination[destIndex + 2] = patch[patchIndex + 2] ?? 0;
      destination[destIndex + 3] = alpha;
    }
  }
}
