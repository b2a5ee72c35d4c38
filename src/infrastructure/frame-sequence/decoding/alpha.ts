import {
  createPixelBuffer,
  type PixelBuffer,
  RGB_CHANNELS,
  type RgbColor,
} from '@domain/frame-sequence/index.js';

const RGBA_CHANNELS = 4;

/**
 * Composites straight-alpha RGBA onto an opaque background and drops alpha.
 */
export function flattenRgba(
  rgba: Uint8Array | Uint8ClampedArray,
  width: number,
  height: number,
  background: RgbColor,
): PixelBuffer {
  const pixelCount = width * height;

  if (rgba.length < pixelCount * RGBA_CHANNELS) {
    throw new RangeError(`RGBA data holds ${rgba.length} bytes, expected ${pixelCount * RGBA_CHANNELS}`);
  }

  const output = createPixelBuffer(width, height);

  for (let pixel = 0; pixel < pixelCount; pixel += 1) {
    const source = pixel * RGBA_CHANNELS;
    const target = pixel * RGB_CHANNELS;
    const alpha = rgba[source + 3] ?? 255;

    if (alpha === 255) {
      output.data[target] = rgba[source] ?? 0;
      output.data[target + 1] = rgba[source + 1] ?? 0;
      output.data[target + 2] = rgba[source + 2] ?? 0;
      continue;
    }

    const inverse = 255 - alpha;
    output.data[target] = Math.round(((rgba[source] ?? 0) * alpha + background.r * inverse) / 255);
    output.data[target + 1] = Math.round(((rgba[source + 1] ?? 0) * alpha + background.g * inverse) / 255);
    output.data[target + 2] = Math.round(((rgba[source + 2] ?? 0) * alpha + background.b * inverse) / 255);
  }

  return output;
}

export function toArrayBuffer(buffer: Uint8Array): ArrayBuffer {
  const copy = new ArrayBuffer(buffer.byteLength);
  new Uint8Array(copy).set(buffer);
  return copy;
}
