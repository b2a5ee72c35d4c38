import type { PixelBuffer, RgbColor } from '@domain/frame-sequence/index.js';

import { type Dimensions } from '../resampling/resampler.js';

/** Smallest screen every frame fits on. */
export function computeLogicalScreen(frames: readonly PixelBuffer[]): Dimensions {
  return frames.reduce<Dimensions>(
    (screen, frame) => ({
      width: Math.max(screen.width, frame.width),
      height: Math.max(screen.height, frame.height),
    }),
    { width: 0, height: 0 },
  );
}

/**
 * Places a frame in the middle of an opaque RGBA screen. Frames larger than the
 * screen are cropped around their centre.
 */
export function composeOnScreen(
  frame: PixelBuffer,
  screen: Dimensions,
  background: RgbColor,
): Uint8ClampedArray {
  const rgba = new Uint8ClampedArray(screen.width * screen.height * 4);

  for (let index = 0; index < rgba.length; index += 4) {
    rgba[index] = background.r;
    rgba[index + 1] = background.g;
    rgba[index + 2] = background.b;
    rgba[index + 3] = 255;
  }

  const offsetX = Math.floor((screen.width - frame.width) / 2);
  const offsetY = Math.floor((screen.height - frame.height) / 2);

  for (let y = 0; y < frame.height; y += 1) {
    const destY = y + offsetY;
    if (destY < 0 || destY >= screen.height) {
      continue;
    }

    for (let x = 0; x < frame.width; x += 1) {
      const destX = x + offsetX;
      if (destX < 0 || destX >= screen.width) {
        continue;
      }

      const source = (y * frame.width + x) * 3;
      const target = (destY * screen.width + destX) * 4;
      rgba[target] = frame.data[source] ?? 0;
      rgba[target + 1] = frame.data[source + 1] ?? 0;
      rgba[target + 2] = frame.data[source + 2] ?? 0;
    }
  }

  return rgba;
}
