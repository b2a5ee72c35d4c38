export const RGB_CHANNELS = 3;

/**
 * Canonical decoded image: opaque, 8-bit, interleaved RGB.
 */
export interface PixelBuffer {
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export interface RgbColor {
  readonly r: number;
  readonly g: number;
  readonly b: number;
}

export const WHITE: RgbColor = { r: 255, g: 255, b: 255 };

export const BLACK: RgbColor = { r: 0, g: 0, b: 0 };

export function createPixelBuffer(width: number, height: number, data?: Uint8Array): PixelBuffer {
  const expected = width * height * RGB_CHANNELS;

  if (data && data.length !== expected) {
    throw new RangeError(`Expected ${expected} bytes for a ${width}x${height} RGB buffer, received ${data.length}`);
  }

  return { width, height, data: data ?? new Uint8Array(expected) };
}

export function fillPixelBuffer(width: number, height: number, color: RgbColor): PixelBuffer {
  const buffer = createPixelBuffer(width, height);

  for (let index = 0; index < buffer.data.length; index += RGB_CHANNELS) {
    buffer.data[index] = color.r;
    buffer.data[index + 1] = color.g;
    buffer.data[index + 2] = color.b;
  }

  return buffer;
}
