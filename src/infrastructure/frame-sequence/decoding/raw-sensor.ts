import UTIF, { type IFD, type TagValue } from 'utif';

import { createPixelBuffer, type PixelBuffer, RGB_CHANNELS } from '@domain/frame-sequence/index.js';

import { clamp, clampByte } from '@/shared/media/numberUtils.js';

import { toArrayBuffer } from './alpha.js';

/** 0 = red, 1 = green, 2 = blue, as in the DNG CFAPattern tag. */
export type CfaColor = 0 | 1 | 2;

export interface RawSensorImage {
  readonly width: number;
  readonly height: number;
  /** One sample per photosite, row-major. */
  readonly samples: Uint16Array;
  /** 2x2 repeat pattern, row-major. */
  readonly cfaPattern: readonly CfaColor[];
  readonly blackLevel: number;
  readonly whiteLevel: number;
  /** Camera-neutral white in sensor RGB, as recorded by the camera. */
  readonly asShotNeutral: readonly [number, number, number];
}

const TAG_IMAGE_WIDTH = 't256';
const TAG_IMAGE_LENGTH = 't257';
const TAG_BITS_PER_SAMPLE = 't258';
const TAG_PHOTOMETRIC = 't262';
const TAG_SAMPLES_PER_PIXEL = 't277';
const TAG_CFA_REPEAT_DIM = 't33421';
const TAG_CFA_PATTERN = 't33422';
const TAG_BLACK_LEVEL = 't50714';
const TAG_WHITE_LEVEL = 't50717';
const TAG_AS_SHOT_NEUTRAL = 't50728';

const PHOTOMETRIC_CFA = 32803;
const DEFAULT_CFA: readonly CfaColor[] = [0, 1, 1, 2];

/**
 * Pulls the CFA image and its calibration tags out of a DNG. Container parsing
 * and strip/tile decompression are UTIF's.
 */
export function readRawSensorImage(file: Buffer): RawSensorImage {
  const arrayBuffer = toArrayBuffer(file);
  const ifds = UTIF.decode(arrayBuffer);
  const candidates = collectIfds(ifds);
  const raw = candidates.find((ifd) => firstNumber(ifd[TAG_PHOTOMETRIC]) === PHOTOMETRIC_CFA);

  if (!raw) {
    throw new Error('No CFA image found in raw container');
  }

  UTIF.decodeImage(arrayBuffer, raw, ifds);

  const width = raw.width ?? firstNumber(raw[TAG_IMAGE_WIDTH]) ?? 0;
  const height = raw.height ?? firstNumber(raw[TAG_IMAGE_LENGTH]) ?? 0;
  const bitsPerSample = firstNumber(raw[TAG_BITS_PER_SAMPLE]) ?? 16;
  const samplesPerPixel = firstNumber(raw[TAG_SAMPLES_PER_PIXEL]) ?? 1;

  if (width <= 0 || height <= 0) {
    throw new Error(`Raw image has invalid dimensions ${width}x${height}`);
  }

  if (samplesPerPixel !== 1) {
    throw new Error(`Expected one sample per photosite, found ${samplesPerPixel}`);
  }

  if (!raw.data) {
    throw new Error('Raw image data could not be decompressed');
  }

  const littleEndian = file[0] === 0x49;
  const samples = unpackSamples(raw.data, width, height, bitsPerSample, littleEndian);
  const main = ifds[0];

  return {
    width,
    height,
    samples,
    cfaPattern: readCfaPattern(raw),
    blackLevel: firstNumber(raw[TAG_BLACK_LEVEL]) ?? 0,
    whiteLevel: firstNumber(raw[TAG_WHITE_LEVEL]) ?? 2 ** bitsPerSample - 1,
    asShotNeutral: readNeutral(main?.[TAG_AS_SHOT_NEUTRAL] ?? raw[TAG_AS_SHOT_NEUTRAL]),
  };
}

/**
 * Normalises sensor levels, applies the recorded white balance, fills in the
 * two missing colours of every photosite from its 3x3 neighbourhood and encodes
 * the result with the sRGB transfer curve.
 */
export function developRawSensorImage(raw: RawSensorImage): PixelBuffer {
  const { width, height, samples, cfaPattern, blackLevel, whiteLevel } = raw;
  const pixelCount = width * height;

  if (samples.length < pixelCount) {
    throw new RangeError(`Raw image holds ${samples.length} samples, expected ${pixelCount}`);
  }

  const range = whiteLevel - blackLevel;
  if (range <= 0) {
    throw new RangeError(`White level ${whiteLevel} must exceed black level ${blackLevel}`);
  }

  const plane = new Float32Array(pixelCount);
  for (let index = 0; index < pixelCount; index += 1) {
    plane[index] = clamp(((samples[index] ?? 0) - blackLevel) / range, 0, 1);
  }

  const multipliers = whiteBalanceMultipliers(raw.asShotNeutral);
  const output = createPixelBuffer(width, height);

  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const index = y * width + x;
      const site = colorAt(cfaPattern, x, y);

      for (let channel = 0; channel < RGB_CHANNELS; channel += 1) {
        const value = site === channel
          ? plane[index] ?? 0
          : interpolateChannel(plane, cfaPattern, width, height, x, y, channel);
        output.data[index * RGB_CHANNELS + channel] = encodeSrgb(value * (multipliers[channel] ?? 1));
      }
    }
  }

  return output;
}

export function whiteBalanceMultipliers(neutral: readonly [number, number, number]): [number, number, number] {
  const [red, green, blue] = neutral;
  if (green <= 0) {
    return [1, 1, 1];
  }

  return [red > 0 ? green / red : 1, 1, blue > 0 ? green / blue : 1];
}

export function encodeSrgb(linear: number): number {
  const value = clamp(linear, 0, 1);
  const encoded = value <= 0.0031308 ? value * 12.92 : 1.055 * value ** (1 / 2.4) - 0.055;
  return clampByte(encoded * 255);
}

function interpolateChannel(
  plane: Float32Array,
  pattern: readonly CfaColor[],
  width: number,
  height: number,
  x: number,
  y: number,
  channel: number,
): number {
  let sum = 0;
  let count = 0;

  for (let dy = -1; dy <= 1; dy += 1) {
    const sampleY = y + dy;
    if (sampleY < 0 || sampleY >= height) {
      continue;
    }

    for (let dx = -1; dx <= 1; dx += 1) {
      const sampleX = x + dx;
      if ((dx === 0 && dy === 0) || sampleX < 0 || sampleX >= width) {
        continue;
      }

      if (colorAt(pattern, sampleX, sampleY) === channel) {
        sum += plane[sampleY * width + sampleX] ?? 0;
        count += 1;
      }
    }
  }

  return count > 0 ? sum / count : 0;
}

function colorAt(pattern: readonly CfaColor[], x: number, y: number): CfaColor {
  return pattern[(y % 2) * 2 + (x % 2)] ?? 1;
}

function unpackSamples(
  data: Uint8Array,
  width: number,
  height: number,
  bitsPerSample: number,
  littleEndian: boolean,
): Uint16Array {
  const count = width * height;
  const samples = new Uint16Array(count);

  if (bitsPerSample === 8) {
    if (data.length < count) {
      throw new RangeError('Raw image data is truncated');
    }
    samples.set(data.subarray(0, count));
    return samples;
  }

  if (bitsPerSample === 16) {
    if (data.length < count * 2) {
      throw new RangeError('Raw image data is truncated');
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    for (let index = 0; index < count; index += 1) {
      samples[index] = view.getUint16(index * 2, littleEndian);
    }
    return samples;
  }

  if (bitsPerSample > 8 && bitsPerSample < 16) {
    return unpackBitFields(data, width, height, bitsPerSample, samples);
  }

  throw new Error(`Unsupported raw bit depth ${bitsPerSample}`);
}

/** MSB-first bit fields; every row starts on a byte boundary. */
function unpackBitFields(
  data: Uint8Array,
  width: number,
  height: number,
  bitsPerSample: number,
  samples: Uint16Array,
): Uint16Array {
  const rowBytes = Math.ceil((width * bitsPerSample) / 8);
  if (data.length < rowBytes * height) {
    throw new RangeError('Raw image data is truncated');
  }

  const mask = (1 << bitsPerSample) - 1;
  for (let y = 0; y < height; y += 1) {
    let byteIndex = y * rowBytes;
    let accumulator = 0;
    let accumulatedBits = 0;

    for (let x = 0; x < width; x += 1) {
      while (accumulatedBits < bitsPerSample) {
        accumulator = (accumulator << 8) | (data[byteIndex] ?? 0);
        byteIndex += 1;
        accumulatedBits += 8;
      }

      accumulatedBits -= bitsPerSample;
      samples[y * width + x] = (accumulator >>> accumulatedBits) & mask;
      accumulator &= (1 << accumulatedBits) - 1;
    }
  }

  return samples;
}

function readCfaPattern(ifd: IFD): readonly CfaColor[] {
  const dims = numbersOf(ifd[TAG_CFA_REPEAT_DIM]);
  const pattern = numbersOf(ifd[TAG_CFA_PATTERN]);

  if (pattern.length === 0) {
    return DEFAULT_CFA;
  }

  if ((dims.length > 0 && (dims[0] !== 2 || dims[1] !== 2)) || pattern.length !== 4) {
    throw new Error(`Unsupported CFA layout ${dims.join('x')}`);
  }

  return pattern.map((value) => {
    if (!isCfaColor(value)) {
      throw new Error(`Unsupported CFA colour ${value}`);
    }
    return value;
  });
}

function isCfaColor(value: number): value is CfaColor {
  return value === 0 || value === 1 || value === 2;
}

function readNeutral(tag: TagValue | undefined): [number, number, number] {
  const values = numbersOf(tag);
  const [red, green, blue] = values;

  if (values.length < 3 || red === undefined || green === undefined || blue === undefined) {
    return [1, 1, 1];
  }

  return [red, green, blue];
}

function collectIfds(ifds: readonly IFD[]): IFD[] {
  return ifds.flatMap((ifd) => [ifd, ...collectIfds(ifd.subIFD ?? [])]);
}

function numbersOf(tag: TagValue | undefined): number[] {
  return (tag ?? []).filter((value): value is number => typeof value === 'number');
}

function firstNumber(tag: TagValue | undefined): number | undefined {
  return numbersOf(tag)[0];
}
