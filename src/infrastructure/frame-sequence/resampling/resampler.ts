import {
  createPixelBuffer,
  OPTIMIZE_MAX_DIMENSION,
  type PixelBuffer,
  type ResolutionTarget,
  RGB_CHANNELS,
} from '@domain/frame-sequence/index.js';

import { ResizeError } from '@/shared/errors/compositor-errors.js';
import { clampByte } from '@/shared/media/numberUtils.js';

const LANCZOS_LOBES = 3;

export interface ResizeOptions {
  readonly resolution: ResolutionTarget;
  readonly optimize: boolean;
}

export interface Dimensions {
  readonly width: number;
  readonly height: number;
}

interface Contribution {
  readonly start: number;
  readonly weights: Float64Array;
}

/**
 * Output size for a source under a resolution target and the optional
 * optimize cap. Width follows height so the aspect ratio holds to within one
 * pixel of rounding.
 */
export function computeTargetDimensions(width: number, height: number, options: ResizeOptions): Dimensions {
  if (width <= 0 || height <= 0) {
    throw new ResizeError(width, height, 'source has no pixels');
  }

  let targetWidth = width;
  let targetHeight = height;

  if (options.resolution.kind === 'height') {
    targetHeight = options.resolution.height;
    targetWidth = Math.round((targetHeight * width) / height);
  }

  if (targetWidth <= 0 || targetHeight <= 0) {
    throw new ResizeError(targetWidth, targetHeight, 'computed dimension is not positive');
  }

  return options.optimize
    ? fitDimensions(targetWidth, targetHeight, OPTIMIZE_MAX_DIMENSION)
    : { width: targetWidth, height: targetHeight };
}

/** Shrinks to fit a square box, never enlarges. */
export function fitDimensions(width: number, height: number, maxDimension: number): Dimensions {
  if (width <= maxDimension && height <= maxDimension) {
    return { width, height };
  }

  if (width >= height) {
    return { width: maxDimension, height: Math.max(1, Math.round((height * maxDimension) / width)) };
  }

  return { width: Math.max(1, Math.round((width * maxDimension) / height)), height: maxDimension };
}

export function resize(buffer: PixelBuffer, options: ResizeOptions): PixelBuffer {
  const { width, height } = computeTargetDimensions(buffer.width, buffer.height, options);
  return resampleLanczos(buffer, width, height);
}

export function resizeToFit(buffer: PixelBuffer, maxDimension: number): PixelBuffer {
  if (buffer.width <= 0 || buffer.height <= 0) {
    throw new ResizeError(buffer.width, buffer.height, 'source has no pixels');
  }

  const { width, height } = fitDimensions(buffer.width, buffer.height, maxDimension);
  return resampleLanczos(buffer, width, height);
}

/**
 * Separable Lanczos-3 resampling. The kernel is widened by the scale factor
 * when shrinking so every source pixel contributes.
 */
export function resampleLanczos(buffer: PixelBuffer, width: number, height: number): PixelBuffer {
  if (width <= 0 || height <= 0) {
    throw new ResizeError(width, height, 'computed dimension is not positive');
  }

  if (width === buffer.width && height === buffer.height) {
    return createPixelBuffer(width, height, new Uint8Array(buffer.data));
  }

  const horizontal = computeContributions(buffer.width, width);
  const vertical = computeContributions(buffer.height, height);

  const intermediate = new Float32Array(width * buffer.height * RGB_CHANNELS);
  for (let y = 0; y < buffer.height; y += 1) {
    const rowOffset = y * buffer.width;
    for (let x = 0; x < width; x += 1) {
      const contribution = horizontal[x];
      if (!contribution) {
        continue;
      }

      let r = 0;
      let g = 0;
      let b = 0;
      for (let tap = 0; tap < contribution.weights.length; tap += 1) {
        const weight = contribution.weights[tap] ?? 0;
        const sourceIndex = (rowOffset + contribution.start + tap) * RGB_CHANNELS;
        r += (buffer.data[sourceIndex] ?? 0) * weight;
        g += (buffer.data[sourceIndex + 1] ?? 0) * weight;
        b += (buffer.data[sourceIndex + 2] ?? 0) * weight;
      }

      const targetIndex = (y * width + x) * RGB_CHANNELS;
      intermediate[targetIndex] = r;
      intermediate[targetIndex + 1] = g;
      intermediate[targetIndex + 2] = b;
    }
  }

  const output = createPixelBuffer(width, height);
  for (let y = 0; y < height; y += 1) {
    const contribution = vertical[y];
    if (!contribution) {
      continue;
    }

    for (let x = 0; x < width; x += 1) {
      let r = 0;
      let g = 0;
      let b = 0;
      for (let tap = 0; tap < contribution.weights.length; tap += 1) {
        const weight = contribution.weights[tap] ?? 0;
        const sourceIndex = ((contribution.start + tap) * width + x) * RGB_CHANNELS;
        r += (intermediate[sourceIndex] ?? 0) * weight;
        g += (intermediate[sourceIndex + 1] ?? 0) * weight;
        b += (intermediate[sourceIndex + 2] ?? 0) * weight;
      }

      const targetIndex = (y * width + x) * RGB_CHANNELS;
      output.data[targetIndex] = clampByte(r);
      output.data[targetIndex + 1] = clampByte(g);
      output.data[targetIndex + 2] = clampByte(b);
    }
  }

  return output;
}

function computeContributions(sourceSize: number, targetSize: number): Contribution[] {
  const scale = targetSize / sourceSize;
  const filterScale = Math.max(1, 1 / scale);
  const support = LANCZOS_LOBES * filterScale;
  const contributions: Contribution[] = [];

  for (let target = 0; target < targetSize; target += 1) {
    const center = (target + 0.5) / scale;
    const start = Math.max(0, Math.floor(center - support));
    const end = Math.min(sourceSize, Math.ceil(center + support));
    const weights = new Float64Array(Math.max(1, end - start));
    let total = 0;

    for (let source = start; source < end; source += 1) {
      const weight = lanczos((source + 0.5 - center) / filterScale);
      weights[source - start] = weight;
      total += weight;
    }

    if (total === 0) {
      const nearest = Math.min(sourceSize - 1, Math.max(0, Math.floor(center)));
      const single = new Float64Array(1);
      single[0] = 1;
      contributions.push({ start: nearest, weights: single });
      continue;
    }

    for (let index = 0; index < weights.length; index += 1) {
      weights[index] = (weights[index] ?? 0) / total;
    }

    contributions.push({ start, weights });
  }

  return contributions;
}

function lanczos(x: number): number {
  if (x === 0) {
    return 1;
  }

  if (Math.abs(x) >= LANCZOS_LOBES) {
    return 0;
  }

  const piX = Math.PI * x;
  return (LANCZOS_LOBES * Math.sin(piX) * Math.sin(piX / LANCZOS_LOBES)) / (piX * piX);
}
