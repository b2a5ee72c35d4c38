import type { AnimationEncoder, AnimationEncoderFactory } from '@domain/frame-sequence/index.js';

import { AppError } from '@/shared/errors/app-error.js';

import { GifAnimationEncoder } from './gif-animation-encoder.js';
import { WebpAnimationEncoder } from './webp-animation-encoder.js';

export const createAnimationEncoder: AnimationEncoderFactory = (format, options): AnimationEncoder => {
  switch (format) {
    case 'gif': {
      return new GifAnimationEncoder(options);
    }
    case 'webp': {
      return new WebpAnimationEncoder(options);
    }
    default: {
      const exhaustive: never = format;
      throw AppError.unsupported('export.unsupported-format', `Unsupported output format ${String(exhaustive)}`, {
        format: exhaustive,
      });
    }
  }
};
