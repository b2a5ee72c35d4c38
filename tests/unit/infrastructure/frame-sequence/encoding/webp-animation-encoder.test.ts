import { describe, expect, it, vi } from 'vitest';

import { WHITE } from '@domain/frame-sequence/index.js';
import {
  type StillWebpEncoder,
  WebpAnimationEncoder,
} from '@/infrastructure/frame-sequence/encoding/webp-animation-encoder.js';

import { solid } from '../../../../helpers/frames.js';

function fakeStill(marker: number): Buffer {
  const still = Buffer.alloc(12 + 8 + 2);
  still.write('RIFF', 0, 'ascii');
  still.writeUInt32LE(still.length - 8, 4);
  still.write('WEBP', 8, 'ascii');
  still.write('VP8L', 12, 'ascii');
  still.writeUInt32LE(2, 16);
  still[20] = marker;
  still[21] = marker;
  return still;
}

describe('WebpAnimationEncoder', () => {
  it('encodes each frame as a still at the configured quality and muxes them', async () => {
    const encodeStill = vi.fn<StillWebpEncoder>(async () => fakeStill(7));
    const encoder = new WebpAnimationEncoder(
      { width: 3, height: 2, delayMs: 33, loopCount: 2, quality: 60, optimize: true, background: WHITE },
      encodeStill,
    );

    await encoder.addFrame(solid(3, 2, { r: 1, g: 2, b: 3 }));
    await encoder.addFrame(solid(1, 2, { r: 9, g: 9, b: 9 }));
    const animation = await encoder.finish();

    expect(encodeStill).toHaveBeenCalledTimes(2);
    const [firstRgba, width, height, quality] = encodeStill.mock.calls[0];
    expect([width, height, quality]).toEqual([3, 2, 60]);
    expect(Array.from(firstRgba.subarray(0, 4))).toEqual([1, 2, 3, 255]);

    const [secondRgba] = encodeStill.mock.calls[1];
    expect(Array.from(secondRgba.subarray(0, 12))).toEqual([255, 255, 255, 255, 9, 9, 9, 255, 255, 255, 255, 255]);

    expect(encoder.mimeType).toBe('image/webp');
    expect(animation.toString('ascii', 0, 4)).toBe('RIFF');
    expect(animation.readUInt16LE(42)).toBe(2);
    expect(animation.toString('ascii', 44, 48)).toBe('ANMF');
    expect(animation.readUIntLE(64, 3)).toBe(33);
  });

  it('surfaces still encoder failures', async () => {
    const encoder = new WebpAnimationEncoder(
      { width: 1, height: 1, delayMs: 42, loopCount: 0, quality: 85, optimize: false, background: WHITE },
      async () => Buffer.from('broken'),
    );

    await expect(encoder.addFrame(solid(1, 1, WHITE))).rejects.toThrowError('not a RIFF/WebP file');
  });
});
