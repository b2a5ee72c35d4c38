import fs from 'node:fs/promises';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BLACK, WHITE } from '@domain/frame-sequence/index.js';
import { FileSourceDecoder } from '@/infrastructure/frame-sequence/decoding/file-source-decoder.js';
import { GifAnimationEncoder } from '@/infrastructure/frame-sequence/encoding/gif-animation-encoder.js';
import { DecodeError } from '@/shared/errors/compositor-errors.js';

import { solid } from '../../../../helpers/frames.js';
import { createTempDir, removeTempDir, writePng } from '../../../../helpers/temp-dir.js';

let dir: string;

beforeEach(async () => {
  dir = await createTempDir();
});

afterEach(async () => {
  await removeTempDir(dir);
});

describe('FileSourceDecoder', () => {
  it('decodes PNG and flattens alpha onto white', async () => {
    const file = await writePng(path.join(dir, 'frame.png'), 2, 1, [
      [255, 0, 0, 128],
      [0, 0, 255, 255],
    ]);

    const buffer = await new FileSourceDecoder().decode(file);

    expect(buffer.width).toBe(2);
    expect(buffer.height).toBe(1);
    expect(Array.from(buffer.data)).toEqual([255, 127, 127, 0, 0, 255]);
  });

  it('uses the configured background colour', async () => {
    const file = await writePng(path.join(dir, 'clear.png'), 1, 1, [[90, 90, 90, 0]]);

    const buffer = await new FileSourceDecoder({ background: BLACK }).decode(file);

    expect(Array.from(buffer.data)).toEqual([0, 0, 0]);
  });

  it('decodes the first frame of a GIF on its logical screen', async () => {
    const encoder = new GifAnimationEncoder({
      width: 3,
      height: 2,
      delayMs: 100,
      loopCount: 0,
      quality: 85,
      optimize: false,
      background: WHITE,
    });
    await encoder.addFrame(solid(3, 2, WHITE));
    await encoder.addFrame(solid(3, 2, BLACK));
    const file = path.join(dir, 'loop.gif');
    await fs.writeFile(file, await encoder.finish());

    const buffer = await new FileSourceDecoder().decode(file);

    expect([buffer.width, buffer.height]).toEqual([3, 2]);
    expect(buffer.data.length).toBe(18);
  });

  it('rejects unsupported extensions', async () => {
    await expect(new FileSourceDecoder().decode(path.join(dir, 'notes.txt'))).rejects.toBeInstanceOf(DecodeError);
  });

  it('rejects missing files', async () => {
    await expect(new FileSourceDecoder().decode(path.join(dir, 'missing.png'))).rejects.toMatchObject({
      code: 'decode.failed',
      source: path.join(dir, 'missing.png'),
    });
  });

  it('rejects corrupt data', async () => {
    const file = path.join(dir, 'broken.png');
    await fs.writeFile(file, 'definitely not a png');

    await expect(new FileSourceDecoder().decode(file)).rejects.toBeInstanceOf(DecodeError);
  });
});
