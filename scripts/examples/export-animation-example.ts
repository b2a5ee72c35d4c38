import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { PNG } from 'pngjs';

import { createFrameSequenceController, loadConfig } from '../../src/index.js';
import { logger } from '../../src/shared/logger/pino.js';

const OUTPUT_DIR = path.resolve('example-output');
const FRAME_COUNT = 12;
const SIZE = 96;

async function writeGradientFrames(): Promise<string[]> {
  await mkdir(OUTPUT_DIR, { recursive: true });

  const paths: string[] = [];
  for (let frame = 0; frame < FRAME_COUNT; frame += 1) {
    const png = new PNG({ width: SIZE, height: SIZE });
    const hue = Math.round((frame / FRAME_COUNT) * 255);

    for (let y = 0; y < SIZE; y += 1) {
      for (let x = 0; x < SIZE; x += 1) {
        const index = (y * SIZE + x) * 4;
        png.data[index] = hue;
        png.data[index + 1] = Math.round((x / SIZE) * 255);
        png.data[index + 2] = Math.round((y / SIZE) * 255);
        png.data[index + 3] = 255;
      }
    }

    const framePath = path.join(OUTPUT_DIR, `frame-${String(frame).padStart(2, '0')}.png`);
    await writeFile(framePath, PNG.sync.write(png));
    paths.push(framePath);
  }

  return paths;
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger.level = config.logLevel;

  const controller = createFrameSequenceController({ config });

  try {
    await controller.addFrames(await writeGradientFrames());
    controller.setFps(12);

    const gif = await controller.export(path.join(OUTPUT_DIR, 'gradient.gif'));
    controller.setFormat('webp');
    const webp = await controller.export(path.join(OUTPUT_DIR, 'gradient.webp'));

    logger.info({ gif: gif.metrics, webp: webp.metrics }, 'Export metrics');
  } finally {
    await controller.close();
  }
}

main().catch((error: unknown) => {
  logger.error({ error }, 'Failed to export sample animation');
  process.exitCode = 1;
});
