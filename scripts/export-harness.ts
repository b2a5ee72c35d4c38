import path from 'node:path';

import { createFrameSequenceController, type OutputFormat } from '../src/index.js';
import { logger } from '../src/shared/logger/pino.js';

interface HarnessOptions {
  inputs: string[];
  output: string;
  fps: number;
  format: OutputFormat;
  height: number | null;
  quality: number;
  loopCount: number;
  optimize: boolean;
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  const controller = createFrameSequenceController();

  try {
    await controller.addFrames(options.inputs.map((input) => path.resolve(input)));
    controller.setFps(options.fps);
    controller.setFormat(options.format);
    controller.setQuality(options.quality);
    controller.setLoopCount(options.loopCount);
    controller.setOptimize(options.optimize);
    controller.setResolution(options.height === null ? { kind: 'original' } : { kind: 'height', height: options.height });

    const outcome = await controller.export(options.output, {
      onProgress: (progress) => {
        logger.info(progress, 'Export progress');
      },
    });

    logger.info({ result: outcome.result, metrics: outcome.metrics }, 'Export finished');
  } finally {
    await controller.close();
  }
}

function parseArgs(argv: string[]): HarnessOptions {
  const options: HarnessOptions = {
    inputs: [],
    output: '',
    fps: 24,
    format: 'gif',
    height: null,
    quality: 85,
    loopCount: 0,
    optimize: true,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i] ?? '';
    const next = argv[i + 1] ?? '';

    if (!arg.startsWith('--')) {
      options.inputs.push(arg);
      continue;
    }

    switch (arg) {
      case '--out':
        options.output = next;
        i += 1;
        break;
      case '--fps':
        options.fps = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--format':
        if (next !== 'gif' && next !== 'webp') {
          throw new Error(`Unknown format: ${next}`);
        }
        options.format = next;
        i += 1;
        break;
      case '--height':
        options.height = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--quality':
        options.quality = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--loop':
        options.loopCount = Number.parseInt(next, 10);
        i += 1;
        break;
      case '--no-optimize':
        options.optimize = false;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  if (options.inputs.length === 0 || !options.output) {
    throw new Error(
      'Usage: npm run export:frames -- <frame>... --out <file> [--fps 24] [--format gif|webp] [--height 720] [--quality 85] [--loop 0] [--no-optimize]',
    );
  }

  return options;
}

main().catch((error: unknown) => {
  logger.fatal({ error }, '[export-harness] fatal');
  process.exitCode = 1;
});
