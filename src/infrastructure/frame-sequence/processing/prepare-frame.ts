import type { FramePreparationTask, PixelBuffer, SourceDecoder } from '@domain/frame-sequence/index.js';

import { resize } from '../resampling/resampler.js';

export async function prepareFrame(decoder: SourceDecoder, task: FramePreparationTask): Promise<PixelBuffer> {
  const canonical = await decoder.decode(task.source);
  return resize(canonical, { resolution: task.resolution, optimize: task.optimize });
}
