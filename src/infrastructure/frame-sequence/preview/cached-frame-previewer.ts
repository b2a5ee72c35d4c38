import type { FramePreviewer, PixelBuffer, SourceDecoder } from '@domain/frame-sequence/index.js';

import { MemoryCache } from '../cache/memory-cache.js';
import { resizeToFit } from '../resampling/resampler.js';

const KEY_SEPARATOR = '\u0000';

export class CachedFramePreviewer implements FramePreviewer {
  private readonly cache: MemoryCache<PixelBuffer>;

  public constructor(
    private readonly decoder: SourceDecoder,
    options: { maxEntries: number },
  ) {
    this.cache = new MemoryCache<PixelBuffer>({ maxEntries: options.maxEntries });
  }

  public async preview(source: string, maxDimension: number): Promise<PixelBuffer> {
    const key = `${source}${KEY_SEPARATOR}${maxDimension}`;
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const canonical = await this.decoder.decode(source);
    const scaled = resizeToFit(canonical, maxDimension);
    this.cache.set(key, scaled);
    return scaled;
  }
}
