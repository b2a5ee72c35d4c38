import type { PixelBuffer, SourceDecoder } from '@domain/frame-sequence/index.js';

import { createChildLogger } from '@/shared/logger/pino.js';

import { MemoryCache } from '../cache/memory-cache.js';

/**
 * Keeps canonical buffers of recently used sources so playback previews and
 * repeated exports do not decode the same file twice.
 */
export class CachedSourceDecoder implements SourceDecoder {
  private readonly logger = createChildLogger({ module: 'CachedSourceDecoder' });

  private readonly cache: MemoryCache<PixelBuffer>;

  private readonly pending = new Map<string, Promise<PixelBuffer>>();

  public constructor(
    private readonly inner: SourceDecoder,
    options: { maxEntries: number },
  ) {
    this.cache = new MemoryCache<PixelBuffer>({ maxEntries: options.maxEntries });
  }

  public async decode(source: string): Promise<PixelBuffer> {
    const cached = this.cache.get(source);
    if (cached) {
      this.logger.debug({ source }, 'Returning cached canonical buffer');
      return cached;
    }

    const inFlight = this.pending.get(source);
    if (inFlight) {
      return inFlight;
    }

    const decoding = this.inner
      .decode(source)
      .then((buffer) => {
        this.cache.set(source, buffer);
        return buffer;
      })
      .finally(() => {
        this.pending.delete(source);
      });

    this.pending.set(source, decoding);
    return decoding;
  }
}
