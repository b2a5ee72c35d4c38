import { describe, expect, it, vi } from 'vitest';

import type { PixelBuffer, SourceDecoder } from '@domain/frame-sequence/index.js';
import { CachedSourceDecoder } from '@/infrastructure/frame-sequence/decoding/cached-source-decoder.js';

import { solid } from '../../../../helpers/frames.js';

describe('CachedSourceDecoder', () => {
  it('shares one decode between concurrent and later requests', async () => {
    const buffer = solid(2, 2, { r: 1, g: 1, b: 1 });
    const decode = vi.fn<(source: string) => Promise<PixelBuffer>>(async () => buffer);
    const cached = new CachedSourceDecoder({ decode }, { maxEntries: 4 });

    const [first, second] = await Promise.all([cached.decode('a.png'), cached.decode('a.png')]);
    const third = await cached.decode('a.png');

    expect(decode).toHaveBeenCalledTimes(1);
    expect(first).toBe(buffer);
    expect(second).toBe(buffer);
    expect(third).toBe(buffer);
  });

  it('does not cache failures', async () => {
    const buffer = solid(1, 1, { r: 0, g: 0, b: 0 });
    const decode = vi
      .fn<(source: string) => Promise<PixelBuffer>>()
      .mockRejectedValueOnce(new Error('busy'))
      .mockResolvedValueOnce(buffer);
    const inner: SourceDecoder = { decode };
    const cached = new CachedSourceDecoder(inner, { maxEntries: 4 });

    await expect(cached.decode('a.png')).rejects.toThrowError('busy');
    await expect(cached.decode('a.png')).resolves.toBe(buffer);
    expect(decode).toHaveBeenCalledTimes(2);
  });

  it('evicts the least recently used source', async () => {
    const decode = vi.fn<(source: string) => Promise<PixelBuffer>>(async () => solid(1, 1, { r: 0, g: 0, b: 0 }));
    const cached = new CachedSourceDecoder({ decode }, { maxEntries: 2 });

    await cached.decode('a.png');
    await cached.decode('b.png');
    await cached.decode('a.png');
    await cached.decode('c.png');
    await cached.decode('a.png');
    await cached.decode('b.png');

    expect(decode.mock.calls.map(([source]) => source)).toEqual(['a.png', 'b.png', 'c.png', 'b.png']);
  });
});
