import { describe, expect, it } from 'vitest';

import { MemoryCache } from '@/infrastructure/frame-sequence/cache/memory-cache.js';

import { solid } from '../../../../helpers/frames.js';

describe('MemoryCache', () => {
  it('returns the stored value itself', () => {
    const cache = new MemoryCache<ReturnType<typeof solid>>({ maxEntries: 2 });
    const frame = solid(2, 2, { r: 1, g: 2, b: 3 });

    cache.set('/frames/a.png', frame);

    expect(cache.get('/frames/a.png')).toBe(frame);
    expect(cache.get('/frames/missing.png')).toBeUndefined();
  });

  it('evicts the least recently used entry past its capacity', () => {
    const cache = new MemoryCache<{ readonly label: string }>({ maxEntries: 2 });

    cache.set('a', { label: 'a' });
    cache.set('b', { label: 'b' });
    expect(cache.get('a')).toEqual({ label: 'a' });
    cache.set('c', { label: 'c' });

    expect(cache.get('b')).toBeUndefined();
    expect(cache.get('a')).toEqual({ label: 'a' });
    expect(cache.get('c')).toEqual({ label: 'c' });
  });
});
