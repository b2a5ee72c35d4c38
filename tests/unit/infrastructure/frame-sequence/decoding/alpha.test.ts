import { describe, expect, it } from 'vitest';

import { BLACK, WHITE } from '@domain/frame-sequence/index.js';
import { flattenRgba, toArrayBuffer } from '@/infrastructure/frame-sequence/decoding/alpha.js';

describe('flattenRgba', () => {
  it('composites half transparent red onto white', () => {
    const output = flattenRgba(new Uint8Array([255, 0, 0, 128]), 1, 1, WHITE);

    expect(Array.from(output.data)).toEqual([255, 127, 127]);
  });

  it('opaque pixels pass through and transparent ones take the background', () => {
    const rgba = new Uint8ClampedArray([10, 20, 30, 255, 200, 100, 50, 0]);
    const output = flattenRgba(rgba, 2, 1, BLACK);

    expect(Array.from(output.data)).toEqual([10, 20, 30, 0, 0, 0]);
  });

  it('rejects short input', () => {
    expect(() => flattenRgba(new Uint8Array(4), 2, 1, WHITE)).toThrowError(RangeError);
  });
});

describe('toArrayBuffer', () => {
  it('copies only the viewed bytes', () => {
    const backing = new Uint8Array([1, 2, 3, 4, 5]);
    const copy = toArrayBuffer(backing.subarray(1, 4));

    expect(Array.from(new Uint8Array(copy))).toEqual([2, 3, 4]);
  });
});
