import type { RgbColor } from '@domain/frame-sequence/index.js';

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const VP8X_PAYLOAD_SIZE = 10;
const ANIM_PAYLOAD_SIZE = 6;
const ANMF_HEADER_SIZE = 16;

const VP8X_FLAG_ANIMATION = 0x02;
/** Blending off: every frame fully replaces the canvas. */
const ANMF_FLAG_NO_BLEND = 0x02;

/** Durations and canvas sizes are 24-bit fields. */
export const MAX_WEBP_24BIT = 0xffffff;

const FRAME_CHUNKS = new Set(['ALPH', 'VP8 ', 'VP8L']);

export interface AnimatedWebpOptions {
  readonly width: number;
  readonly height: number;
  readonly durationMs: number;
  /** 0 loops forever. */
  readonly loopCount: number;
  readonly background: RgbColor;
}

/**
 * Returns the bitstream chunks (ALPH, VP8, VP8L) of a still WebP file, headers
 * and padding included, ready to be wrapped in an ANMF chunk.
 */
export function extractFrameChunks(still: Buffer): Buffer {
  if (
    still.length < RIFF_HEADER_SIZE ||
    still.toString('ascii', 0, 4) !== 'RIFF' ||
    still.toString('ascii', 8, 12) !== 'WEBP'
  ) {
    throw new Error('Still image is not a RIFF/WebP file');
  }

  const chunks: Buffer[] = [];
  let offset = RIFF_HEADER_SIZE;

  while (offset + CHUNK_HEADER_SIZE <= still.length) {
    const fourcc = still.toString('ascii', offset, offset + 4);
    const size = still.readUInt32LE(offset + 4);
    const paddedEnd = offset + CHUNK_HEADER_SIZE + size + (size % 2);

    if (offset + CHUNK_HEADER_SIZE + size > still.length) {
      throw new Error(`WebP chunk ${fourcc.trim()} overruns the file`);
    }

    if (FRAME_CHUNKS.has(fourcc)) {
      chunks.push(still.subarray(offset, Math.min(paddedEnd, still.length)));
    }

    offset = paddedEnd;
  }

  if (chunks.length === 0) {
    throw new Error('Still WebP holds no image bitstream');
  }

  return Buffer.concat(chunks);
}

export function muxAnimatedWebp(frames: readonly Buffer[], options: AnimatedWebpOptions): Buffer {
  const { width, height, durationMs, loopCount, background } = options;

  if (frames.length === 0) {
    throw new Error('Animated WebP needs at least one frame');
  }

  assertField('canvas width', width - 1);
  assertField('canvas height', height - 1);
  assertField('frame duration', durationMs);

  if (loopCount < 0 || loopCount > 0xffff) {
    throw new RangeError(`Loop count ${loopCount} does not fit in 16 bits`);
  }

  const vp8x = Buffer.alloc(VP8X_PAYLOAD_SIZE);
  vp8x.writeUInt8(VP8X_FLAG_ANIMATION, 0);
  vp8x.writeUIntLE(width - 1, 4, 3);
  vp8x.writeUIntLE(height - 1, 7, 3);

  const anim = Buffer.alloc(ANIM_PAYLOAD_SIZE);
  anim.writeUInt8(background.b, 0);
  anim.writeUInt8(background.g, 1);
  anim.writeUInt8(background.r, 2);
  anim.writeUInt8(255, 3);
  anim.writeUInt16LE(loopCount, 4);

  const body = [
    chunk('VP8X', vp8x),
    chunk('ANIM', anim),
    ...frames.map((frameChunks) => {
      const header = Buffer.alloc(ANMF_HEADER_SIZE);
      header.writeUIntLE(0, 0, 3);
      header.writeUIntLE(0, 3, 3);
      header.writeUIntLE(width - 1, 6, 3);
      header.writeUIntLE(height - 1, 9, 3);
      header.writeUIntLE(durationMs, 12, 3);
      header.writeUInt8(ANMF_FLAG_NO_BLEND, 15);
      return chunk('ANMF', Buffer.concat([header, frameChunks]));
    }),
  ];

  const payload = Buffer.concat(body);
  const riff = Buffer.alloc(RIFF_HEADER_SIZE);
  riff.write('RIFF', 0, 'ascii');
  riff.writeUInt32LE(payload.length + 4, 4);
  riff.write('WEBP', 8, 'ascii');

  return Buffer.concat([riff, payload]);
}

function chunk(fourcc: string, payload: Buffer): Buffer {
  const header = Buffer.alloc(CHUNK_HEADER_SIZE);
  header.write(fourcc, 0, 'ascii');
  header.writeUInt32LE(payload.length, 4);
  const padding = payload.length % 2 === 1 ? Buffer.alloc(1) : Buffer.alloc(0);
  return Buffer.concat([header, payload, padding]);
}

function assertField(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_WEBP_24BIT) {
    throw new RangeError(`WebP ${name} ${value} does not fit in 24 bits`);
  }
}
