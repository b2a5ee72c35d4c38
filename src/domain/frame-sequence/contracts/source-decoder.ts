import type { PixelBuffer } from '../value-objects/pixel-buffer.js';

export interface SourceDecoder {
  /** Rejects with `DecodeError` on unreadable, corrupt or unsupported sources. */
  decode(source: string): Promise<PixelBuffer>;
}
