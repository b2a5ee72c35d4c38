import type { PixelBuffer, RgbColor } from '../value-objects/pixel-buffer.js';
import type { OutputFormat } from '../value-objects/project-settings.js';

export interface AnimationEncoderOptions {
  /** Logical screen size; smaller frames are centred on it. */
  readonly width: number;
  readonly height: number;
  readonly delayMs: number;
  readonly loopCount: number;
  readonly quality: number;
  readonly optimize: boolean;
  readonly background: RgbColor;
}

export interface AnimationEncoder {
  readonly format: OutputFormat;
  readonly mimeType: string;
  addFrame(frame: PixelBuffer): Promise<void>;
  finish(): Promise<Buffer>;
  /** Releases encoder state after a failed or cancelled export. */
  abort(): void;
}

export type AnimationEncoderFactory = (format: OutputFormat, options: AnimationEncoderOptions) => AnimationEncoder;
