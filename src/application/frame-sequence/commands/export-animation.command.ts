import type { ExportRunOptions } from '@domain/frame-sequence/index.js';

import type { ExportAnimationPayload } from '../dto/export-animation.dto.js';

export class ExportAnimationCommand {
  public readonly payload: ExportAnimationPayload;

  public readonly options: ExportRunOptions;

  public constructor(payload: ExportAnimationPayload, options: ExportRunOptions = {}) {
    this.payload = payload;
    this.options = options;
  }
}
