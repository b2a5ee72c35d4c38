import type { ExportJob } from '../entities/export-job.js';
import type { OutputFormat } from '../value-objects/project-settings.js';

export type ExportStage = 'prepare' | 'encode';

export interface ExportProgress {
  readonly stage: ExportStage;
  readonly processed: number;
  readonly total: number;
  /** processed / total for the current stage. */
  readonly fraction: number;
}

export interface ExportMetrics {
  readonly prepareTimeMs: number;
  readonly encodeTimeMs: number;
  readonly totalTimeMs: number;
  readonly outputSizeBytes: number;
  readonly averageFramePreparationMs: number;
}

export interface ExportResult {
  readonly destination: string;
  readonly format: OutputFormat;
  readonly mimeType: string;
  readonly frameCount: number;
  readonly width: number;
  readonly height: number;
  readonly delayMs: number;
  readonly loopCount: number;
  readonly durationMs: number;
}

export interface ExportOutcome {
  readonly result: ExportResult;
  readonly metrics: ExportMetrics;
}

export interface ExportRunOptions {
  readonly onProgress?: (progress: ExportProgress) => void;
  readonly signal?: AbortSignal;
}

export interface AnimationExporter {
  export(job: ExportJob, options?: ExportRunOptions): Promise<ExportOutcome>;
}
