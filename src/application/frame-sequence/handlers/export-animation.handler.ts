import type { AnimationExporter, ExportOutcome } from '@domain/frame-sequence/index.js';
import { ExportJob } from '@domain/frame-sequence/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { EmptyProjectError } from '@/shared/errors/compositor-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import type { ExportAnimationCommand } from '../commands/export-animation.command.js';
import { type ExportAnimationPayload, exportAnimationCommandSchema } from '../dto/export-animation.dto.js';

export class ExportAnimationHandler {
  private readonly logger = createChildLogger({ module: 'ExportAnimationHandler' });

  public constructor(private readonly exporter: AnimationExporter) {}

  public async execute(command: ExportAnimationCommand): Promise<ExportOutcome> {
    const payload = this.validate(command.payload);

    this.logger.info(
      { jobId: payload.id, frames: payload.frames.length, format: payload.settings.format },
      'Starting animation export',
    );

    try {
      const job = ExportJob.create({
        id: payload.id,
        frames: payload.frames,
        settings: payload.settings,
        destination: payload.destination,
        createdAt: new Date(),
      });

      const outcome = await this.exporter.export(job, command.options);

      this.logger.info(
        {
          jobId: payload.id,
          destination: outcome.result.destination,
          durationMs: outcome.metrics.totalTimeMs,
          outputSizeBytes: outcome.metrics.outputSizeBytes,
        },
        'Animation export completed',
      );

      return outcome;
    } catch (error) {
      this.logger.error({ jobId: payload.id, error }, 'Animation export failed');
      throw AppError.fromUnknown(error, 'export.failure');
    }
  }

  private validate(payload: ExportAnimationPayload): ExportAnimationPayload {
    if (payload.frames.length === 0) {
      throw new EmptyProjectError();
    }

    const parsed = exportAnimationCommandSchema.safeParse(payload);

    if (!parsed.success) {
      const error = AppError.validation('export.invalid-payload', {
        issues: parsed.error.issues,
      });
      this.logger.warn({ issues: parsed.error.issues }, 'Invalid export payload received');
      throw error;
    }

    return { ...payload, destination: parsed.data.destination };
  }
}
