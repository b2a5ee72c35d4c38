import { z } from 'zod';

import type { Frame, ProjectSettings } from '@domain/frame-sequence/index.js';

import { projectSettingsSchema } from './project-settings.dto.js';

export const exportAnimationCommandSchema = z.object({
  id: z.string().min(1),
  destination: z.string().trim().min(1),
  settings: projectSettingsSchema,
});

export interface ExportAnimationPayload {
  readonly id: string;
  readonly frames: readonly Frame[];
  readonly settings: ProjectSettings;
  readonly destination: string;
}
