import { z } from 'zod';

import { MAX_QUALITY, MIN_QUALITY, RESOLUTION_PRESETS } from '@domain/frame-sequence/index.js';

export const MAX_LOOP_COUNT = 65_535;

export const fpsSchema = z.number().int().positive().max(240);

export const loopCountSchema = z.number().int().min(0).max(MAX_LOOP_COUNT);

export const qualitySchema = z.number().int().min(MIN_QUALITY).max(MAX_QUALITY);

export const outputFormatSchema = z.enum(['gif', 'webp']);

export const resolutionTargetSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('original') }),
  z.object({ kind: z.literal('height'), height: z.number().int().positive().max(8_640) }),
]);

export const resolutionInputSchema = z.union([resolutionTargetSchema, z.enum(RESOLUTION_PRESETS)]);

export type ResolutionInput = z.infer<typeof resolutionInputSchema>;

export const projectSettingsSchema = z.object({
  fps: fpsSchema,
  loopCount: loopCountSchema,
  resolution: resolutionTargetSchema,
  optimize: z.boolean(),
  quality: qualitySchema,
  format: outputFormatSchema,
});
