import { cpus } from 'node:os';

import { z } from 'zod';

import { AppError } from '@/shared/errors/app-error.js';

const envSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STILLMOTION_WORKERS: z.coerce
    .number()
    .int()
    .min(0)
    .max(64)
    .default(Math.max(0, Math.floor(cpus().length / 2) - 1)),
  STILLMOTION_CACHE_ENTRIES: z.coerce.number().int().min(1).max(4_096).default(64),
  STILLMOTION_PREVIEW_MAX: z.coerce.number().int().min(16).max(4_096).default(400),
});

export interface AppConfig {
  readonly logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
  readonly workerPoolSize: number;
  readonly cacheEntries: number;
  readonly previewMaxDimension: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    throw AppError.validation('config.invalid-environment', { issues: parsed.error.issues });
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    workerPoolSize: parsed.data.STILLMOTION_WORKERS,
    cacheEntries: parsed.data.STILLMOTION_CACHE_ENTRIES,
    previewMaxDimension: parsed.data.STILLMOTION_PREVIEW_MAX,
  };
}
