export type OutputFormat = 'gif' | 'webp';

export type ResolutionTarget =
  | { readonly kind: 'original' }
  | { readonly kind: 'height'; readonly height: number };

export interface ProjectSettings {
  readonly fps: number;
  /** 0 loops forever, N plays N times. */
  readonly loopCount: number;
  readonly resolution: ResolutionTarget;
  readonly optimize: boolean;
  readonly quality: number;
  readonly format: OutputFormat;
}

export const FPS_PRESETS = [6, 12, 24, 30, 48, 60] as const;

export const RESOLUTION_PRESETS = ['Original', '1080p', '720p', '480p', '360p'] as const;

export type ResolutionPreset = (typeof RESOLUTION_PRESETS)[number];

export const OPTIMIZE_MAX_DIMENSION = 800;

export const MIN_QUALITY = 1;

export const MAX_QUALITY = 100;

export const DEFAULT_PROJECT_SETTINGS: ProjectSettings = {
  fps: 24,
  loopCount: 0,
  resolution: { kind: 'original' },
  optimize: true,
  quality: 85,
  format: 'gif',
};

export function resolutionFromPreset(preset: ResolutionPreset): ResolutionTarget {
  if (preset === 'Original') {
    return { kind: 'original' };
  }

  return { kind: 'height', height: Number.parseInt(preset, 10) };
}
