const MS_PER_SECOND = 1000;

/**
 * Uniform display delay for every frame of an export at the given frame rate.
 * 24 fps gives 42ms, 30 fps 33ms and 60 fps 17ms.
 */
export function frameDelayMs(fps: number): number {
  if (!Number.isFinite(fps) || fps <= 0) {
    throw new RangeError(`Frame rate must be a positive number, received ${fps}`);
  }

  return Math.round(MS_PER_SECOND / fps);
}

export function sequenceDurationMs(fps: number, frameCount: number): number {
  if (frameCount <= 0) {
    return 0;
  }

  return frameDelayMs(fps) * frameCount;
}
