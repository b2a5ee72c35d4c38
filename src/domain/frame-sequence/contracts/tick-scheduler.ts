export interface ScheduledTick {
  cancel(): void;
}

/**
 * One-shot timer. Playback re-arms it after every tick so a frame-rate change
 * applies from the next tick on.
 */
export interface TickScheduler {
  schedule(delayMs: number, callback: () => void): ScheduledTick;
}
