import type { ScheduledTick, TickScheduler } from '@domain/frame-sequence/index.js';

export class TimerTickScheduler implements TickScheduler {
  public schedule(delayMs: number, callback: () => void): ScheduledTick {
    const handle = setTimeout(callback, Math.max(0, delayMs));
    return {
      cancel: () => clearTimeout(handle),
    };
  }
}
