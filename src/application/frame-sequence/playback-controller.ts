import type { Frame, ScheduledTick, TickScheduler } from '@domain/frame-sequence/index.js';

import { frameDelayMs } from '@/shared/media/frameTiming.js';

import type { FrameStore } from './frame-store.js';

export type PlaybackState = 'stopped' | 'playing';

export interface PlaybackFrameEvent {
  readonly index: number;
  readonly frame: Frame;
}

export type PlaybackFrameListener = (event: PlaybackFrameEvent) => void;

export interface PlaybackControllerOptions {
  readonly frames: FrameStore;
  readonly scheduler: TickScheduler;
  /** Read at every tick, so rate changes apply from the next frame. */
  readonly getFps: () => number;
}

/**
 * Cycles a current index through the frame sequence for preview. Read-only with
 * respect to the frames.
 */
export class PlaybackController {
  private readonly frames: FrameStore;

  private readonly scheduler: TickScheduler;

  private readonly getFps: () => number;

  private readonly listeners = new Set<PlaybackFrameListener>();

  private readonly unsubscribe: () => void;

  private pending: ScheduledTick | null = null;

  private currentState: PlaybackState = 'stopped';

  private currentIndex = 0;

  public constructor(options: PlaybackControllerOptions) {
    this.frames = options.frames;
    this.scheduler = options.scheduler;
    this.getFps = options.getFps;
    this.unsubscribe = this.frames.onFramesChanged(() => this.handleFramesChanged());
  }

  public get state(): PlaybackState {
    return this.currentState;
  }

  public get index(): number {
    return this.currentIndex;
  }

  public play(): void {
    if (this.currentState === 'playing' || this.frames.length === 0) {
      return;
    }

    this.currentState = 'playing';
    this.arm();
  }

  public pause(): void {
    this.cancelPending();
    this.currentState = 'stopped';
  }

  public stop(): void {
    this.pause();
    this.currentIndex = 0;
    this.emit();
  }

  public toggle(): PlaybackState {
    if (this.currentState === 'playing') {
      this.pause();
    } else {
      this.play();
    }
    return this.currentState;
  }

  public next(): void {
    this.step(1);
  }

  public prev(): void {
    this.step(-1);
  }

  public seek(index: number): void {
    this.frames.at(index);
    this.currentIndex = index;
    this.emit();
  }

  public onFrame(listener: PlaybackFrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  public dispose(): void {
    this.pause();
    this.unsubscribe();
    this.listeners.clear();
  }

  private step(offset: number): void {
    const count = this.frames.length;
    if (count === 0) {
      return;
    }

    this.currentIndex = (this.currentIndex + offset + count) % count;
    this.emit();
  }

  private arm(): void {
    this.pending = this.scheduler.schedule(frameDelayMs(this.getFps()), () => {
      this.pending = null;
      if (this.currentState !== 'playing') {
        return;
      }

      this.step(1);
      if (this.currentState === 'playing') {
        this.arm();
      }
    });
  }

  private cancelPending(): void {
    this.pending?.cancel();
    this.pending = null;
  }

  private handleFramesChanged(): void {
    const count = this.frames.length;
    if (count === 0) {
      this.pause();
      this.currentIndex = 0;
      return;
    }

    if (this.currentIndex >= count) {
      this.currentIndex = count - 1;
      this.emit();
    }
  }

  private emit(): void {
    const frame = this.frames.frames[this.currentIndex];
    if (!frame) {
      return;
    }

    for (const listener of this.listeners) {
      listener({ index: this.currentIndex, frame });
    }
  }
}
