import { randomUUID } from 'node:crypto';

import { detectSourceKind, type Frame, sourceFormatOf, SUPPORTED_EXTENSIONS } from '@domain/frame-sequence/index.js';

import { DecodeError, IndexError } from '@/shared/errors/compositor-errors.js';

import type { ProjectStore } from './project-store.js';

export type Snapshot = readonly Frame[];

export type FramesChangedReason = 'append' | 'remove' | 'move' | 'clear' | 'restore';

export interface FramesChangedEvent {
  readonly reason: FramesChangedReason;
  /** First affected index. */
  readonly start: number;
  /** One past the last affected index, measured on the longer of the old and new sequences. */
  readonly end: number;
  readonly frames: Snapshot;
}

export type FramesChangedListener = (event: FramesChangedEvent) => void;

/**
 * Owns the ordered frame sequence. Every operation either applies completely or
 * throws before touching state; undo bookkeeping lives in `HistoryManager`.
 */
export class FrameStore {
  private readonly listeners = new Set<FramesChangedListener>();

  public constructor(
    private readonly store: ProjectStore,
    private readonly createId: () => string = randomUUID,
  ) {}

  public get frames(): Snapshot {
    return this.store.getState().frames;
  }

  public get length(): number {
    return this.frames.length;
  }

  public at(index: number): Frame {
    const frame = Number.isInteger(index) ? this.frames[index] : undefined;
    if (!frame) {
      throw new IndexError(index, this.length);
    }
    return frame;
  }

  public snapshot(): Snapshot {
    return this.frames;
  }

  public append(sources: readonly string[]): Snapshot {
    const added = sources.map((source) => {
      const kind = detectSourceKind(source);
      if (!kind) {
        throw DecodeError.unsupportedExtension(source, SUPPORTED_EXTENSIONS);
      }
      return Object.freeze({ id: this.createId(), source, format: sourceFormatOf(kind) });
    });

    const previous = this.frames;
    return this.commit('append', [...previous, ...added], previous.length, previous.length + added.length);
  }

  public removeAt(index: number): Snapshot {
    this.at(index);
    const previous = this.frames;
    const next = previous.filter((_, position) => position !== index);
    return this.commit('remove', next, index, previous.length);
  }

  public move(from: number, to: number): Snapshot {
    const frame = this.at(from);
    this.at(to);

    const next = this.frames.filter((_, position) => position !== from);
    next.splice(to, 0, frame);
    return this.commit('move', next, Math.min(from, to), Math.max(from, to) + 1);
  }

  public clear(): Snapshot {
    const previous = this.frames;
    return this.commit('clear', [], 0, previous.length);
  }

  public restore(snapshot: Snapshot): Snapshot {
    const previous = this.frames;
    return this.commit('restore', [...snapshot], 0, Math.max(previous.length, snapshot.length));
  }

  public onFramesChanged(listener: FramesChangedListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private commit(reason: FramesChangedReason, frames: Frame[], start: number, end: number): Snapshot {
    const next: Snapshot = Object.freeze(frames);
    this.store.setState({ frames: next });

    const event: FramesChangedEvent = { reason, start, end, frames: next };
    for (const listener of this.listeners) {
      listener(event);
    }

    return next;
  }
}
