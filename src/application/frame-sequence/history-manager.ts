import { HISTORY_UNDERFLOW } from '@/shared/errors/compositor-errors.js';

import type { FrameStore, Snapshot } from './frame-store.js';

export type HistoryAction = 'add-frames' | 'remove-frame' | 'move-frame' | 'clear-frames';

export interface HistoryEntry {
  readonly action: HistoryAction;
  readonly before: Snapshot;
  readonly after: Snapshot;
}

export type HistoryResult =
  | { readonly applied: true; readonly entry: HistoryEntry; readonly frames: Snapshot }
  | { readonly applied: false; readonly reason: typeof HISTORY_UNDERFLOW };

export interface HistoryManagerOptions {
  /** Oldest entries are dropped beyond this depth. Unbounded when omitted. */
  readonly maxEntries?: number;
}

/**
 * Linear undo/redo over full frame-sequence snapshots. Recording a new entry
 * discards everything that was undone.
 */
export class HistoryManager {
  private readonly undoStack: HistoryEntry[] = [];

  private readonly redoStack: HistoryEntry[] = [];

  private readonly maxEntries: number;

  public constructor(
    private readonly frames: FrameStore,
    options: HistoryManagerOptions = {},
  ) {
    this.maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
  }

  public get canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  public get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  public get undoDepth(): number {
    return this.undoStack.length;
  }

  public get redoDepth(): number {
    return this.redoStack.length;
  }

  public record(action: HistoryAction, before: Snapshot, after: Snapshot): HistoryEntry {
    const entry: HistoryEntry = Object.freeze({ action, before, after });
    this.undoStack.push(entry);
    this.redoStack.length = 0;

    while (this.undoStack.length > this.maxEntries) {
      this.undoStack.shift();
    }

    return entry;
  }

  /** Runs a FrameStore mutation and records it; nothing is recorded if it throws. */
  public track(action: HistoryAction, mutation: (store: FrameStore) => Snapshot): Snapshot {
    const before = this.frames.snapshot();
    const after = mutation(this.frames);
    this.record(action, before, after);
    return after;
  }

  public undo(): HistoryResult {
    const entry = this.undoStack.pop();
    if (!entry) {
      return { applied: false, reason: HISTORY_UNDERFLOW };
    }

    const frames = this.frames.restore(entry.before);
    this.redoStack.push(entry);
    return { applied: true, entry, frames };
  }

  public redo(): HistoryResult {
    const entry = this.redoStack.pop();
    if (!entry) {
      return { applied: false, reason: HISTORY_UNDERFLOW };
    }

    const frames = this.frames.restore(entry.after);
    this.undoStack.push(entry);
    return { applied: true, entry, frames };
  }

  public reset(): void {
    this.undoStack.length = 0;
    this.redoStack.length = 0;
  }
}
