import { existsSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { Worker } from 'node:worker_threads';

import {
  type FramePreparationTask,
  type FrameProcessor,
  type PixelBuffer,
  type RgbColor,
  WHITE,
} from '@domain/frame-sequence/index.js';

import { DecodeError } from '@/shared/errors/compositor-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import {
  type PrepareFrameMessage,
  rehydrateFailure,
  toPixelBuffer,
  type WorkerReply,
  type WorkerRequest,
} from './frame-processor-messages.js';

const COMPILED_WORKER_URL = new URL('../workers/frame-processor.worker.js', import.meta.url);

export interface FrameWorkerHandle {
  postMessage(message: WorkerRequest): void;
  terminate(): Promise<unknown>;
}

export interface FrameWorkerEvents {
  readonly onMessage: (reply: WorkerReply) => void;
  readonly onError: (error: Error) => void;
  readonly onExit: (exitCode: number) => void;
}

export type FrameWorkerFactory = (events: FrameWorkerEvents) => FrameWorkerHandle;

export interface WorkerFrameProcessorPoolOptions {
  readonly background?: RgbColor;
  readonly createWorker?: FrameWorkerFactory;
}

interface WorkerSlot {
  readonly id: number;
  readonly handle: FrameWorkerHandle;
  readonly inFlight: Set<number>;
  alive: boolean;
}

interface PendingTask {
  readonly task: FramePreparationTask;
  readonly slot: WorkerSlot;
  readonly resolve: (buffer: PixelBuffer) => void;
  readonly reject: (error: unknown) => void;
}

/** The compiled worker only exists beside the build output, not beside the TypeScript sources. */
export function isCompiledWorkerAvailable(): boolean {
  return existsSync(fileURLToPath(COMPILED_WORKER_URL));
}

export function spawnCompiledWorker(background: RgbColor): FrameWorkerFactory {
  return (events) => {
    const worker = new Worker(COMPILED_WORKER_URL, { workerData: { background } });
    worker.on('message', (reply: WorkerReply) => events.onMessage(reply));
    worker.on('error', (error) => events.onError(error));
    worker.on('exit', (exitCode) => events.onExit(exitCode));
    return worker;
  };
}

/**
 * Round-robin pool of worker threads running decode and resample. A worker
 * that errors or exits is retired: its in-flight tasks reject with a
 * `DecodeError` and later tasks go to the survivors, or reject when none are
 * left.
 */
export class WorkerFrameProcessorPool implements FrameProcessor {
  private readonly logger = createChildLogger({ module: 'WorkerFrameProcessorPool' });

  private readonly slots: WorkerSlot[];

  private readonly pending = new Map<number, PendingTask>();

  private roundRobinIndex = 0;

  private nextTaskId = 0;

  private destroyed = false;

  public readonly concurrency: number;

  public constructor(size: number, options: WorkerFrameProcessorPoolOptions = {}) {
    const poolSize = Math.max(1, size);
    const createWorker = options.createWorker ?? spawnCompiledWorker(options.background ?? WHITE);
    this.concurrency = poolSize;
    this.slots = Array.from({ length: poolSize }, (_, id) => {
      const inFlight = new Set<number>();
      let slot: WorkerSlot | undefined;
      const handle = createWorker({
        onMessage: (reply) => this.settle(reply),
        onError: (error) => {
          if (slot) this.retire(slot, error);
        },
        onExit: (exitCode) => {
          if (slot) this.retire(slot, new Error(`Frame processor worker exited with code ${exitCode}`));
        },
      });
      slot = { id, handle, inFlight, alive: true };
      return slot;
    });
  }

  public get liveWorkers(): number {
    return this.slots.filter((slot) => slot.alive).length;
  }

  public async process(task: FramePreparationTask): Promise<PixelBuffer> {
    const slot = this.destroyed ? undefined : this.pickSlot();
    if (!slot) {
      throw new DecodeError(task.source, new Error('No frame processor worker is running'), task.index);
    }

    const taskId = this.nextTaskId;
    this.nextTaskId += 1;

    return new Promise<PixelBuffer>((resolve, reject) => {
      this.pending.set(taskId, { task, slot, resolve, reject });
      slot.inFlight.add(taskId);
      const message: PrepareFrameMessage = { type: 'prepareFrame', taskId, task };

      try {
        slot.handle.postMessage(message);
      } catch (error) {
        this.pending.delete(taskId);
        slot.inFlight.delete(taskId);
        reject(new DecodeError(task.source, error, task.index));
      }
    });
  }

  public async destroy(): Promise<void> {
    if (this.destroyed) {
      return;
    }

    this.destroyed = true;
    const shutdown = new Error('Frame processor pool was destroyed');
    for (const slot of this.slots) {
      this.retire(slot, shutdown);
    }

    await Promise.all(
      this.slots.map(async (slot) => {
        try {
          slot.handle.postMessage({ type: 'shutdown' });
        } catch (error) {
          this.logger.debug({ worker: slot.id, error }, 'Worker was already gone at shutdown');
        }
        await slot.handle.terminate();
      }),
    );
  }

  private settle(reply: WorkerReply): void {
    const pending = this.pending.get(reply.taskId);
    if (!pending) {
      this.logger.debug({ taskId: reply.taskId }, 'Received reply for unknown task');
      return;
    }

    this.pending.delete(reply.taskId);
    pending.slot.inFlight.delete(reply.taskId);

    if (reply.type === 'preparedFrame') {
      pending.resolve(toPixelBuffer(reply));
    } else {
      pending.reject(rehydrateFailure(reply.failure, pending.task));
    }
  }

  private retire(slot: WorkerSlot, cause: Error): void {
    if (!slot.alive) {
      return;
    }

    slot.alive = false;
    if (!this.destroyed) {
      this.logger.warn({ worker: slot.id, error: cause, inFlight: slot.inFlight.size }, 'Frame processor worker died');
    }

    for (const taskId of slot.inFlight) {
      const pending = this.pending.get(taskId);
      this.pending.delete(taskId);
      pending?.reject(new DecodeError(pending.task.source, cause, pending.task.index));
    }
    slot.inFlight.clear();
  }

  private pickSlot(): WorkerSlot | undefined {
    for (let attempt = 0; attempt < this.slots.length; attempt += 1) {
      const slot = this.slots[this.roundRobinIndex];
      this.roundRobinIndex = (this.roundRobinIndex + 1) % this.slots.length;
      if (slot?.alive) {
        return slot;
      }
    }

    return undefined;
  }
}
