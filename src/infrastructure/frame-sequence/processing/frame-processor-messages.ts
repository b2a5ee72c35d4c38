import type { FramePreparationTask, PixelBuffer, SourceDecoder } from '@domain/frame-sequence/index.js';

import { CompositorError } from '@/shared/errors/base.error.js';
import { DecodeError, ResizeError } from '@/shared/errors/compositor-errors.js';

import { prepareFrame } from './prepare-frame.js';

export interface PrepareFrameMessage {
  readonly type: 'prepareFrame';
  readonly taskId: number;
  readonly task: FramePreparationTask;
}

export interface ShutdownMessage {
  readonly type: 'shutdown';
}

export type WorkerRequest = PrepareFrameMessage | ShutdownMessage;

export interface PreparedFrameReply {
  readonly type: 'preparedFrame';
  readonly taskId: number;
  readonly width: number;
  readonly height: number;
  readonly data: Uint8Array;
}

export interface SerializedFailure {
  readonly code: string;
  readonly message: string;
  readonly metadata: Record<string, unknown>;
}

export interface FailedFrameReply {
  readonly type: 'failedFrame';
  readonly taskId: number;
  readonly failure: SerializedFailure;
}

export type WorkerReply = PreparedFrameReply | FailedFrameReply;

/** Never rejects: failures travel back to the pool as `failedFrame` replies. */
export async function handlePrepareFrame(message: PrepareFrameMessage, decoder: SourceDecoder): Promise<WorkerReply> {
  try {
    const prepared = await prepareFrame(decoder, message.task);
    return {
      type: 'preparedFrame',
      taskId: message.taskId,
      width: prepared.width,
      height: prepared.height,
      data: prepared.data,
    };
  } catch (error) {
    return { type: 'failedFrame', taskId: message.taskId, failure: serializeFailure(error, message.task.source) };
  }
}

export function serializeFailure(error: unknown, source: string): SerializedFailure {
  if (error instanceof CompositorError) {
    return { code: error.code, message: error.message, metadata: error.metadata };
  }

  return {
    code: 'decode.failed',
    message: error instanceof Error ? error.message : 'Unknown worker failure',
    metadata: { source },
  };
}

export function rehydrateFailure(failure: SerializedFailure, task: FramePreparationTask): Error {
  if (failure.code === 'resize.degenerate-dimensions') {
    const width = typeof failure.metadata.width === 'number' ? failure.metadata.width : 0;
    const height = typeof failure.metadata.height === 'number' ? failure.metadata.height : 0;
    return new ResizeError(width, height, failure.message);
  }

  return new DecodeError(task.source, new Error(failure.message), task.index);
}

export function toPixelBuffer(reply: PreparedFrameReply): PixelBuffer {
  return { width: reply.width, height: reply.height, data: reply.data };
}
