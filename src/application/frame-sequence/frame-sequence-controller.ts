import { randomUUID } from 'node:crypto';

import { z } from 'zod';

import {
  type AnimationExporter,
  DEFAULT_PROJECT_SETTINGS,
  detectSourceKind,
  SUPPORTED_EXTENSIONS,
  type ExportOutcome,
  type ExportRunOptions,
  type FramePreviewer,
  type PixelBuffer,
  type ProjectSettings,
  type ResolutionTarget,
  resolutionFromPreset,
  type SourceDecoder,
  type TickScheduler,
} from '@domain/frame-sequence/index.js';

import { AppError } from '@/shared/errors/app-error.js';
import { DecodeError, ProjectLockedError } from '@/shared/errors/compositor-errors.js';
import { createChildLogger } from '@/shared/logger/pino.js';

import { ExportAnimationCommand } from './commands/export-animation.command.js';
import {
  fpsSchema,
  loopCountSchema,
  outputFormatSchema,
  qualitySchema,
  type ResolutionInput,
  resolutionInputSchema,
} from './dto/project-settings.dto.js';
import { type FramesChangedListener, FrameStore, type Snapshot } from './frame-store.js';
import { ExportAnimationHandler } from './handlers/export-animation.handler.js';
import { HistoryManager, type HistoryResult } from './history-manager.js';
import { PlaybackController } from './playback-controller.js';
import { createProjectStore, type ProjectStore } from './project-store.js';

const DEFAULT_PREVIEW_MAX_DIMENSION = 400;

const previewDimensionSchema = z.number().int().positive();

export interface FrameSequenceControllerOptions {
  readonly exporter: AnimationExporter;
  readonly decoder: SourceDecoder;
  readonly previewer: FramePreviewer;
  readonly scheduler: TickScheduler;
  readonly settings?: ProjectSettings;
  /** Decode every source before adding it. Defaults to true. */
  readonly verifyOnAdd?: boolean;
  readonly historyDepth?: number;
  readonly previewMaxDimension?: number;
  readonly createId?: () => string;
  /** Releases resources the composition root owns, such as worker threads. */
  readonly onClose?: () => Promise<void>;
}

/**
 * Command surface of one project: frame editing with undo, settings, preview
 * playback and export. Frame mutations are rejected while an export runs.
 */
export class FrameSequenceController {
  private readonly logger = createChildLogger({ module: 'FrameSequenceController' });

  private readonly store: ProjectStore;

  private readonly frameStore: FrameStore;

  private readonly historyManager: HistoryManager;

  private readonly playbackController: PlaybackController;

  private readonly exportHandler: ExportAnimationHandler;

  private readonly decoder: SourceDecoder;

  private readonly previewer: FramePreviewer;

  private readonly verifyOnAdd: boolean;

  private readonly previewMaxDimension: number;

  private readonly createId: () => string;

  private readonly onClose: (() => Promise<void>) | undefined;

  private activeExport: AbortController | null = null;

  private closed = false;

  public constructor(options: FrameSequenceControllerOptions) {
    this.createId = options.createId ?? randomUUID;
    this.store = createProjectStore(options.settings ?? DEFAULT_PROJECT_SETTINGS);
    this.frameStore = new FrameStore(this.store, this.createId);
    this.historyManager = new HistoryManager(this.frameStore, { maxEntries: options.historyDepth });
    this.playbackController = new PlaybackController({
      frames: this.frameStore,
      scheduler: options.scheduler,
      getFps: () => this.settings.fps,
    });
    this.exportHandler = new ExportAnimationHandler(options.exporter);
    this.decoder = options.decoder;
    this.previewer = options.previewer;
    this.verifyOnAdd = options.verifyOnAdd ?? true;
    this.previewMaxDimension = options.previewMaxDimension ?? DEFAULT_PREVIEW_MAX_DIMENSION;
    this.onClose = options.onClose;
  }

  public get frames(): Snapshot {
    return this.frameStore.frames;
  }

  public get settings(): ProjectSettings {
    return this.store.getState().settings;
  }

  public get history(): HistoryManager {
    return this.historyManager;
  }

  public get playback(): PlaybackController {
    return this.playbackController;
  }

  public get isExporting(): boolean {
    return this.activeExport !== null;
  }

  public onFramesChanged(listener: FramesChangedListener): () => void {
    return this.frameStore.onFramesChanged(listener);
  }

  public async addFrames(sources: readonly string[]): Promise<Snapshot> {
    this.assertUnlocked('add frames');

    for (const source of sources) {
      if (!detectSourceKind(source)) {
        throw DecodeError.unsupportedExtension(source, SUPPORTED_EXTENSIONS);
      }
    }

    if (this.verifyOnAdd) {
      for (const source of sources) {
        await this.decoder.decode(source);
      }
    }

    if (sources.length === 0) {
      return this.frames;
    }

    this.assertUnlocked('add frames');
    const frames = this.historyManager.track('add-frames', (store) => store.append(sources));
    this.logger.debug({ added: sources.length, total: frames.length }, 'Frames added');
    return frames;
  }

  public removeFrame(index: number): Snapshot {
    this.assertUnlocked('remove a frame');
    return this.historyManager.track('remove-frame', (store) => store.removeAt(index));
  }

  public moveFrame(from: number, to: number): Snapshot {
    this.assertUnlocked('move a frame');
    return this.historyManager.track('move-frame', (store) => store.move(from, to));
  }

  public clearFrames(): Snapshot {
    this.assertUnlocked('clear frames');
    if (this.frameStore.length === 0) {
      return this.frames;
    }
    return this.historyManager.track('clear-frames', (store) => store.clear());
  }

  public undo(): HistoryResult {
    this.assertUnlocked('undo');
    return this.historyManager.undo();
  }

  public redo(): HistoryResult {
    this.assertUnlocked('redo');
    return this.historyManager.redo();
  }

  public resetHistory(): void {
    this.historyManager.reset();
  }

  public setFps(fps: number): ProjectSettings {
    return this.updateSettings({ fps: parse('settings.invalid-fps', fpsSchema, fps) });
  }

  public setLoopCount(loopCount: number): ProjectSettings {
    return this.updateSettings({ loopCount: parse('settings.invalid-loop-count', loopCountSchema, loopCount) });
  }

  public setQuality(quality: number): ProjectSettings {
    return this.updateSettings({ quality: parse('settings.invalid-quality', qualitySchema, quality) });
  }

  public setOptimize(optimize: boolean): ProjectSettings {
    return this.updateSettings({ optimize: parse('settings.invalid-optimize', z.boolean(), optimize) });
  }

  public setFormat(format: ProjectSettings['format']): ProjectSettings {
    return this.updateSettings({ format: parse('settings.invalid-format', outputFormatSchema, format) });
  }

  public setResolution(resolution: ResolutionInput): ProjectSettings {
    const parsed = parse('settings.invalid-resolution', resolutionInputSchema, resolution);
    const target: ResolutionTarget = typeof parsed === 'string' ? resolutionFromPreset(parsed) : parsed;
    return this.updateSettings({ resolution: target });
  }

  public async preview(index: number, maxDimension = this.previewMaxDimension): Promise<PixelBuffer> {
    const frame = this.frameStore.at(index);
    const bound = parse('preview.invalid-dimension', previewDimensionSchema, maxDimension);
    return this.previewer.preview(frame.source, bound);
  }

  public async export(destination: string, options: ExportRunOptions = {}): Promise<ExportOutcome> {
    this.assertUnlocked('export');

    const abort = new AbortController();
    const { signal } = options;
    const forwardAbort = (): void => abort.abort(signal?.reason);

    if (signal?.aborted) {
      abort.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    this.activeExport = abort;

    try {
      const command = new ExportAnimationCommand(
        { id: this.createId(), frames: this.frameStore.snapshot(), settings: this.settings, destination },
        { onProgress: options.onProgress, signal: abort.signal },
      );
      return await this.exportHandler.execute(command);
    } finally {
      signal?.removeEventListener('abort', forwardAbort);
      this.activeExport = null;
    }
  }

  /** Requests cancellation of the running export. Returns false when none runs. */
  public cancelExport(): boolean {
    if (!this.activeExport) {
      return false;
    }

    this.activeExport.abort();
    return true;
  }

  public async close(): Promise<void> {
    if (this.closed) {
      return;
    }

    this.closed = true;
    this.cancelExport();
    this.playbackController.dispose();
    this.historyManager.reset();
    await this.onClose?.();
  }

  private updateSettings(patch: Partial<ProjectSettings>): ProjectSettings {
    const settings: ProjectSettings = { ...this.settings, ...patch };
    this.store.setState({ settings });
    return settings;
  }

  private assertUnlocked(operation: string): void {
    if (this.activeExport) {
      throw new ProjectLockedError(operation);
    }
  }
}

function parse<T>(code: string, schema: z.ZodType<T>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw AppError.validation(code, { issues: parsed.error.issues });
  }
  return parsed.data;
}
