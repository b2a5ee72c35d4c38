import type { Frame } from '../value-objects/frame-source.js';
import type { ProjectSettings } from '../value-objects/project-settings.js';

export interface ExportJobProps {
  readonly id: string;
  readonly frames: readonly Frame[];
  readonly settings: ProjectSettings;
  readonly destination: string;
  readonly createdAt: Date;
}

export class ExportJob {
  public readonly id: string;

  public readonly frames: readonly Frame[];

  public readonly settings: ProjectSettings;

  public readonly destination: string;

  public readonly createdAt: Date;

  private constructor(props: ExportJobProps) {
    this.id = props.id;
    this.frames = Object.freeze([...props.frames]);
    this.settings = props.settings;
    this.destination = props.destination;
    this.createdAt = props.createdAt;
  }

  public static create(props: ExportJobProps): ExportJob {
    if (props.frames.length === 0) {
      throw new Error('Export job must contain at least one frame');
    }

    if (!Number.isInteger(props.settings.fps) || props.settings.fps <= 0) {
      throw new Error('Frame rate must be a positive integer');
    }

    if (props.destination.trim().length === 0) {
      throw new Error('Export destination must not be empty');
    }

    return new ExportJob(props);
  }

  public get frameCount(): number {
    return this.frames.length;
  }
}
