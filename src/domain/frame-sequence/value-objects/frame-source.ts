import path from 'node:path';

export type SourceFormat = 'standard' | 'raw-sensor';

export type SourceKind = 'png' | 'jpeg' | 'bmp' | 'gif' | 'dng';

const KIND_BY_EXTENSION: Readonly<Record<string, SourceKind>> = {
  '.png': 'png',
  '.jpg': 'jpeg',
  '.jpeg': 'jpeg',
  '.bmp': 'bmp',
  '.gif': 'gif',
  '.dng': 'dng',
};

export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(KIND_BY_EXTENSION);

/**
 * One entry of a project. Its position is its index in the frame array.
 */
export interface Frame {
  readonly id: string;
  readonly source: string;
  readonly format: SourceFormat;
}

export function detectSourceKind(source: string): SourceKind | null {
  const extension = path.extname(source).toLowerCase();
  return KIND_BY_EXTENSION[extension] ?? null;
}

export function sourceFormatOf(kind: SourceKind): SourceFormat {
  return kind === 'dng' ? 'raw-sensor' : 'standard';
}
