import { createStore, type StoreApi } from 'zustand/vanilla';

import {
  DEFAULT_PROJECT_SETTINGS,
  type Frame,
  type ProjectSettings,
} from '@domain/frame-sequence/index.js';

export interface ProjectState {
  readonly frames: readonly Frame[];
  readonly settings: ProjectSettings;
}

export type ProjectStore = StoreApi<ProjectState>;

export function createProjectStore(settings: ProjectSettings = DEFAULT_PROJECT_SETTINGS): ProjectStore {
  return createStore<ProjectState>()(() => ({
    frames: Object.freeze([]),
    settings,
  }));
}
