export * from './commands/export-animation.command.js';
export * from './dto/export-animation.dto.js';
export * from './dto/project-settings.dto.js';
export * from './frame-sequence-controller.js';
export * from './frame-store.js';
export * from './handlers/export-animation.handler.js';
export * from './history-manager.js';
export * from './playback-controller.js';
export * from './project-store.js';
