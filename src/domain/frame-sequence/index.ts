export * from './contracts/animation-encoder.js';
export * from './contracts/animation-exporter.js';
export * from './contracts/frame-processor.js';
export * from './contracts/frame-previewer.js';
export * from './contracts/source-decoder.js';
export * from './contracts/tick-scheduler.js';
export * from './entities/export-job.js';
export * from './value-objects/frame-source.js';
export * from './value-objects/pixel-buffer.js';
export * from './value-objects/project-settings.js';
