export * from './cache/memory-cache.js';
export * from './decoding/cached-source-decoder.js';
export * from './decoding/file-source-decoder.js';
export * from './encoding/create-animation-encoder.js';
export * from './encoding/gif-animation-encoder.js';
export * from './encoding/webp-animation-encoder.js';
export * from './frame-sequence-export.service.js';
export * from './preview/cached-frame-previewer.js';
export * from './processing/inline-frame-processor.js';
export * from './processing/worker-frame-processor-pool.js';
export * from './resampling/resampler.js';
export * from './scheduling/timer-tick-scheduler.js';
