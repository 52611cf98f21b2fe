export * from './audio.types.js';
export * from './segmentation.types.js';
export * from './transcript.types.js';
export * from './session.types.js';
export * from './config.types.js';
export * from './lib/config-utils.js';
