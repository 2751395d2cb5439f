export * from './file-loader.js';
export * from './file-detection.js';
