export * from './tools/index.js';
export * from './utils/index.js';
