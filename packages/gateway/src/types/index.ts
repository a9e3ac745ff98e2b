export * from './error.js';
export * from './model.js';
export * from './chunk.js';
export * from './adapter.js';
