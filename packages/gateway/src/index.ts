// @modelgate/gateway: dispatch and stream aggregation over LLM backends

export * from './types/index.js';
export * from './config/index.js';
export * from './logging/index.js';
export * from './providers/index.js';
export * from './registry/index.js';
export * from './stream/index.js';
export * from './dispatch/index.js';
export * from './reasoning/index.js';
export * from './utils/index.js';
