export { StreamAggregator, type AggregatedStream, type AggregatorOptions } from './aggregator.js';
export { OriginTask, type OriginSource } from './origin-task.js';
export { ChunkAccumulator, collectChunks } from './collect.js';
