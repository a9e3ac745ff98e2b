import type {
  AggregatedResponse,
  ModelId,
  OriginResult,
  OriginState,
  ResultChunk,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

/**
 * Accumulates chunks from one or many origins into per-origin results.
 * Results for the `origins` given up front come first, in that order; any
 * other origin follows in the order its result arrived.
 */
export class ChunkAccumulator {
  private readonly textParts = new Map<ModelId, Array<string>>();
  private readonly results = new Map<ModelId, OriginResult>();
  private readonly origins: ReadonlyArray<ModelId>;

  constructor(origins: ReadonlyArray<ModelId> = []) {
    this.origins = origins;
  }

  process(chunk: ResultChunk): void {
    if (this.results.has(chunk.origin)) {
      return;
    }

    switch (chunk.type) {
      case 'TEXT_DELTA': {
        const parts = this.textParts.get(chunk.origin) ?? [];
        parts.push(chunk.text);
        this.textParts.set(chunk.origin, parts);
        break;
      }

      case 'FINISH':
        this.results.set(chunk.origin, success(chunk.text));
        break;

      case 'ERROR':
        this.results.set(chunk.origin, failure(chunk.error));
        break;
    }
  }

  /** Text received so far from an origin, terminal or not. */
  partialText(origin: ModelId): string {
    return (this.textParts.get(origin) ?? []).join('');
  }

  toResponse(): AggregatedResponse {
    const entries: Array<[ModelId, OriginResult]> = [];
    for (const origin of this.origins) {
      const result = this.results.get(origin);
      if (result) {
        entries.push([origin, result]);
      }
    }
    for (const [origin, result] of this.results) {
      if (!this.origins.includes(origin)) {
        entries.push([origin, result]);
      }
    }
    return Object.fromEntries(entries);
  }
}

type WithStates = { readonly states: () => Readonly<Record<ModelId, OriginState>> };

function hasStates(stream: AsyncIterable<ResultChunk>): stream is AsyncIterable<ResultChunk> & WithStates {
  return 'states' in stream && typeof stream.states === 'function';
}

/**
 * Folds a chunk stream into one result per origin. A merged stream reports
 * its origins, so the response follows their order rather than arrival.
 */
export async function collectChunks(stream: AsyncIterable<ResultChunk>): Promise<AggregatedResponse> {
  const accumulator = new ChunkAccumulator(hasStates(stream) ? Object.keys(stream.states()) : []);
  for await (const chunk of stream) {
    accumulator.process(chunk);
  }
  return accumulator.toResponse();
}
