import type { ResultChunk } from './chunk.js';
import type { BackendConfig, CallOptions, ModelId, TurnInput } from './model.js';

/**
 * Uniform capability over one backend endpoint. Implementations hold no
 * state between calls beyond their configuration.
 *
 * Buffered calls reject with a GatewayError. Streaming calls report backend
 * failures as a terminal ERROR chunk instead, since the caller may already
 * be consuming earlier chunks; caller errors such as invalid turns are
 * thrown before the stream starts.
 */
export interface BackendAdapter {
  readonly id: ModelId;
  readonly config: BackendConfig;
  generate(prompt: string, options?: CallOptions): Promise<string>;
  generateStream(prompt: string, options?: CallOptions): AsyncIterable<ResultChunk>;
  converse(turns: ReadonlyArray<TurnInput>, options?: CallOptions): Promise<string>;
  converseStream(turns: ReadonlyArray<TurnInput>, options?: CallOptions): AsyncIterable<ResultChunk>;
}

export type AdapterFactory = (config: BackendConfig) => BackendAdapter;
