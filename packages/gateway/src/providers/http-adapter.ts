import type {
  BackendAdapter,
  BackendConfig,
  CallOptions,
  ModelId,
  ResultChunk,
  Turn,
  TurnInput,
} from '../types/index.js';
import { userTurn } from '../types/index.js';
import { createDeadline, resolveTimeout } from '../utils/deadline.js';
import { fetchJson, fetchStream } from '../utils/http.js';
import { createSSEStream, type SSEEvent } from '../utils/sse.js';
import { validateTurns } from '../utils/turns.js';

/** Completion length bound when a backend sets no `maxTokens`. */
export const DEFAULT_MAX_TOKENS = 1024;

export type VendorRequest = {
  readonly url: string;
  readonly headers: Record<string, string>;
  readonly body: Record<string, unknown>;
};

/**
 * Shared plumbing for adapters that speak JSON over HTTP with SSE streaming.
 * A vendor supplies the three translations; everything about deadlines,
 * cancellation, chunk numbering and error normalization lives here.
 */
export abstract class HttpBackendAdapter implements BackendAdapter {
  readonly id: ModelId;
  readonly config: BackendConfig;

  constructor(config: BackendConfig) {
    this.id = config.id;
    this.config = config;
  }

  protected abstract translateRequest(turns: ReadonlyArray<Turn>, streaming: boolean): VendorRequest;

  /** Extracts the completion text; throws MalformedResponseError on an unexpected shape. */
  protected abstract translateResponse(raw: unknown): string;

  /** Yields text deltas; throws on a vendor error event or an unparseable event. */
  protected abstract translateStream(events: AsyncIterable<SSEEvent>): AsyncIterable<string>;

  generate(prompt: string, options?: CallOptions): Promise<string> {
    return this.complete([userTurn(prompt)], options);
  }

  generateStream(prompt: string, options?: CallOptions): AsyncIterable<ResultChunk> {
    return this.streamChunks([userTurn(prompt)], options);
  }

  async converse(turns: ReadonlyArray<TurnInput>, options?: CallOptions): Promise<string> {
    return this.complete(validateTurns(turns), options);
  }

  converseStream(turns: ReadonlyArray<TurnInput>, options?: CallOptions): AsyncIterable<ResultChunk> {
    return this.streamChunks(validateTurns(turns), options);
  }

  private async complete(turns: ReadonlyArray<Turn>, options?: CallOptions): Promise<string> {
    const { url, headers, body } = this.translateRequest(turns, false);
    const deadline = createDeadline(
      resolveTimeout(options?.timeoutMs, this.config.timeoutMs),
      `request to '${this.id}'`,
      options?.signal,
    );

    try {
      const raw = await fetchJson({ url, headers, body, signal: deadline.signal });
      return this.translateResponse(raw);
    } catch (err) {
      throw deadline.classify(err);
    } finally {
      deadline.dispose();
    }
  }

  private async* streamChunks(
    turns: ReadonlyArray<Turn>,
    options?: CallOptions,
  ): AsyncGenerator<ResultChunk> {
    const origin = this.id;
    const { url, headers, body } = this.translateRequest(turns, true);
    const deadline = createDeadline(
      resolveTimeout(options?.timeoutMs, this.config.timeoutMs),
      `stream from '${origin}'`,
      options?.signal,
    );

    let index = 0;
    const parts: Array<string> = [];

    try {
      const response = await fetchStream({ url, headers, body, signal: deadline.signal });
      for await (const text of this.translateStream(createSSEStream(response))) {
        parts.push(text);
        yield { origin, index: index++, type: 'TEXT_DELTA', text, terminal: false };
      }
    } catch (err) {
      const error = deadline.classify(err).toDescriptor();
      yield { origin, index: index++, type: 'ERROR', error, terminal: true };
      return;
    } finally {
      deadline.dispose();
    }

    yield { origin, index: index++, type: 'FINISH', text: parts.join(''), terminal: true };
  }
}
