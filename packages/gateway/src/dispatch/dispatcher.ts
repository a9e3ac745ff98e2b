import { nanoid } from 'nanoid';
import type { Logger } from 'pino';
import type {
  AggregatedResponse,
  BackendAdapter,
  CallOptions,
  ConversationRequest,
  GenerationRequest,
  ModelId,
  OriginResult,
  ResultChunk,
} from '../types/index.js';
import { describeError, failure, success } from '../types/index.js';
import type { ModelRegistry } from '../registry/index.js';
import { createLogger } from '../logging/index.js';
import { StreamAggregator, type AggregatedStream, type OriginSource } from '../stream/index.js';
import {
  splitReasoning,
  streamReasoning,
  withReasoningInstruction,
  type ReasonedAnswer,
  type ReasoningEvent,
} from '../reasoning/index.js';
import { DEFAULT_TIMEOUT_MS, resolveTimeout, withDeadline } from '../utils/deadline.js';
import { validateTurns } from '../utils/turns.js';

export type DispatcherOptions = {
  readonly registry: ModelRegistry;
  readonly logger?: Logger;
  /** Deadline for a call when neither the call nor the backend sets one. */
  readonly defaultTimeoutMs?: number;
};

/** Per-call options: a caller cancellation signal and a deadline override. */
export type DispatchOptions = CallOptions;

export type ReasoningRequest = Omit<ConversationRequest, 'stream'> & {
  readonly stream?: boolean;
  /** Report the model's reasoning beside the answer; defaults to true. */
  readonly showReasoning?: boolean;
};

type Streaming<T> = T & { readonly stream: true };
type Buffered<T> = T & { readonly stream: false };

/**
 * Routes requests to adapters through the registry.
 *
 * Buffered calls resolve with text (single model) or with one result per
 * registered model (fan-out); streaming calls return a merged chunk stream.
 * The dispatcher enforces each origin's deadline itself and never retries.
 */
export class Dispatcher {
  private readonly registry: ModelRegistry;
  private readonly logger: Logger;
  private readonly defaultTimeoutMs: number;

  constructor(options: DispatcherOptions) {
    this.registry = options.registry;
    this.logger = options.logger ?? createLogger();
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  listModels(): ReadonlyArray<ModelId> {
    return this.registry.list();
  }

  /**
   * Generates with one model. The buffered form rejects with the adapter's
   * error; the streaming form throws UnknownModelError before any chunk and
   * reports backend failures as a terminal ERROR chunk.
   */
  dispatchSingle(id: ModelId, request: Streaming<GenerationRequest>, options?: DispatchOptions): AggregatedStream;
  dispatchSingle(id: ModelId, request: Buffered<GenerationRequest>, options?: DispatchOptions): Promise<string>;
  dispatchSingle(
    id: ModelId,
    request: GenerationRequest,
    options?: DispatchOptions,
  ): Promise<string> | AggregatedStream;
  dispatchSingle(
    id: ModelId,
    request: GenerationRequest,
    options: DispatchOptions = {},
  ): Promise<string> | AggregatedStream {
    const log = this.callLogger('dispatchSingle', id);

    if (request.stream) {
      const adapter = this.registry.resolve(id);
      return this.merge(
        [this.source(adapter, options, (callOptions) => adapter.generateStream(request.prompt, callOptions))],
        options,
        log,
      );
    }

    return this.buffered(log, async () => {
      const adapter = this.registry.resolve(id);
      return this.invoke(adapter, options, (callOptions) => adapter.generate(request.prompt, callOptions));
    });
  }

  /**
   * Generates with every registered model concurrently. Each origin succeeds
   * or fails on its own; the buffered form resolves once all have settled,
   * with one entry per model in registry order.
   */
  dispatchAll(request: Streaming<GenerationRequest>, options?: DispatchOptions): AggregatedStream;
  dispatchAll(request: Buffered<GenerationRequest>, options?: DispatchOptions): Promise<AggregatedResponse>;
  dispatchAll(
    request: GenerationRequest,
    options?: DispatchOptions,
  ): Promise<AggregatedResponse> | AggregatedStream;
  dispatchAll(
    request: GenerationRequest,
    options: DispatchOptions = {},
  ): Promise<AggregatedResponse> | AggregatedStream {
    const log = this.callLogger('dispatchAll');
    const adapters = this.registry.list().map((id) => this.registry.resolve(id));

    if (request.stream) {
      return this.merge(
        adapters.map((adapter) =>
          this.source(adapter, options, (callOptions) => adapter.generateStream(request.prompt, callOptions)),
        ),
        options,
        log,
      );
    }

    return this.buffered(log, () => this.fanOut(adapters, options, log, (adapter, callOptions) =>
      adapter.generate(request.prompt, callOptions),
    ));
  }

  /**
   * Runs a conversation against `request.model`. Turns are validated before
   * any backend is contacted.
   */
  converse(request: Streaming<ConversationRequest>, options?: DispatchOptions): AggregatedStream;
  converse(request: Buffered<ConversationRequest>, options?: DispatchOptions): Promise<string>;
  converse(request: ConversationRequest, options?: DispatchOptions): Promise<string> | AggregatedStream;
  converse(request: ConversationRequest, options: DispatchOptions = {}): Promise<string> | AggregatedStream {
    const log = this.callLogger('converse', request.model);

    if (request.stream) {
      const adapter = this.registry.resolve(request.model);
      const turns = validateTurns(request.turns);
      return this.merge(
        [this.source(adapter, options, (callOptions) => adapter.converseStream(turns, callOptions))],
        options,
        log,
      );
    }

    return this.buffered(log, async () => {
      const adapter = this.registry.resolve(request.model);
      const turns = validateTurns(request.turns);
      return this.invoke(adapter, options, (callOptions) => adapter.converse(turns, callOptions));
    });
  }

  /**
   * Conversation in which the model is asked to lay out its reasoning before
   * answering; the reply is split into the two parts. The streaming form
   * reports the split as it grows and ends with a FINISH or ERROR event.
   */
  converseWithReasoning(request: Streaming<ReasoningRequest>, options?: DispatchOptions): AsyncIterable<ReasoningEvent>;
  converseWithReasoning(
    request: ReasoningRequest & { readonly stream?: false },
    options?: DispatchOptions,
  ): Promise<ReasonedAnswer>;
  converseWithReasoning(
    request: ReasoningRequest,
    options?: DispatchOptions,
  ): Promise<ReasonedAnswer> | AsyncIterable<ReasoningEvent>;
  converseWithReasoning(
    request: ReasoningRequest,
    options: DispatchOptions = {},
  ): Promise<ReasonedAnswer> | AsyncIterable<ReasoningEvent> {
    const log = this.callLogger('converseWithReasoning', request.model);
    const showReasoning = request.showReasoning ?? true;

    if (request.stream) {
      const adapter = this.registry.resolve(request.model);
      const turns = withReasoningInstruction(validateTurns(request.turns));
      const merged = this.merge(
        [this.source(adapter, options, (callOptions) => adapter.converseStream(turns, callOptions))],
        options,
        log,
      );
      return streamReasoning(merged, showReasoning);
    }

    return this.buffered(log, async () => {
      const adapter = this.registry.resolve(request.model);
      const turns = withReasoningInstruction(validateTurns(request.turns));
      const text = await this.invoke(adapter, options, (callOptions) => adapter.converse(turns, callOptions));
      const answer = splitReasoning(text);
      return showReasoning ? answer : { response: answer.response, reasoning: '' };
    });
  }

  private async fanOut(
    adapters: ReadonlyArray<BackendAdapter>,
    options: DispatchOptions,
    log: Logger,
    call: (adapter: BackendAdapter, callOptions: CallOptions) => Promise<string>,
  ): Promise<AggregatedResponse> {
    const entries = await Promise.all(
      adapters.map(async (adapter): Promise<[ModelId, OriginResult]> => {
        try {
          const text = await this.invoke(adapter, options, (callOptions) => call(adapter, callOptions));
          return [adapter.id, success(text)];
        } catch (err) {
          const error = describeError(err);
          const level = error.kind === 'Cancelled' ? 'debug' : 'warn';
          log[level]({ origin: adapter.id, kind: error.kind, err: error.message }, 'origin failed');
          return [adapter.id, failure(error)];
        }
      }),
    );

    return Object.fromEntries(entries);
  }

  private invoke(
    adapter: BackendAdapter,
    options: DispatchOptions,
    call: (callOptions: CallOptions) => Promise<string>,
  ): Promise<string> {
    const timeoutMs = this.timeoutFor(adapter, options);
    return withDeadline(timeoutMs, `request to '${adapter.id}'`, options.signal, (signal) =>
      call({ signal, timeoutMs }),
    );
  }

  private source(
    adapter: BackendAdapter,
    options: DispatchOptions,
    open: (callOptions: CallOptions) => AsyncIterable<ResultChunk>,
  ): OriginSource {
    const timeoutMs = this.timeoutFor(adapter, options);
    return {
      origin: adapter.id,
      timeoutMs,
      open: (signal) => open({ signal, timeoutMs }),
    };
  }

  private merge(
    sources: ReadonlyArray<OriginSource>,
    options: DispatchOptions,
    log: Logger,
  ): AggregatedStream {
    log.debug({ origins: sources.map((source) => source.origin) }, 'stream opened');
    return new StreamAggregator(sources, { logger: log, signal: options.signal });
  }

  private async buffered<T>(log: Logger, run: () => Promise<T>): Promise<T> {
    const startedAt = Date.now();
    try {
      const result = await run();
      log.info({ elapsedMs: Date.now() - startedAt }, 'request completed');
      return result;
    } catch (err) {
      const error = describeError(err);
      log.warn({ elapsedMs: Date.now() - startedAt, kind: error.kind, err: error.message }, 'request failed');
      throw err;
    }
  }

  private timeoutFor(adapter: BackendAdapter, options: DispatchOptions): number {
    return resolveTimeout(options.timeoutMs, adapter.config.timeoutMs, this.defaultTimeoutMs);
  }

  private callLogger(operation: string, model?: ModelId): Logger {
    return this.logger.child({
      requestId: nanoid(10),
      operation,
      ...(model !== undefined ? { model } : {}),
    });
  }
}
