import type { Logger } from 'pino';
import type { ModelId, OriginState, ResultChunk } from '../types/index.js';
import {
  CancelledError,
  GatewayError,
  MalformedResponseError,
  TimeoutError,
  toGatewayError,
} from '../types/index.js';

export type OriginSource = {
  readonly origin: ModelId;
  /** Opens the origin's chunk stream; the adapter call must honor `signal`. */
  readonly open: (signal: AbortSignal) => AsyncIterable<ResultChunk>;
  readonly timeoutMs: number;
};

type Aborted = { readonly aborted: GatewayError };

/**
 * One origin's stream inside a merge. Re-numbers chunks from 0, guarantees a
 * single terminal chunk and owns the origin's deadline and cancellation.
 * `next()` never rejects: every failure becomes a terminal ERROR chunk.
 */
export class OriginTask {
  readonly origin: ModelId;
  private currentState: OriginState = 'pending';
  private index = 0;
  private readonly controller = new AbortController();
  private readonly abortedPromise: Promise<Aborted>;
  private iterator: AsyncIterator<ResultChunk> | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private readonly source: OriginSource;
  private readonly logger: Logger;
  private readonly parentSignal: AbortSignal | undefined;
  private readonly onParentAbort = (): void => {
    this.cancel(new CancelledError(`stream from '${this.origin}' was cancelled by the caller`));
  };

  constructor(source: OriginSource, logger: Logger, parentSignal?: AbortSignal) {
    this.source = source;
    this.logger = logger;
    this.origin = source.origin;
    this.parentSignal = parentSignal;
    this.abortedPromise = new Promise<Aborted>((resolve) => {
      this.controller.signal.addEventListener(
        'abort',
        () => {
          const reason: unknown = this.controller.signal.reason;
          resolve({ aborted: toGatewayError(reason) });
        },
        { once: true },
      );
    });
  }

  get state(): OriginState {
    return this.currentState;
  }

  get isTerminal(): boolean {
    return this.currentState === 'completed' || this.currentState === 'failed';
  }

  async next(): Promise<ResultChunk> {
    if (this.iterator === null) {
      this.start();
    }
    const iterator = this.iterator;
    if (iterator === null || this.controller.signal.aborted) {
      const reason: unknown = this.controller.signal.reason;
      return this.fail(toGatewayError(reason ?? new CancelledError(`stream from '${this.origin}' was not started`)));
    }

    let outcome: IteratorResult<ResultChunk> | Aborted;
    try {
      outcome = await Promise.race([iterator.next(), this.abortedPromise]);
    } catch (err) {
      return this.fail(toGatewayError(err));
    }

    if ('aborted' in outcome) {
      return this.fail(outcome.aborted);
    }

    if (outcome.done) {
      return this.fail(
        new MalformedResponseError(`stream from '${this.origin}' ended without a terminal chunk`),
      );
    }

    const chunk = outcome.value;
    const index = this.index++;

    switch (chunk.type) {
      case 'TEXT_DELTA':
        this.currentState = 'streaming';
        return { ...chunk, origin: this.origin, index };
      case 'FINISH':
        this.settle('completed');
        return { ...chunk, origin: this.origin, index };
      case 'ERROR':
        this.settle('failed');
        return { ...chunk, origin: this.origin, index };
    }
  }

  /**
   * Aborts the origin's adapter call. A pending `next()` resolves with an
   * ERROR chunk carrying `reason`.
   */
  cancel(reason: GatewayError): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(reason);
    }
  }

  private start(): void {
    if (this.parentSignal?.aborted) {
      this.onParentAbort();
      return;
    }
    this.parentSignal?.addEventListener('abort', this.onParentAbort, { once: true });

    this.timer = setTimeout(() => {
      this.cancel(
        new TimeoutError(
          `stream from '${this.origin}' timed out after ${this.source.timeoutMs}ms`,
          this.source.timeoutMs,
        ),
      );
    }, this.source.timeoutMs);

    try {
      this.iterator = this.source.open(this.controller.signal)[Symbol.asyncIterator]();
    } catch (err) {
      this.cancel(toGatewayError(err));
    }
  }

  private fail(error: GatewayError): ResultChunk {
    this.settle('failed');
    const level = error.kind === 'Cancelled' ? 'debug' : 'warn';
    this.logger[level]({ origin: this.origin, kind: error.kind, err: error.message }, 'origin failed');
    return {
      origin: this.origin,
      index: this.index++,
      type: 'ERROR',
      error: error.toDescriptor(),
      terminal: true,
    };
  }

  private settle(state: 'completed' | 'failed'): void {
    this.currentState = state;
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.parentSignal?.removeEventListener('abort', this.onParentAbort);

    if (state === 'failed') {
      // Tear down whatever the adapter still has open
      this.cancel(new CancelledError(`stream from '${this.origin}' was closed`));
    }
    // Never awaited; the merge ends without waiting for the source
    void this.close();
  }

  private async close(): Promise<void> {
    const iterator = this.iterator;
    if (iterator === null || iterator.return === undefined) {
      return;
    }
    try {
      await iterator.return();
    } catch (err) {
      this.logger.debug(
        { origin: this.origin, err: err instanceof Error ? err.message : String(err) },
        'error while closing origin stream',
      );
    }
  }
}
