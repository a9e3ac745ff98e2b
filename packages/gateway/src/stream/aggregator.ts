import type { Logger } from 'pino';
import type { ModelId, OriginState, ResultChunk } from '../types/index.js';
import { CancelledError, ConfigurationError } from '../types/index.js';
import { silentLogger } from '../logging/index.js';
import { OriginTask, type OriginSource } from './origin-task.js';

export type AggregatorOptions = {
  /** Caller cancellation; aborting it cancels every origin still running. */
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
};

export type AggregatedStream = AsyncIterable<ResultChunk> & {
  /** Current state of every origin, keyed by model identifier. */
  states(): Readonly<Record<ModelId, OriginState>>;
};

type Pulled = {
  readonly task: OriginTask;
  readonly chunk: ResultChunk;
};

/**
 * Merges independent per-origin chunk streams into one sequence.
 *
 * Chunks are yielded as they become available; only per-origin order is
 * kept. The merged sequence ends once every origin has produced its terminal
 * chunk. One origin failing or timing out does not touch the others. When the
 * consumer stops early, every origin still running is cancelled and marked
 * failed before iteration returns. Origin sources are closed in the
 * background; iteration never waits on them.
 */
export class StreamAggregator implements AggregatedStream {
  private readonly tasks: ReadonlyArray<OriginTask>;
  private readonly logger: Logger;
  private started = false;

  constructor(sources: ReadonlyArray<OriginSource>, options: AggregatorOptions = {}) {
    this.logger = options.logger ?? silentLogger();

    const seen = new Set<ModelId>();
    for (const source of sources) {
      if (seen.has(source.origin)) {
        throw new ConfigurationError(`origin '${source.origin}' appears more than once in one merge`);
      }
      seen.add(source.origin);
    }

    this.tasks = sources.map((source) => new OriginTask(source, this.logger, options.signal));
  }

  states(): Readonly<Record<ModelId, OriginState>> {
    const states: Record<ModelId, OriginState> = {};
    for (const task of this.tasks) {
      states[task.origin] = task.state;
    }
    return states;
  }

  [Symbol.asyncIterator](): AsyncIterator<ResultChunk> {
    if (this.started) {
      throw new ConfigurationError('an aggregated stream can only be iterated once');
    }
    this.started = true;
    return this.merge();
  }

  private async* merge(): AsyncGenerator<ResultChunk> {
    const inflight = new Map<OriginTask, Promise<Pulled>>();
    const pull = (task: OriginTask): Promise<Pulled> =>
      task.next().then((chunk) => ({ task, chunk }));

    const startedAt = Date.now();
    for (const task of this.tasks) {
      inflight.set(task, pull(task));
    }

    try {
      while (inflight.size > 0) {
        const { task, chunk } = await Promise.race(inflight.values());
        if (chunk.terminal) {
          inflight.delete(task);
        } else {
          inflight.set(task, pull(task));
        }
        yield chunk;
      }
    } finally {
      if (inflight.size > 0) {
        this.logger.debug({ origins: Array.from(inflight.keys(), (t) => t.origin) }, 'cancelling unfinished origins');
        for (const task of inflight.keys()) {
          task.cancel(new CancelledError(`stream from '${task.origin}' was cancelled by the caller`));
        }
        // Pending pulls resolve with the cancellation chunk
        await Promise.all(inflight.values());
        // A pull that already returned an unread delta leaves its task open
        await Promise.all(this.tasks.filter((task) => !task.isTerminal).map((task) => task.next()));
      }
      this.logger.info({ states: this.states(), elapsedMs: Date.now() - startedAt }, 'stream closed');
    }
  }
}
