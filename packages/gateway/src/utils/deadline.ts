import {
  CancelledError,
  GatewayError,
  TimeoutError,
  toGatewayError,
} from '../types/error.js';

export const DEFAULT_TIMEOUT_MS = 30_000;

export type Deadline = {
  readonly signal: AbortSignal;
  /**
   * Maps a failure to the abort reason when the timer or the caller aborted
   * the call, so that a torn-down fetch reads as Timeout or Cancelled rather
   * than as a transport error.
   */
  classify(err: unknown): GatewayError;
  /** Clears the timer and aborts anything still attached to the signal. */
  dispose(): void;
};

/**
 * Creates an abort signal that fires after `timeoutMs` or when `external`
 * aborts, whichever comes first. The signal's reason is always a
 * GatewayError.
 */
export function createDeadline(
  timeoutMs: number,
  label: string,
  external?: AbortSignal,
): Deadline {
  const controller = new AbortController();

  const onExternalAbort = (): void => {
    controller.abort(new CancelledError(`${label} was cancelled`));
  };

  if (external?.aborted) {
    onExternalAbort();
  } else {
    external?.addEventListener('abort', onExternalAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
  }, timeoutMs);

  return {
    signal: controller.signal,

    classify(err: unknown): GatewayError {
      const reason: unknown = controller.signal.reason;
      if (controller.signal.aborted && reason instanceof GatewayError) {
        return reason;
      }
      return toGatewayError(err);
    },

    dispose(): void {
      clearTimeout(timer);
      external?.removeEventListener('abort', onExternalAbort);
      if (!controller.signal.aborted) {
        controller.abort(new CancelledError(`${label} was released`));
      }
    },
  };
}

/** Resolves the effective deadline: call override, backend setting, default. */
export function resolveTimeout(
  override: number | undefined,
  configured: number | undefined,
  fallback: number = DEFAULT_TIMEOUT_MS,
): number {
  return override ?? configured ?? fallback;
}

type Raced<T> = { readonly value: T } | { readonly error: GatewayError };

/**
 * Runs `run` under a deadline. The returned promise settles when the
 * deadline or `external` fires even if `run` ignores its signal; the signal
 * is still aborted so a cooperative callee can release its resources.
 */
export async function withDeadline<T>(
  timeoutMs: number,
  label: string,
  external: AbortSignal | undefined,
  run: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const deadline = createDeadline(timeoutMs, label, external);
  const aborted = new Promise<Raced<T>>((resolve) => {
    deadline.signal.addEventListener(
      'abort',
      () => resolve({ error: deadline.classify(deadline.signal.reason) }),
      { once: true },
    );
  });

  try {
    if (deadline.signal.aborted) {
      throw deadline.classify(deadline.signal.reason);
    }
    const outcome = await Promise.race([
      run(deadline.signal).then((value): Raced<T> => ({ value })),
      aborted,
    ]);
    if ('error' in outcome) {
      throw outcome.error;
    }
    return outcome.value;
  } catch (err) {
    throw deadline.classify(err);
  } finally {
    deadline.dispose();
  }
}
