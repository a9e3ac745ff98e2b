import { EventSourceParserStream } from 'eventsource-parser/stream';
import { BackendError, GatewayError } from '../types/error.js';

export type SSEEvent = {
  readonly event: string;
  readonly data: string;
  readonly id?: string;
};

/**
 * Creates an async iterable of SSE events from a Response body.
 * Pipes the response body through EventSourceParserStream and yields parsed events.
 * Stopping iteration early cancels the body.
 */
export async function* createSSEStream(
  response: globalThis.Response,
): AsyncGenerator<SSEEvent> {
  const body = response.body;
  if (!body) {
    throw new BackendError('response body is empty', response.status);
  }

  const reader = body
    .pipeThrough(new TextDecoderStream())
    .pipeThrough(new EventSourceParserStream())
    .getReader();

  let finished = false;
  try {
    while (true) {
      const { done, value } = await reader.read();

      if (done) {
        finished = true;
        break;
      }

      yield {
        event: value.event ?? '',
        data: value.data,
        ...(value.id ? { id: value.id } : {}),
      };
    }
  } catch (err) {
    finished = true;
    if (err instanceof GatewayError) {
      throw err;
    }
    throw new BackendError(
      `failed to read event stream: ${err instanceof Error ? err.message : String(err)}`,
      null,
      null,
      err instanceof Error ? err : undefined,
    );
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
