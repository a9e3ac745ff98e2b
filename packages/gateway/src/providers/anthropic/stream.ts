import { z } from 'zod';
import { BackendError, MalformedResponseError } from '../../types/index.js';
import type { SSEEvent } from '../../utils/sse.js';

const eventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('content_block_delta'),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  }),
  z.object({ type: z.literal('message_stop') }),
  z.object({
    type: z.literal('error'),
    error: z.object({ type: z.string().optional(), message: z.string() }),
  }),
]);

const KNOWN_EVENT_TYPES: ReadonlySet<string> = new Set(['content_block_delta', 'message_stop', 'error']);

const typedEventSchema = z.object({ type: z.string() });

/**
 * Yields text deltas from a messages event stream. Events other than text
 * deltas, `message_stop` and `error` (message_start, ping, ...) carry no text
 * and are skipped.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
): AsyncGenerator<string> {
  for await (const event of sseStream) {
    if (!event.data) {
      continue;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(event.data);
    } catch {
      throw new MalformedResponseError(`stream event is not valid JSON: ${event.data}`);
    }

    const typed = typedEventSchema.safeParse(parsed);
    if (!typed.success) {
      throw new MalformedResponseError('stream event has no type');
    }
    if (!KNOWN_EVENT_TYPES.has(typed.data.type)) {
      continue;
    }

    const result = eventSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedResponseError(`unexpected '${typed.data.type}' event`);
    }

    const data = result.data;
    switch (data.type) {
      case 'content_block_delta':
        if (data.delta.type === 'text_delta' && data.delta.text) {
          yield data.delta.text;
        }
        break;

      case 'message_stop':
        return;

      case 'error':
        throw new BackendError(data.error.message, null);
    }
  }
}
