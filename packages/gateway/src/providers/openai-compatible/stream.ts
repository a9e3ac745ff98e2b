import { z } from 'zod';
import { BackendError, MalformedResponseError } from '../../types/index.js';
import type { SSEEvent } from '../../utils/sse.js';

const chunkSchema = z.object({
  choices: z
    .array(
      z.object({
        delta: z
          .object({
            content: z.string().nullish(),
          })
          .optional(),
        finish_reason: z.string().nullish(),
      }),
    )
    .optional(),
  error: z.object({ message: z.string() }).optional(),
});

/**
 * Yields content deltas from a chat-completions event stream until the
 * `[DONE]` sentinel or the end of the body.
 */
export async function* translateStream(
  sseStream: AsyncIterable<SSEEvent>,
): AsyncGenerator<string> {
  for await (const event of sseStream) {
    if (!event.data) {
      continue;
    }
    if (event.data === '[DONE]') {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(event.data);
    } catch {
      throw new MalformedResponseError(`stream event is not valid JSON: ${event.data}`);
    }

    const result = chunkSchema.safeParse(parsed);
    if (!result.success) {
      throw new MalformedResponseError('unexpected chat completion chunk');
    }

    // Some compatible servers report failures inside the stream
    if (result.data.error) {
      throw new BackendError(result.data.error.message, null);
    }

    const content = result.data.choices?.[0]?.delta?.content;
    if (content) {
      yield content;
    }
  }
}
