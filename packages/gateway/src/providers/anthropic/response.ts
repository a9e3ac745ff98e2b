import { z } from 'zod';
import { MalformedResponseError } from '../../types/index.js';

const messageSchema = z.object({
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    }),
  ),
});

export function translateResponse(raw: unknown): string {
  const result = messageSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedResponseError(
      `unexpected messages payload: ${result.error.issues[0]?.message ?? 'invalid shape'}`,
    );
  }

  return result.data.content
    .filter((block) => block.type === 'text')
    .map((block) => block.text ?? '')
    .join('');
}
