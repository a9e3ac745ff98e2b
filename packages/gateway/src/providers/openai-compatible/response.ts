import { z } from 'zod';
import { MalformedResponseError } from '../../types/index.js';

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      }),
    )
    .min(1),
});

export function translateResponse(raw: unknown): string {
  const result = completionSchema.safeParse(raw);
  if (!result.success) {
    throw new MalformedResponseError(
      `unexpected chat completion payload: ${result.error.issues[0]?.message ?? 'invalid shape'}`,
    );
  }

  const [firstChoice] = result.data.choices;
  return firstChoice?.message.content ?? '';
}
