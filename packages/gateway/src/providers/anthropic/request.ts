import type { BackendConfig, Turn } from '../../types/index.js';
import { DEFAULT_MAX_TOKENS, type VendorRequest } from '../http-adapter.js';

export const ANTHROPIC_VERSION = '2023-06-01';

type AnthropicMessage = {
  role: 'user' | 'assistant';
  content: string;
};

export function translateRequest(
  turns: ReadonlyArray<Turn>,
  config: BackendConfig,
  streaming: boolean = false,
): VendorRequest {
  const url = `${config.endpoint}/messages`;
  const headers: Record<string, string> = {
    'x-api-key': config.credential,
    'anthropic-version': ANTHROPIC_VERSION,
    'Content-Type': 'application/json',
  };

  // System turns go in the top-level `system` field
  const systemParts: Array<string> = [];
  const messages: Array<AnthropicMessage> = [];

  for (const turn of turns) {
    if (turn.role === 'system') {
      systemParts.push(turn.content);
      continue;
    }

    // Consecutive turns of one role are merged; the API requires alternation
    const previous = messages[messages.length - 1];
    if (previous && previous.role === turn.role) {
      previous.content = `${previous.content}\n\n${turn.content}`;
    } else {
      messages.push({ role: turn.role, content: turn.content });
    }
  }

  const body: Record<string, unknown> = {
    model: config.model,
    max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
    messages,
  };

  if (systemParts.length > 0) {
    body['system'] = systemParts.join('\n\n');
  }

  if (streaming) {
    body['stream'] = true;
  }

  return { url, headers, body };
}
