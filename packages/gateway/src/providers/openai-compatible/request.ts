import type { BackendConfig, Turn } from '../../types/index.js';
import { DEFAULT_MAX_TOKENS, type VendorRequest } from '../http-adapter.js';

export function translateRequest(
  turns: ReadonlyArray<Turn>,
  config: BackendConfig,
  streaming: boolean = false,
): VendorRequest {
  const url = `${config.endpoint}/chat/completions`;
  const headers: Record<string, string> = {
    Authorization: `Bearer ${config.credential}`,
    'Content-Type': 'application/json',
  };

  const body: Record<string, unknown> = {
    model: config.model,
    messages: turns.map((turn) => ({ role: turn.role, content: turn.content })),
    max_tokens: config.maxTokens ?? DEFAULT_MAX_TOKENS,
  };

  if (streaming) {
    body['stream'] = true;
  }

  return { url, headers, body };
}
