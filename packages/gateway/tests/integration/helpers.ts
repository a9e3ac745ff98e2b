import { vi, type Mock } from 'vitest';
import {
  Dispatcher,
  ModelRegistry,
  loadGatewayConfig,
  silentLogger,
  type GatewayConfig,
} from '../../src/index.js';

export type Route = (init: RequestInit | undefined) => Response | Promise<Response>;

const encoder = new TextEncoder();

/** Gateway with an OpenAI-compatible backend `a` and an Anthropic backend `b`. */
export function createGateway(): {
  readonly config: GatewayConfig;
  readonly dispatcher: Dispatcher;
} {
  const config = loadGatewayConfig(
    {
      models: {
        a: { endpoint: 'a.example.com/v1', model: 'gpt-test', credentialEnv: 'A_API_KEY' },
        b: { vendor: 'anthropic', endpoint: 'https://b.example.com/v1/', model: 'claude-test', credential: 'test-key' },
      },
    },
    { A_API_KEY: 'test-key' },
  );
  const dispatcher = new Dispatcher({
    registry: ModelRegistry.fromConfig(config),
    logger: silentLogger(),
    defaultTimeoutMs: config.defaultTimeoutMs,
  });
  return { config, dispatcher };
}

function urlOf(input: string | URL | Request): string {
  if (typeof input === 'string') {
    return input;
  }
  return input instanceof URL ? input.href : input.url;
}

/**
 * Installs a fetch stub that answers by exact URL. Unrouted URLs fail the
 * way an unreachable host would.
 */
export function stubFetch(routes: Readonly<Record<string, Route>>): Mock<typeof fetch> {
  const fetchMock = vi.fn<typeof fetch>(async (input, init) => {
    const route = routes[urlOf(input)];
    if (!route) {
      throw new TypeError('fetch failed');
    }
    return route(init);
  });
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

export function requestBody(init: RequestInit | undefined): unknown {
  const body = init?.body;
  if (typeof body !== 'string') {
    throw new Error('expected a JSON request body');
  }
  const parsed: unknown = JSON.parse(body);
  return parsed;
}

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

export function chatCompletion(content: string): Response {
  return jsonResponse({ choices: [{ index: 0, message: { role: 'assistant', content }, finish_reason: 'stop' }] });
}

export function anthropicMessage(text: string): Response {
  return jsonResponse({ type: 'message', role: 'assistant', content: [{ type: 'text', text }] });
}

function sseFrames(frames: ReadonlyArray<{ readonly event?: string; readonly data: string }>): string {
  return frames
    .map(({ event, data }) => (event !== undefined ? `event: ${event}\ndata: ${data}\n\n` : `data: ${data}\n\n`))
    .join('');
}

export function chatCompletionStream(parts: ReadonlyArray<string>): Response {
  const frames = parts.map((content) => ({ data: JSON.stringify({ choices: [{ index: 0, delta: { content } }] }) }));
  return new Response(sseFrames([...frames, { data: '[DONE]' }]), {
    headers: { 'Content-Type': 'text/event-stream' },
  });
}

export function anthropicStream(parts: ReadonlyArray<string>): Response {
  const deltas = parts.map((text) => ({
    event: 'content_block_delta',
    data: JSON.stringify({ type: 'content_block_delta', index: 0, delta: { type: 'text_delta', text } }),
  }));
  return new Response(
    sseFrames([
      { event: 'message_start', data: JSON.stringify({ type: 'message_start', message: { id: 'msg-1' } }) },
      ...deltas,
      { event: 'message_stop', data: JSON.stringify({ type: 'message_stop' }) },
    ]),
    { headers: { 'Content-Type': 'text/event-stream' } },
  );
}

/**
 * Streaming response that sends `head` and then nothing more; its body fails
 * with the abort reason once the request signal aborts.
 */
export function stalledStream(init: RequestInit | undefined, head: string = ''): Response {
  const signal = init?.signal ?? undefined;
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      if (head) {
        controller.enqueue(encoder.encode(head));
      }
      signal?.addEventListener('abort', () => controller.error(signal.reason));
    },
  });
  return new Response(body, { headers: { 'Content-Type': 'text/event-stream' } });
}
