import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAICompatibleAdapter, translateRequest, translateStream } from './index.js';
import type { BackendConfig, ResultChunk } from '../../types/index.js';
import { BackendError, InvalidTurnsError, MalformedResponseError, TimeoutError } from '../../types/index.js';
import type { SSEEvent } from '../../utils/sse.js';

const config: BackendConfig = {
  id: 'a',
  vendor: 'openai-compatible',
  endpoint: 'https://api.example.com/v1',
  credential: 'test-key',
  model: 'gpt-test',
};

function sseResponse(lines: ReadonlyArray<string>): Response {
  return new Response(lines.map((data) => `data: ${data}\n\n`).join(''), { status: 200 });
}

function delta(content: string): string {
  return JSON.stringify({ choices: [{ delta: { content } }] });
}

async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

async function* events(data: ReadonlyArray<string>): AsyncGenerator<SSEEvent> {
  for (const item of data) {
    yield { event: '', data: item };
  }
}

describe('OpenAI-Compatible Adapter', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function getCallBody(): unknown {
    const body = fetchMock.mock.calls[0]?.[1]?.body;
    if (typeof body !== 'string') {
      throw new Error('expected a JSON request body');
    }
    const parsed: unknown = JSON.parse(body);
    return parsed;
  }

  describe('translateRequest', () => {
    it('targets the chat completions endpoint with a bearer credential', () => {
      const request = translateRequest([{ role: 'user', content: 'hi' }], config);

      expect(request.url).toBe('https://api.example.com/v1/chat/completions');
      expect(request.headers['Authorization']).toBe('Bearer test-key');
      expect(request.body).toEqual({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'hi' }],
        max_tokens: 1024,
      });
    });

    it('keeps system turns in the message list and honors maxTokens', () => {
      const request = translateRequest(
        [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'hi' },
        ],
        { ...config, maxTokens: 64 },
        true,
      );

      expect(request.body).toEqual({
        model: 'gpt-test',
        messages: [
          { role: 'system', content: 'be brief' },
          { role: 'user', content: 'hi' },
        ],
        max_tokens: 64,
        stream: true,
      });
    });
  });

  describe('translateStream', () => {
    it('stops at the [DONE] sentinel', async () => {
      const texts = await collect(translateStream(events([delta('a'), '[DONE]', delta('ignored')])));
      expect(texts).toEqual(['a']);
    });

    it('skips chunks without content', async () => {
      const finishOnly = JSON.stringify({ choices: [{ delta: {}, finish_reason: 'stop' }] });
      const texts = await collect(translateStream(events([delta('a'), finishOnly, delta('')])));
      expect(texts).toEqual(['a']);
    });

    it('rejects events that are not JSON', async () => {
      await expect(collect(translateStream(events(['{oops'])))).rejects.toThrow(
        'stream event is not valid JSON: {oops',
      );
    });
  });

  describe('generate', () => {
    it('returns the first choice content', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(JSON.stringify({ choices: [{ message: { role: 'assistant', content: 'hello' } }] })),
      );
      const adapter = new OpenAICompatibleAdapter(config);

      await expect(adapter.generate('hi')).resolves.toBe('hello');
      expect(fetchMock.mock.calls[0]?.[0]).toBe('https://api.example.com/v1/chat/completions');
      expect(getCallBody()).toEqual({
        model: 'gpt-test',
        messages: [{ role: 'user', content: 'hi' }],
        max_tokens: 1024,
      });
    });

    it('treats a null content as empty text', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: [{ message: { content: null } }] })));
      const adapter = new OpenAICompatibleAdapter(config);

      await expect(adapter.generate('hi')).resolves.toBe('');
    });

    it('reports non-2xx responses as BackendError with the vendor message', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(JSON.stringify({ error: { message: 'bad key' } }), { status: 401 }),
      );
      const adapter = new OpenAICompatibleAdapter(config);

      const error = await adapter.generate('hi').catch((err: unknown) => err);
      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({ status: 401, message: 'authentication failed (HTTP 401): bad key' });
    });

    it('reports an unexpected payload as malformed', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: [] })));
      const adapter = new OpenAICompatibleAdapter(config);

      await expect(adapter.generate('hi')).rejects.toThrow(MalformedResponseError);
    });

    it('times out when the backend does not answer', async () => {
      fetchMock.mockImplementationOnce((_input, init) => {
        const signal = init?.signal;
        return new Promise<Response>((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(signal.reason));
        });
      });
      const adapter = new OpenAICompatibleAdapter(config);

      const error = await adapter.generate('hi', { timeoutMs: 20 }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(TimeoutError);
      expect(error).toMatchObject({ message: "request to 'a' timed out after 20ms", timeoutMs: 20 });
    });
  });

  describe('converse', () => {
    it('rejects empty turns without contacting the backend', async () => {
      const adapter = new OpenAICompatibleAdapter(config);

      await expect(adapter.converse([])).rejects.toThrow(InvalidTurnsError);
      expect(() => adapter.converseStream([])).toThrow(InvalidTurnsError);
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it('sends every turn in order', async () => {
      fetchMock.mockResolvedValueOnce(new Response(JSON.stringify({ choices: [{ message: { content: 'fine' } }] })));
      const adapter = new OpenAICompatibleAdapter(config);

      await expect(
        adapter.converse([
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'how are you?' },
        ]),
      ).resolves.toBe('fine');
      expect(getCallBody()).toMatchObject({
        messages: [
          { role: 'user', content: 'hi' },
          { role: 'assistant', content: 'hello' },
          { role: 'user', content: 'how are you?' },
        ],
      });
    });
  });

  describe('generateStream', () => {
    it('yields numbered deltas and a FINISH chunk with the full text', async () => {
      fetchMock.mockResolvedValueOnce(sseResponse([delta('Hel'), delta('lo'), '[DONE]']));
      const adapter = new OpenAICompatibleAdapter(config);

      const chunks = await collect(adapter.generateStream('hi'));

      expect(chunks).toEqual<ResultChunk[]>([
        { origin: 'a', index: 0, type: 'TEXT_DELTA', text: 'Hel', terminal: false },
        { origin: 'a', index: 1, type: 'TEXT_DELTA', text: 'lo', terminal: false },
        { origin: 'a', index: 2, type: 'FINISH', text: 'Hello', terminal: true },
      ]);
      expect(getCallBody()).toMatchObject({ stream: true });
    });

    it('turns a mid-stream error event into a terminal ERROR chunk', async () => {
      fetchMock.mockResolvedValueOnce(
        sseResponse([delta('Hel'), JSON.stringify({ error: { message: 'overloaded' } })]),
      );
      const adapter = new OpenAICompatibleAdapter(config);

      const chunks = await collect(adapter.generateStream('hi'));

      expect(chunks).toEqual<ResultChunk[]>([
        { origin: 'a', index: 0, type: 'TEXT_DELTA', text: 'Hel', terminal: false },
        {
          origin: 'a',
          index: 1,
          type: 'ERROR',
          error: { kind: 'BackendError', message: 'overloaded' },
          terminal: true,
        },
      ]);
    });

    it('reports a rejected request as a single ERROR chunk', async () => {
      fetchMock.mockResolvedValueOnce(
        new Response(JSON.stringify({ error: { message: 'slow down' } }), { status: 429 }),
      );
      const adapter = new OpenAICompatibleAdapter(config);

      const chunks = await collect(adapter.generateStream('hi'));

      expect(chunks).toEqual<ResultChunk[]>([
        {
          origin: 'a',
          index: 0,
          type: 'ERROR',
          error: { kind: 'BackendError', message: 'rate limit exceeded (HTTP 429): slow down', status: 429 },
          terminal: true,
        },
      ]);
    });

    it('ends with a Timeout chunk when the stream stalls', async () => {
      fetchMock.mockImplementationOnce(async (_input, init) => {
        const signal = init?.signal;
        const body = new ReadableStream<Uint8Array>({
          start(controller) {
            controller.enqueue(new TextEncoder().encode(`data: ${delta('Hel')}\n\n`));
            signal?.addEventListener('abort', () => controller.error(signal.reason));
          },
        });
        return new Response(body);
      });
      const adapter = new OpenAICompatibleAdapter({ ...config, timeoutMs: 30 });

      const chunks = await collect(adapter.generateStream('hi'));

      expect(chunks).toEqual<ResultChunk[]>([
        { origin: 'a', index: 0, type: 'TEXT_DELTA', text: 'Hel', terminal: false },
        {
          origin: 'a',
          index: 1,
          type: 'ERROR',
          error: { kind: 'Timeout', message: "stream from 'a' timed out after 30ms" },
          terminal: true,
        },
      ]);
    });
  });
});
