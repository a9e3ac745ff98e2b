import { BackendError, MalformedResponseError } from '../types/error.js';
import { mapHttpError } from './error-mapping.js';

export type FetchOptions = {
  readonly url: string;
  readonly method?: string;
  readonly headers?: Record<string, string>;
  readonly body?: unknown;
  readonly signal?: AbortSignal;
};

/**
 * Sends the request and returns the response once a 2xx status arrived.
 * Non-2xx responses are mapped through mapHttpError.
 */
async function send(options: FetchOptions): Promise<globalThis.Response> {
  const {
    url,
    method = 'POST',
    headers: customHeaders = {},
    body: bodyData,
    signal,
  } = options;

  const mergedHeaders: Record<string, string> = {
    'Content-Type': 'application/json',
    ...customHeaders,
  };

  const body = bodyData !== undefined ? JSON.stringify(bodyData) : undefined;

  let response: globalThis.Response;
  try {
    response = await fetch(url, {
      method,
      headers: mergedHeaders,
      body,
      signal,
    });
  } catch (err) {
    // Aborts are classified by whoever owns the signal
    if (signal?.aborted) {
      throw err;
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new BackendError(
      `request to ${url} failed: ${message}`,
      null,
      null,
      err instanceof Error ? err : undefined,
    );
  }

  if (!response.ok) {
    const text = await response.text();
    throw mapHttpError({ statusCode: response.status, body: text, headers: response.headers });
  }

  return response;
}

/**
 * Sends a JSON request and returns the parsed JSON body.
 */
export async function fetchJson(options: FetchOptions): Promise<unknown> {
  const response = await send(options);

  let parsed: unknown;
  try {
    parsed = await response.json();
  } catch (err) {
    if (options.signal?.aborted) {
      throw err;
    }
    throw new MalformedResponseError(
      'response body is not valid JSON',
      err instanceof Error ? err : undefined,
    );
  }
  return parsed;
}

/**
 * Sends a JSON request and returns the raw response for incremental reading.
 */
export async function fetchStream(options: FetchOptions): Promise<globalThis.Response> {
  const response = await send(options);
  if (!response.body) {
    throw new MalformedResponseError('streaming response has no body');
  }
  return response;
}
