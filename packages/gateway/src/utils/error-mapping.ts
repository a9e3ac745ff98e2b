import { z } from 'zod';
import { BackendError } from '../types/error.js';

export type MapHttpErrorOptions = {
  readonly statusCode: number;
  readonly body: string;
  readonly headers: Headers;
};

// Shapes vendors use for error bodies: {"error": {"message": ...}},
// {"error": "..."} and {"message": "..."}.
const vendorErrorSchema = z.union([
  z.object({ error: z.object({ message: z.string() }) }),
  z.object({ error: z.string() }),
  z.object({ message: z.string() }),
]);

/**
 * Parses the Retry-After header from response headers.
 * Returns milliseconds, or null if header is not present.
 *
 * - Numeric value (seconds): parsed as int and converted to ms
 * - HTTP date string: computed as delta from now in ms
 */
export function parseRetryAfter(headers: Headers): number | null {
  const retryAfter = headers.get('Retry-After');
  if (!retryAfter) {
    return null;
  }

  if (/^\d+$/.test(retryAfter)) {
    return Number(retryAfter) * 1000;
  }

  const retryDate = new Date(retryAfter);
  if (!isNaN(retryDate.getTime())) {
    return Math.max(0, retryDate.getTime() - Date.now());
  }

  return null;
}

/**
 * Pulls the human-readable message out of a vendor error body, falling back
 * to the raw text when the body is not one of the known shapes.
 */
export function extractVendorMessage(body: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body.trim();
  }

  const result = vendorErrorSchema.safeParse(parsed);
  if (!result.success) {
    return body.trim();
  }

  const data = result.data;
  if ('error' in data) {
    return typeof data.error === 'string' ? data.error : data.error.message;
  }
  return data.message;
}

function describeStatus(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'invalid request';
    case 401:
      return 'authentication failed';
    case 403:
      return 'access denied';
    case 404:
      return 'resource not found';
    case 413:
      return 'payload too large';
    case 422:
      return 'unprocessable entity';
    case 429:
      return 'rate limit exceeded';
    default:
      return statusCode >= 500 ? 'server error' : 'request rejected';
  }
}

/**
 * Maps a non-2xx vendor response to a BackendError. The vendor's error body
 * is reduced to its message so no vendor-specific shape leaves the adapter.
 */
export function mapHttpError(options: MapHttpErrorOptions): BackendError {
  const { statusCode, body, headers } = options;
  const detail = extractVendorMessage(body);
  const label = describeStatus(statusCode);
  const message = detail ? `${label} (HTTP ${statusCode}): ${detail}` : `${label} (HTTP ${statusCode})`;

  return new BackendError(message, statusCode, parseRetryAfter(headers));
}
