export { createDeadline, resolveTimeout, withDeadline, DEFAULT_TIMEOUT_MS, type Deadline } from './deadline.js';
export { fetchJson, fetchStream, type FetchOptions } from './http.js';
export { createSSEStream, type SSEEvent } from './sse.js';
export { mapHttpError, parseRetryAfter, extractVendorMessage } from './error-mapping.js';
export { validateTurns } from './turns.js';
