import type { Turn } from '../../types/index.js';
import type { SSEEvent } from '../../utils/sse.js';
import { HttpBackendAdapter, type VendorRequest } from '../http-adapter.js';
import { translateRequest } from './request.js';
import { translateResponse } from './response.js';
import { translateStream } from './stream.js';

export class AnthropicAdapter extends HttpBackendAdapter {
  protected override translateRequest(turns: ReadonlyArray<Turn>, streaming: boolean): VendorRequest {
    return translateRequest(turns, this.config, streaming);
  }

  protected override translateResponse(raw: unknown): string {
    return translateResponse(raw);
  }

  protected override translateStream(events: AsyncIterable<SSEEvent>): AsyncIterable<string> {
    return translateStream(events);
  }
}

export { translateRequest, translateResponse, translateStream };
