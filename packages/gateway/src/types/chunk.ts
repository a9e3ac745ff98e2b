import type { ErrorDescriptor } from './error.js';
import type { ModelId } from './model.js';

export type TextDeltaChunk = {
  readonly origin: ModelId;
  readonly index: number;
  readonly type: 'TEXT_DELTA';
  readonly text: string;
  readonly terminal: false;
};

export type FinishChunk = {
  readonly origin: ModelId;
  readonly index: number;
  readonly type: 'FINISH';
  /** Full text produced by the origin. */
  readonly text: string;
  readonly terminal: true;
};

export type ErrorChunk = {
  readonly origin: ModelId;
  readonly index: number;
  readonly type: 'ERROR';
  readonly error: ErrorDescriptor;
  readonly terminal: true;
};

export type TerminalChunk = FinishChunk | ErrorChunk;

export type ResultChunk = TextDeltaChunk | TerminalChunk;

export type OriginState = 'pending' | 'streaming' | 'completed' | 'failed';

export type OriginResult =
  | { readonly status: 'success'; readonly text: string }
  | { readonly status: 'error'; readonly error: ErrorDescriptor };

export type AggregatedResponse = Readonly<Record<ModelId, OriginResult>>;

export function success(text: string): OriginResult {
  return { status: 'success', text };
}

export function failure(error: ErrorDescriptor): OriginResult {
  return { status: 'error', error };
}
