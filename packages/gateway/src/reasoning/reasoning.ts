import type { ErrorDescriptor, ResultChunk, Turn } from '../types/index.js';
import { systemTurn } from '../types/index.js';

export const REASONING_MARKER = 'Reasoning:';
export const ANSWER_MARKER = 'Answer:';

export const REASONING_INSTRUCTION =
  `Think the problem through before answering. Reply in this format:\n\n` +
  `${REASONING_MARKER} [your analysis and reasoning]\n\n` +
  `${ANSWER_MARKER} [your final answer]`;

export type ReasonedAnswer = {
  readonly response: string;
  readonly reasoning: string;
};

/**
 * Asks the model to show its reasoning. Existing system turns have their
 * content replaced by the instruction; without one, an instruction turn is
 * prepended.
 */
export function withReasoningInstruction(turns: ReadonlyArray<Turn>): ReadonlyArray<Turn> {
  const hasSystem = turns.some((turn) => turn.role === 'system');
  if (!hasSystem) {
    return [systemTurn(REASONING_INSTRUCTION), ...turns];
  }
  return turns.map((turn) => (turn.role === 'system' ? systemTurn(REASONING_INSTRUCTION) : turn));
}

/**
 * Splits a reply written in the reasoning format. Without both markers the
 * whole text is the response.
 */
export function splitReasoning(text: string): ReasonedAnswer {
  const answerAt = text.indexOf(ANSWER_MARKER);
  if (answerAt === -1 || !text.includes(REASONING_MARKER)) {
    return { response: text, reasoning: '' };
  }

  const response = text.slice(answerAt + ANSWER_MARKER.length).trim();
  const before = text.slice(0, answerAt);
  const reasoningAt = before.indexOf(REASONING_MARKER);
  const reasoning = reasoningAt === -1 ? '' : before.slice(reasoningAt + REASONING_MARKER.length).trim();

  return { response, reasoning };
}

/**
 * Where a streamed reasoning reply stands: before the reasoning marker,
 * inside the reasoning, or inside the answer.
 */
export type ReasoningPhase = 'init' | 'reasoning' | 'response';

export type ReasoningUpdate = {
  readonly phase: ReasoningPhase;
  /** Empty when reasoning is hidden. */
  readonly reasoning: string;
  readonly response: string;
};

export type ReasoningEvent =
  | (ReasoningUpdate & { readonly type: 'UPDATE' | 'FINISH' })
  | { readonly type: 'ERROR'; readonly error: ErrorDescriptor };

/**
 * Splits a reasoning reply while it streams in. Each `push` returns the
 * whole reasoning and answer seen so far when something visible changed.
 * With `showReasoning` off, nothing is reported until the answer starts.
 */
export class ReasoningSplitter {
  private readonly showReasoning: boolean;
  private text = '';
  private current: ReasoningPhase = 'init';
  private reasoning = '';
  private response = '';
  private last: ReasoningUpdate | null = null;

  constructor(showReasoning: boolean = true) {
    this.showReasoning = showReasoning;
  }

  get phase(): ReasoningPhase {
    return this.current;
  }

  push(delta: string): ReasoningUpdate | null {
    this.text += delta;

    const reasoningAt = this.text.indexOf(REASONING_MARKER);
    if (reasoningAt === -1) {
      return null;
    }

    const afterReasoning = this.text.slice(reasoningAt + REASONING_MARKER.length);
    const answerAt = afterReasoning.indexOf(ANSWER_MARKER);
    if (answerAt === -1) {
      return this.advance('reasoning', afterReasoning.trim(), '');
    }
    return this.advance(
      'response',
      afterReasoning.slice(0, answerAt).trim(),
      afterReasoning.slice(answerAt + ANSWER_MARKER.length).trim(),
    );
  }

  /**
   * Final split once the reply is complete. Without any marker the whole
   * text is the response; with reasoning but no answer, the reasoning
   * stands in as the response.
   */
  finish(): ReasoningUpdate {
    switch (this.current) {
      case 'init':
        return { phase: 'init', reasoning: '', response: this.text };
      case 'reasoning':
        return { phase: 'reasoning', reasoning: this.visible(this.reasoning), response: this.reasoning };
      case 'response':
        return { phase: 'response', reasoning: this.visible(this.reasoning), response: this.response };
    }
  }

  private advance(phase: ReasoningPhase, reasoning: string, response: string): ReasoningUpdate | null {
    this.current = phase;
    this.reasoning = reasoning;
    this.response = response;

    if (phase === 'reasoning' && !this.showReasoning) {
      return null;
    }

    const update: ReasoningUpdate = { phase, reasoning: this.visible(reasoning), response };
    const last = this.last;
    if (
      last !== null &&
      last.phase === update.phase &&
      last.reasoning === update.reasoning &&
      last.response === update.response
    ) {
      return null;
    }
    this.last = update;
    return update;
  }

  private visible(reasoning: string): string {
    return this.showReasoning ? reasoning : '';
  }
}

/**
 * Turns one origin's chunk stream into reasoning updates, ending with a
 * FINISH or ERROR event.
 */
export async function* streamReasoning(
  chunks: AsyncIterable<ResultChunk>,
  showReasoning: boolean = true,
): AsyncGenerator<ReasoningEvent> {
  const splitter = new ReasoningSplitter(showReasoning);

  for await (const chunk of chunks) {
    switch (chunk.type) {
      case 'TEXT_DELTA': {
        const update = splitter.push(chunk.text);
        if (update) {
          yield { type: 'UPDATE', ...update };
        }
        break;
      }
      case 'FINISH':
        yield { type: 'FINISH', ...splitter.finish() };
        return;
      case 'ERROR':
        yield { type: 'ERROR', error: chunk.error };
        return;
    }
  }
}
