export type ModelId = string;

export type Role = 'system' | 'user' | 'assistant';

export const ROLES: ReadonlyArray<Role> = ['system', 'user', 'assistant'];

export type Turn = {
  readonly role: Role;
  readonly content: string;
};

/**
 * A conversation turn as it arrives from outside the gateway, before its role
 * has been checked.
 */
export type TurnInput = {
  readonly role: string;
  readonly content: unknown;
};

export type Vendor = 'openai-compatible' | 'anthropic';

export type BackendConfig = {
  readonly id: ModelId;
  readonly vendor: Vendor;
  readonly endpoint: string;
  readonly credential: string;
  /** Model name understood by the vendor. */
  readonly model: string;
  readonly timeoutMs?: number;
  readonly maxTokens?: number;
};

export type GenerationRequest = {
  readonly prompt: string;
  readonly stream: boolean;
};

export type ConversationRequest = {
  readonly model: ModelId;
  readonly turns: ReadonlyArray<TurnInput>;
  readonly stream: boolean;
};

export type CallOptions = {
  readonly signal?: AbortSignal;
  readonly timeoutMs?: number;
};

export function userTurn(content: string): Turn {
  return { role: 'user', content };
}

export function systemTurn(content: string): Turn {
  return { role: 'system', content };
}
