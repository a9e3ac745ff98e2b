import type { AdapterFactory, Vendor } from '../types/index.js';
import { AnthropicAdapter } from './anthropic/index.js';
import { OpenAICompatibleAdapter } from './openai-compatible/index.js';

export { DEFAULT_MAX_TOKENS, HttpBackendAdapter, type VendorRequest } from './http-adapter.js';
export { AnthropicAdapter } from './anthropic/index.js';
export { OpenAICompatibleAdapter } from './openai-compatible/index.js';

export type AdapterFactories = Readonly<Record<Vendor, AdapterFactory>>;

export const DEFAULT_ADAPTER_FACTORIES: AdapterFactories = {
  'openai-compatible': (config) => new OpenAICompatibleAdapter(config),
  anthropic: (config) => new AnthropicAdapter(config),
};
