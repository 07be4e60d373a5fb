/**
 * Provider Exports
 */

export { SYSTEM_INSTRUCTION } from './ProviderAdapter.js';
export type { AdapterOptions, ProviderAdapter, ProviderResponse } from './ProviderAdapter.js';
export { OpenAIAdapter } from './OpenAIAdapter.js';
export { AnthropicAdapter } from './AnthropicAdapter.js';
export { GeminiAdapter } from './GeminiAdapter.js';
export { DEFAULT_ADAPTER_CONSTRUCTORS, ProviderRegistry } from './ProviderRegistry.js';
export type { AdapterConstructor } from './ProviderRegistry.js';
