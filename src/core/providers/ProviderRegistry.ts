import { AnthropicConfig } from '../../config/anthropic.js';
import { GoogleConfig } from '../../config/google.js';
import { HuggingFaceConfig } from '../../config/huggingface.js';
import { OpenAIConfig } from '../../config/openai.js';
import type { ProviderDefinition } from '../../config/providers.js';
import { UnknownProviderError } from '../errors.js';
import { AnthropicAdapter } from './AnthropicAdapter.js';
import { GeminiAdapter } from './GeminiAdapter.js';
import { OpenAIAdapter } from './OpenAIAdapter.js';
import type { ProviderAdapter } from './ProviderAdapter.js';

/**
 * Builds an adapter for one provider definition
 */
export type AdapterConstructor = (definition: ProviderDefinition) => ProviderAdapter;

function huggingFaceAdapter(definition: ProviderDefinition): ProviderAdapter {
  const config = HuggingFaceConfig.getConfig();
  return new OpenAIAdapter({
    provider: definition.name,
    model: definition.model,
    maxTokens: definition.maxTokens,
    apiKey: config.apiKey,
    baseURL: config.baseURL,
  });
}

/**
 * Constructors keyed by client type. Credentials are read when the adapter is
 * built, so a disabled provider never needs its key.
 */
export const DEFAULT_ADAPTER_CONSTRUCTORS: ReadonlyMap<string, AdapterConstructor> = new Map<string, AdapterConstructor>([
  [
    'openai',
    (definition) => {
      const config = OpenAIConfig.getConfig();
      return new OpenAIAdapter({
        provider: definition.name,
        model: definition.model,
        maxTokens: definition.maxTokens,
        apiKey: config.apiKey,
        organization: config.organization,
      });
    },
  ],
  [
    'anthropic',
    (definition) => {
      const config = AnthropicConfig.getConfig();
      return new AnthropicAdapter({
        provider: definition.name,
        model: definition.model,
        maxTokens: definition.maxTokens,
        apiKey: config.apiKey,
        timeoutMs: config.timeout,
      });
    },
  ],
  [
    'google',
    (definition) => {
      const config = GoogleConfig.getConfig();
      return new GeminiAdapter({
        provider: definition.name,
        model: definition.model,
        maxTokens: definition.maxTokens,
        apiKey: config.apiKey,
      });
    },
  ],
  ['llama', huggingFaceAdapter],
  ['deepseek', huggingFaceAdapter],
]);

/**
 * Provider Registry
 *
 * Maps logical provider names to their definitions and builds adapters on
 * demand by dispatching on the definition's client type.
 */
export class ProviderRegistry {
  private definitions: Map<string, ProviderDefinition>;
  private constructors: ReadonlyMap<string, AdapterConstructor>;

  constructor(
    definitions: ProviderDefinition[],
    constructors: ReadonlyMap<string, AdapterConstructor> = DEFAULT_ADAPTER_CONSTRUCTORS
  ) {
    this.definitions = new Map(definitions.map((definition) => [definition.name, definition]));
    this.constructors = constructors;
  }

  list(): ProviderDefinition[] {
    return [...this.definitions.values()];
  }

  enabled(): ProviderDefinition[] {
    return this.list().filter((definition) => definition.enabled);
  }

  get(name: string): ProviderDefinition {
    const definition = this.definitions.get(name);
    if (!definition) {
      throw new Error(`Provider not configured: ${name}`);
    }
    return definition;
  }

  /**
   * Construct the adapter for a provider
   *
   * @throws UnknownProviderError when no constructor handles the client type
   */
  create(name: string): ProviderAdapter {
    const definition = this.get(name);
    const construct = this.constructors.get(definition.clientType);

    if (!construct) {
      throw new UnknownProviderError(definition.name, definition.clientType);
    }

    return construct(definition);
  }

  /**
   * Check that a provider can be built (client type known, credentials present)
   */
  validate(name: string): boolean {
    try {
      this.create(name);
      console.log(`✅ ${name} configuration valid`);
      return true;
    } catch (error) {
      console.error(`❌ ${name} configuration invalid:`, error instanceof Error ? error.message : String(error));
      return false;
    }
  }
}
