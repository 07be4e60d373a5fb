import OpenAI from 'openai';
import { ComponentLogger } from '../../utils/logger.js';
import { ProviderError, toProviderError } from '../errors.js';
import {
  SYSTEM_INSTRUCTION,
  type AdapterOptions,
  type ProviderAdapter,
  type ProviderResponse,
} from './ProviderAdapter.js';

/**
 * OpenAI Chat Completions Adapter
 *
 * Serves api.openai.com and any OpenAI-compatible endpoint (the Hugging Face
 * router for Llama and DeepSeek) through `baseURL`.
 */
export class OpenAIAdapter implements ProviderAdapter {
  readonly provider: string;
  readonly model: string;
  readonly maxTokens: number;
  private client: OpenAI;
  private logger: ComponentLogger;

  constructor(options: AdapterOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens;

    // maxRetries: 0, a failed request becomes an error outcome for the next run to pick up
    this.client = new OpenAI({
      apiKey: options.apiKey,
      baseURL: options.baseURL,
      organization: options.organization,
      timeout: options.timeoutMs,
      maxRetries: 0,
    });
    this.logger = new ComponentLogger(`OpenAIAdapter:${options.provider}`);
  }

  async process(prompt: string): Promise<ProviderResponse> {
    try {
      const completion = await this.client.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: SYSTEM_INSTRUCTION },
          { role: 'user', content: prompt },
        ],
        temperature: 0,
        max_tokens: this.maxTokens,
      });

      const choice = completion.choices[0];
      if (!choice?.message.content) {
        throw new ProviderError('No content in response', this.provider);
      }
      const content = choice.message.content;

      // Kept as-is; incomplete JSON surfaces as a parse failure
      if (choice.finish_reason === 'length') {
        this.logger.warn('Response truncated at the token limit', {
          model: this.model,
          completionTokens: completion.usage?.completion_tokens,
        });
      }

      return {
        content,
        tokens: completion.usage?.total_tokens ?? null,
      };
    } catch (error) {
      this.logger.debug('Completion request failed', {
        model: this.model,
        error: error instanceof Error ? error.message : String(error),
      });
      throw toProviderError(this.provider, error);
    }
  }
}
