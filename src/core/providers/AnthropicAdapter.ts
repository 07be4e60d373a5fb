import Anthropic from '@anthropic-ai/sdk';
import { ComponentLogger } from '../../utils/logger.js';
import { ProviderError, toProviderError } from '../errors.js';
import {
  SYSTEM_INSTRUCTION,
  type AdapterOptions,
  type ProviderAdapter,
  type ProviderResponse,
} from './ProviderAdapter.js';

/**
 * Anthropic Messages API Adapter
 */
export class AnthropicAdapter implements ProviderAdapter {
  readonly provider: string;
  readonly model: string;
  readonly maxTokens: number;
  private client: Anthropic;
  private logger: ComponentLogger;

  constructor(options: AdapterOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens;

    this.client = new Anthropic({
      apiKey: options.apiKey,
      timeout: options.timeoutMs ?? 600000, // 10 minutes
      maxRetries: 0,
    });
    this.logger = new ComponentLogger(`AnthropicAdapter:${options.provider}`);
  }

  async process(prompt: string): Promise<ProviderResponse> {
    try {
      const response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        temperature: 0,
        system: SYSTEM_INSTRUCTION,
        messages: [{ role: 'user', content: prompt }],
        stream: false,
      });

      // Claude may split output across several text blocks
      let content = '';
      for (const block of response.content) {
        if (block.type === 'text') {
          content += block.text;
        }
      }

      if (!content) {
        throw new ProviderError('No text content in response', this.provider);
      }

      if (response.stop_reason === 'max_tokens') {
        this.logger.warn('Response truncated at the token limit', {
          model: this.model,
          outputTokens: response.usage.output_tokens,
        });
      }

      return {
        content,
        tokens: response.usage.input_tokens + response.usage.output_tokens,
      };
    } catch (error) {
      this.logger.debug('Messages request failed', {
        model: this.model,
        error: error instanceof Error ? error.message : String(error),
      });
      throw toProviderError(this.provider, error);
    }
  }
}
