import {
  FinishReason,
  GoogleGenAI,
  HarmBlockThreshold,
  HarmCategory,
  type SafetySetting,
} from '@google/genai';
import { ComponentLogger } from '../../utils/logger.js';
import { ProviderError, toProviderError } from '../errors.js';
import {
  SYSTEM_INSTRUCTION,
  type AdapterOptions,
  type ProviderAdapter,
  type ProviderResponse,
} from './ProviderAdapter.js';

// Complaints describe violence and abuse; default filters block too many of them
const SAFETY_SETTINGS: SafetySetting[] = [
  { category: HarmCategory.HARM_CATEGORY_HARASSMENT, threshold: HarmBlockThreshold.BLOCK_NONE },
  { category: HarmCategory.HARM_CATEGORY_HATE_SPEECH, threshold: HarmBlockThreshold.BLOCK_NONE },
  { category: HarmCategory.HARM_CATEGORY_SEXUALLY_EXPLICIT, threshold: HarmBlockThreshold.BLOCK_NONE },
  { category: HarmCategory.HARM_CATEGORY_DANGEROUS_CONTENT, threshold: HarmBlockThreshold.BLOCK_NONE },
];

/**
 * Google Gemini Adapter
 */
export class GeminiAdapter implements ProviderAdapter {
  readonly provider: string;
  readonly model: string;
  readonly maxTokens: number;
  private client: GoogleGenAI;
  private logger: ComponentLogger;

  constructor(options: AdapterOptions) {
    this.provider = options.provider;
    this.model = options.model;
    this.maxTokens = options.maxTokens;
    this.client = new GoogleGenAI({ apiKey: options.apiKey });
    this.logger = new ComponentLogger(`GeminiAdapter:${options.provider}`);
  }

  async process(prompt: string): Promise<ProviderResponse> {
    try {
      const response = await this.client.models.generateContent({
        model: this.model,
        contents: prompt,
        config: {
          systemInstruction: SYSTEM_INSTRUCTION,
          temperature: 0,
          topP: 1,
          topK: 1,
          maxOutputTokens: this.maxTokens,
          safetySettings: SAFETY_SETTINGS,
        },
      });

      const content = response.text;
      if (!content) {
        const reason = response.candidates?.[0]?.finishReason ?? 'unknown';
        throw new ProviderError(`No text in response (finish reason: ${reason})`, this.provider);
      }

      if (response.candidates?.[0]?.finishReason === FinishReason.MAX_TOKENS) {
        this.logger.warn('Response truncated at the token limit', { model: this.model });
      }

      const usage = response.usageMetadata;
      const tokens =
        usage && (usage.promptTokenCount !== undefined || usage.candidatesTokenCount !== undefined)
          ? (usage.promptTokenCount ?? 0) + (usage.candidatesTokenCount ?? 0)
          : null;

      return { content, tokens };
    } catch (error) {
      this.logger.debug('generateContent failed', {
        model: this.model,
        error: error instanceof Error ? error.message : String(error),
      });
      throw toProviderError(this.provider, error);
    }
  }
}
