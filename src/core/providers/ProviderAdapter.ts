/**
 * Provider Adapter Interface
 *
 * Uniform capability over one text-generation provider. Every adapter sends
 * the fixed system instruction ahead of the prompt, runs at temperature 0,
 * applies its configured output ceiling and never retries on its own.
 */

export const SYSTEM_INSTRUCTION =
  'You are a legal data extraction system. Respond ONLY with valid JSON.';

/**
 * Normalized provider response
 */
export interface ProviderResponse {
  content: string;
  /** Total tokens billed for the request, null when the provider reports none */
  tokens: number | null;
}

export interface ProviderAdapter {
  /** Logical provider name (e.g. 'openai', 'llama') */
  readonly provider: string;
  readonly model: string;
  readonly maxTokens: number;

  /**
   * Run one prompt
   *
   * @throws ProviderError on transport, auth, rate-limit or malformed-response failures
   */
  process(prompt: string): Promise<ProviderResponse>;
}

/**
 * Explicit per-adapter configuration
 */
export interface AdapterOptions {
  provider: string;
  model: string;
  maxTokens: number;
  apiKey: string;
  baseURL?: string;
  organization?: string;
  timeoutMs?: number;
}
