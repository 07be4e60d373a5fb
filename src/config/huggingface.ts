import dotenv from 'dotenv';

dotenv.config();

const DEFAULT_ROUTER_URL = 'https://router.huggingface.co/v1';

/**
 * Hugging Face Router Configuration
 *
 * OpenAI-compatible endpoint serving the Llama and DeepSeek models.
 */
export class HuggingFaceConfig {
  static getConfig() {
    const apiKey = process.env.HUGGINGFACE_API_KEY || process.env.HF_TOKEN;
    const baseURL = process.env.HUGGINGFACE_BASE_URL || DEFAULT_ROUTER_URL;

    if (!apiKey) {
      throw new Error(
        'Missing required Hugging Face configuration. ' +
          'Please ensure HUGGINGFACE_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      baseURL,
    };
  }
}
