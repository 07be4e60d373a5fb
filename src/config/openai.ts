import dotenv from 'dotenv';

dotenv.config();

/**
 * OpenAI Configuration
 *
 * Credentials for the standard OpenAI API (api.openai.com).
 * Adapters build their own client from these values.
 */
export class OpenAIConfig {
  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.OPENAI_API_KEY;
    const organization = process.env.OPENAI_ORG_ID; // Optional

    if (!apiKey) {
      throw new Error(
        'Missing required OpenAI configuration. ' +
          'Please ensure OPENAI_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      organization,
    };
  }
}
