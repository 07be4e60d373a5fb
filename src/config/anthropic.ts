import dotenv from 'dotenv';

dotenv.config();

/**
 * Anthropic Configuration
 *
 * Credentials for the Anthropic Messages API.
 */
export class AnthropicConfig {
  /**
   * Get required environment variables
   */
  static getConfig() {
    const apiKey = process.env.ANTHROPIC_API_KEY;

    if (!apiKey) {
      throw new Error(
        'Missing required Anthropic configuration. ' +
          'Please ensure ANTHROPIC_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
      timeout: 600000, // 10 minutes (600,000ms)
    };
  }
}
