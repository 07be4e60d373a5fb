import dotenv from 'dotenv';

dotenv.config();

/**
 * Google Gemini Configuration
 */
export class GoogleConfig {
  static getConfig() {
    const apiKey = process.env.GOOGLE_API_KEY || process.env.GEMINI_API_KEY;

    if (!apiKey) {
      throw new Error(
        'Missing required Google configuration. ' +
          'Please ensure GOOGLE_API_KEY is set in .env'
      );
    }

    return {
      apiKey,
    };
  }
}
