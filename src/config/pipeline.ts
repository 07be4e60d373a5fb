import dotenv from 'dotenv';

dotenv.config();

export const DEFAULT_CONCURRENCY_LIMIT = 15;

/**
 * Pipeline Configuration
 *
 * File locations and batch parameters for extraction and parsing runs.
 */
export interface PipelineSettings {
  inputPath: string;
  promptPath: string;
  outputRoot: string;
  identityPath: string;
  idColumn: string;
  contentColumn: string;
  concurrencyLimit: number;
  sampleSize?: number;
}

export class PipelineConfig {
  static getConfig(env: NodeJS.ProcessEnv = process.env): PipelineSettings {
    const concurrencyLimit = parseInt(env.CONCURRENCY_LIMIT || String(DEFAULT_CONCURRENCY_LIMIT), 10);
    if (!Number.isInteger(concurrencyLimit) || concurrencyLimit < 1) {
      throw new Error(`CONCURRENCY_LIMIT must be a positive integer, got "${env.CONCURRENCY_LIMIT}"`);
    }

    const sampleSize = env.SAMPLE_SIZE ? parseInt(env.SAMPLE_SIZE, 10) : undefined;
    if (sampleSize !== undefined && (!Number.isInteger(sampleSize) || sampleSize < 1)) {
      throw new Error(`SAMPLE_SIZE must be a positive integer, got "${env.SAMPLE_SIZE}"`);
    }

    const inputPath = env.INPUT_PATH || 'data/filtered_texts.csv';

    return {
      inputPath,
      promptPath: env.PROMPT_PATH || 'prompts/extraction.txt',
      outputRoot: env.OUTPUT_ROOT || 'data',
      identityPath: env.IDENTITY_PATH || inputPath,
      idColumn: env.ID_COLUMN || 'file_id',
      contentColumn: env.CONTENT_COLUMN || 'text_content',
      concurrencyLimit,
      sampleSize,
    };
  }
}
