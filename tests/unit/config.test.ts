import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { PipelineConfig } from '../../src/config/pipeline.js';
import { ProvidersConfig } from '../../src/config/providers.js';
import { createTempDir, removeTempDir } from './helpers.js';

describe('ProvidersConfig', () => {
  it('enables only openai by default', () => {
    const definitions = ProvidersConfig.getDefinitions({});

    expect(definitions.map((definition) => [definition.name, definition.clientType, definition.enabled])).toEqual([
      ['openai', 'openai', true],
      ['claude', 'anthropic', false],
      ['gemini', 'google', false],
      ['llama', 'llama', false],
      ['deepseek', 'deepseek', false],
    ]);
    expect(definitions.every((definition) => definition.maxTokens === 16384)).toBe(true);
  });

  it('applies ENABLED_PROVIDERS and per-provider overrides', () => {
    const definitions = ProvidersConfig.getDefinitions({
      ENABLED_PROVIDERS: 'Claude, gemini',
      CLAUDE_MODEL: 'claude-3-5-haiku-20241022',
      GEMINI_MAX_TOKENS: '8192',
    });

    const byName = new Map(definitions.map((definition) => [definition.name, definition]));
    expect(definitions.filter((definition) => definition.enabled).map((definition) => definition.name)).toEqual(['claude', 'gemini']);
    expect(byName.get('claude')?.model).toBe('claude-3-5-haiku-20241022');
    expect(byName.get('gemini')?.maxTokens).toBe(8192);
  });

  it('rejects a token limit that is not a positive integer', () => {
    expect(() => ProvidersConfig.getDefinitions({ OPENAI_MAX_TOKENS: 'lots' })).toThrow('Invalid OPENAI_MAX_TOKENS value: lots');
  });

  it('narrows the enabled set to the names asked for', () => {
    const selected = ProvidersConfig.selectEnabled(ProvidersConfig.getDefinitions({}), ['llama']);

    expect(selected.filter((definition) => definition.enabled).map((definition) => definition.name)).toEqual(['llama']);
    expect(() => ProvidersConfig.selectEnabled(selected, ['mistral'])).toThrow(
      'Unknown provider: mistral. Valid options: openai, claude, gemini, llama, deepseek'
    );
  });

  describe('PROVIDERS_FILE', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await createTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('replaces the built-in table', async () => {
      const filePath = path.join(dir, 'providers.json');
      await fs.writeFile(
        filePath,
        JSON.stringify([
          { name: 'local', model: 'qwen2.5', clientType: 'llama' },
          { name: 'openai', model: 'gpt-4o', clientType: 'openai', enabled: false, maxTokens: 4096 },
        ])
      );

      expect(ProvidersConfig.getDefinitions({ PROVIDERS_FILE: filePath })).toEqual([
        { name: 'local', model: 'qwen2.5', clientType: 'llama', enabled: true, maxTokens: 16384 },
        { name: 'openai', model: 'gpt-4o', clientType: 'openai', enabled: false, maxTokens: 4096 },
      ]);
    });

    it('reports schema violations', async () => {
      const filePath = path.join(dir, 'providers.json');
      await fs.writeFile(filePath, JSON.stringify([{ name: 'local', clientType: 'llama' }]));

      expect(() => ProvidersConfig.getDefinitions({ PROVIDERS_FILE: filePath })).toThrow(
        `Invalid providers file ${filePath}: /0: must have required property 'model'`
      );
    });
  });
});

describe('PipelineConfig', () => {
  it('has defaults for every setting', () => {
    expect(PipelineConfig.getConfig({})).toEqual({
      inputPath: 'data/filtered_texts.csv',
      promptPath: 'prompts/extraction.txt',
      outputRoot: 'data',
      identityPath: 'data/filtered_texts.csv',
      idColumn: 'file_id',
      contentColumn: 'text_content',
      concurrencyLimit: 15,
      sampleSize: undefined,
    });
  });

  it('reads overrides and validates numbers', () => {
    const settings = PipelineConfig.getConfig({ INPUT_PATH: 'in.json', CONCURRENCY_LIMIT: '4', SAMPLE_SIZE: '50' });

    expect(settings.identityPath).toBe('in.json');
    expect(settings.concurrencyLimit).toBe(4);
    expect(settings.sampleSize).toBe(50);
    expect(() => PipelineConfig.getConfig({ CONCURRENCY_LIMIT: '0' })).toThrow('CONCURRENCY_LIMIT must be a positive integer, got "0"');
    expect(() => PipelineConfig.getConfig({ SAMPLE_SIZE: 'some' })).toThrow('SAMPLE_SIZE must be a positive integer, got "some"');
  });
});
