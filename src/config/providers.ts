import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { SchemaObject } from 'ajv';
import { validator } from '../utils/validators.js';

dotenv.config();

/**
 * One logical provider entry
 *
 * `clientType` stays a plain string here: it comes from configuration and is
 * only narrowed when the registry builds an adapter.
 */
export interface ProviderDefinition {
  name: string;
  model: string;
  enabled: boolean;
  clientType: string;
  maxTokens: number;
}

const DEFAULT_MAX_TOKENS = 16384;

/**
 * Built-in provider table
 */
export const DEFAULT_PROVIDERS: readonly ProviderDefinition[] = [
  { name: 'openai', model: 'gpt-4o-mini', enabled: true, clientType: 'openai', maxTokens: DEFAULT_MAX_TOKENS },
  { name: 'claude', model: 'claude-3-5-sonnet-20241022', enabled: false, clientType: 'anthropic', maxTokens: DEFAULT_MAX_TOKENS },
  { name: 'gemini', model: 'gemini-2.5-flash-lite', enabled: false, clientType: 'google', maxTokens: DEFAULT_MAX_TOKENS },
  { name: 'llama', model: 'meta-llama/Llama-3.3-70B-Instruct', enabled: false, clientType: 'llama', maxTokens: DEFAULT_MAX_TOKENS },
  { name: 'deepseek', model: 'deepseek-ai/DeepSeek-V3.2:novita', enabled: false, clientType: 'deepseek', maxTokens: DEFAULT_MAX_TOKENS },
];

const providersFileSchema: SchemaObject = {
  type: 'array',
  items: {
    type: 'object',
    required: ['name', 'model', 'clientType'],
    properties: {
      name: { type: 'string', minLength: 1 },
      model: { type: 'string', minLength: 1 },
      enabled: { type: 'boolean' },
      clientType: { type: 'string', minLength: 1 },
      maxTokens: { type: 'integer', minimum: 1 },
    },
  },
};

interface ProviderFileEntry {
  name: string;
  model: string;
  enabled?: boolean;
  clientType: string;
  maxTokens?: number;
}

const isProvidersFile = validator.compileSchema<ProviderFileEntry[]>(providersFileSchema);

/**
 * Providers Configuration
 *
 * Resolution order: PROVIDERS_FILE (or the built-in table), then the
 * per-provider <NAME>_MODEL / <NAME>_MAX_TOKENS overrides, then ENABLED_PROVIDERS.
 */
export class ProvidersConfig {
  static getDefinitions(env: NodeJS.ProcessEnv = process.env): ProviderDefinition[] {
    const base = env.PROVIDERS_FILE
      ? this.loadFile(env.PROVIDERS_FILE)
      : DEFAULT_PROVIDERS.map((definition) => ({ ...definition }));

    const enabledList = env.ENABLED_PROVIDERS
      ? new Set(
          env.ENABLED_PROVIDERS.split(',')
            .map((name) => name.trim().toLowerCase())
            .filter((name) => name.length > 0)
        )
      : null;

    return base.map((definition) => {
      const prefix = definition.name.toUpperCase().replace(/[^A-Z0-9]+/g, '_');
      const model = env[`${prefix}_MODEL`] || definition.model;
      const maxTokensOverride = env[`${prefix}_MAX_TOKENS`];
      const maxTokens = maxTokensOverride ? parseInt(maxTokensOverride, 10) : definition.maxTokens;

      if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
        throw new Error(`Invalid ${prefix}_MAX_TOKENS value: ${maxTokensOverride}`);
      }

      return {
        ...definition,
        model,
        maxTokens,
        enabled: enabledList ? enabledList.has(definition.name.toLowerCase()) : definition.enabled,
      };
    });
  }

  /**
   * Narrow the table to the names given on the command line
   */
  static selectEnabled(definitions: ProviderDefinition[], names: string[]): ProviderDefinition[] {
    const wanted = new Set(names.map((name) => name.toLowerCase()));
    const known = new Set(definitions.map((definition) => definition.name.toLowerCase()));

    for (const name of wanted) {
      if (!known.has(name)) {
        throw new Error(`Unknown provider: ${name}. Valid options: ${[...known].join(', ')}`);
      }
    }

    return definitions.map((definition) => ({
      ...definition,
      enabled: wanted.has(definition.name.toLowerCase()),
    }));
  }

  private static loadFile(filePath: string): ProviderDefinition[] {
    const resolvedPath = path.isAbsolute(filePath) ? filePath : path.join(process.cwd(), filePath);
    const parsed: unknown = JSON.parse(fs.readFileSync(resolvedPath, 'utf-8'));
    const result = validator.validate(isProvidersFile, parsed);

    if (!result.valid) {
      throw new Error(`Invalid providers file ${filePath}: ${validator.formatErrors(result.errors)}`);
    }

    return result.data.map((entry) => ({
      name: entry.name,
      model: entry.model,
      clientType: entry.clientType,
      enabled: entry.enabled ?? true,
      maxTokens: entry.maxTokens ?? DEFAULT_MAX_TOKENS,
    }));
  }
}
