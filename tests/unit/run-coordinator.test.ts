import fs from 'fs/promises';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { RunCoordinator, providerOutputDirectory } from '../../src/concurrent/RunCoordinator.js';
import { formatRunReport } from '../../src/concurrent/report.js';
import type { ProviderDefinition } from '../../src/config/providers.js';
import { ProviderRegistry, type AdapterConstructor } from '../../src/core/providers/ProviderRegistry.js';
import { FakeAdapter, createTempDir, removeTempDir } from './helpers.js';

const TIMESTAMP = '20240102';

function definition(name: string, clientType: string, enabled = true): ProviderDefinition {
  return { name, model: `${name}-model`, enabled, clientType, maxTokens: 1024 };
}

describe('RunCoordinator', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('runs enabled providers and leaves failing ones out of the combined summary', async () => {
    const construct = vi.fn<AdapterConstructor>(
      (def) => new FakeAdapter(def.name, def.model, () => ({ content: '[]', tokens: 7 }))
    );
    const registry = new ProviderRegistry(
      [definition('alpha', 'fake'), definition('beta', 'mystery'), definition('gamma', 'fake', false)],
      new Map([['fake', construct]])
    );

    const coordinator = new RunCoordinator(registry, {
      outputRoot: dir,
      promptTemplate: '{complaint_text}',
      timestamp: TIMESTAMP,
    });
    const result = await coordinator.run([
      { recordId: 'r1', content: 'one' },
      { recordId: 'r2', content: 'two' },
    ]);

    expect(Object.keys(result.summary)).toEqual(['alpha']);
    expect(result.summary.alpha?.successCount).toBe(2);
    expect(result.summary.alpha?.totalTokens).toBe(14);
    expect(result.failures).toEqual([{ provider: 'beta', error: 'Unknown client type "mystery" for provider "beta"' }]);
    expect(construct).toHaveBeenCalledTimes(1);
    expect(construct.mock.calls[0]?.[0].name).toBe('alpha');

    expect(result.summaryPath).toBe(path.join(dir, 'combined_summary_20240102.json'));
    const combined = JSON.parse(await fs.readFile(result.summaryPath, 'utf-8'));
    expect(Object.keys(combined)).toEqual(['alpha']);
    expect(combined.alpha).toMatchObject({ llm_type: 'alpha', model_name: 'alpha-model', success_count: 2, total_tokens: 14 });

    const alphaDir = providerOutputDirectory(dir, 'alpha');
    expect((await fs.readdir(alphaDir)).sort()).toEqual([
      'r1_alpha-model_20240102.txt',
      'r2_alpha-model_20240102.txt',
      'summary_20240102.json',
    ]);
    await expect(fs.access(providerOutputDirectory(dir, 'gamma'))).rejects.toThrow();
  });

  it('keeps providers independent when one of them errors on every record', async () => {
    const constructors = new Map<string, AdapterConstructor>([
      ['ok', (def) => new FakeAdapter(def.name, def.model, () => ({ content: '[]', tokens: 1 }))],
      [
        'down',
        (def) =>
          new FakeAdapter(def.name, def.model, () => {
            throw new Error('service unavailable');
          }),
      ],
    ]);
    const registry = new ProviderRegistry([definition('first', 'ok'), definition('second', 'down')], constructors);

    const result = await new RunCoordinator(registry, {
      outputRoot: dir,
      promptTemplate: '{complaint_text}',
      timestamp: TIMESTAMP,
    }).run([{ recordId: 'r1', content: 'text' }]);

    expect(result.failures).toEqual([]);
    expect(result.summary.first?.successCount).toBe(1);
    expect(result.summary.second?.errorCount).toBe(1);
    expect(result.summary.second?.successCount).toBe(0);
  });

  it('writes an empty combined summary when no provider is enabled', async () => {
    const registry = new ProviderRegistry([definition('alpha', 'fake', false)], new Map());

    const result = await new RunCoordinator(registry, {
      outputRoot: dir,
      promptTemplate: '{complaint_text}',
      timestamp: TIMESTAMP,
    }).run([]);

    expect(result.summary).toEqual({});
    expect(JSON.parse(await fs.readFile(result.summaryPath, 'utf-8'))).toEqual({});
  });

  it('reports per-provider results and failures', async () => {
    const registry = new ProviderRegistry(
      [definition('alpha', 'fake'), definition('beta', 'mystery')],
      new Map<string, AdapterConstructor>([
        ['fake', (def) => new FakeAdapter(def.name, def.model, () => ({ content: '[]', tokens: 1500 }))],
      ])
    );

    const result = await new RunCoordinator(registry, {
      outputRoot: dir,
      promptTemplate: '{complaint_text}',
      timestamp: TIMESTAMP,
    }).run([{ recordId: 'r1', content: 'text' }]);
    const lines = formatRunReport(result).split('\n');

    expect(lines).toContain('Providers completed: 1');
    expect(lines).toContain('ALPHA (alpha-model)');
    expect(lines).toContain('  Success: 1 | Errors: 0 | Skipped: 0');
    expect(lines).toContain('  Total tokens: 1,500');
    expect(lines).toContain('  beta: Unknown client type "mystery" for provider "beta"');
    expect(lines[lines.length - 1]).toBe(`Summary saved: ${path.join(dir, 'combined_summary_20240102.json')}`);
  });
});
