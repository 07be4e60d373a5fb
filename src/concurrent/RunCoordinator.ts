import path from 'path';
import type { ProviderDefinition } from '../config/providers.js';
import { describeError } from '../core/errors.js';
import type { ProviderRegistry } from '../core/providers/ProviderRegistry.js';
import { ComponentLogger } from '../utils/logger.js';
import { OutputStore, formatRunDate } from './OutputStore.js';
import { RequestScheduler } from './RequestScheduler.js';
import type { CombinedSummary, InputRecord } from './types.js';

export interface RunOptions {
  /** Directory holding every provider's output directory and the combined summary */
  outputRoot: string;
  promptTemplate: string;
  concurrencyLimit?: number;
  timestamp?: string;
}

export interface ProviderFailure {
  provider: string;
  error: string;
}

export interface RunResult {
  timestamp: string;
  summary: CombinedSummary;
  failures: ProviderFailure[];
  /** Wall-clock seconds for the whole run */
  totalRuntime: number;
  summaryPath: string;
}

/**
 * Output directory of one provider under the output root
 */
export function providerOutputDirectory(outputRoot: string, provider: string): string {
  return path.join(outputRoot, `${provider}_extracted_text`);
}

/**
 * Run Coordinator
 *
 * Starts one scheduler per enabled provider, all at once. Each provider has
 * its own permits and its own output directory; a provider that fails is left
 * out of the combined summary without affecting the others.
 */
export class RunCoordinator {
  private registry: ProviderRegistry;
  private options: RunOptions;
  private logger: ComponentLogger;

  constructor(registry: ProviderRegistry, options: RunOptions) {
    this.registry = registry;
    this.options = options;
    this.logger = new ComponentLogger('RunCoordinator');
  }

  async run(records: readonly InputRecord[]): Promise<RunResult> {
    const timestamp = this.options.timestamp ?? formatRunDate();
    const startTime = Date.now();

    const enabled: ProviderDefinition[] = [];
    for (const definition of this.registry.list()) {
      if (definition.enabled) {
        enabled.push(definition);
      } else {
        this.logger.info(`Skipping ${definition.name} (disabled)`);
      }
    }

    this.logger.started({
      providers: enabled.map((definition) => definition.name),
      records: records.length,
      timestamp,
    });

    const settled = await Promise.allSettled(
      enabled.map((definition) => this.runProvider(definition, records, timestamp))
    );

    const summary: CombinedSummary = {};
    const failures: ProviderFailure[] = [];

    settled.forEach((result, index) => {
      const provider = enabled[index]?.name ?? `provider-${index}`;
      if (result.status === 'fulfilled') {
        summary[provider] = result.value;
      } else {
        this.logger.error(`Provider ${provider} failed, leaving it out of the combined summary`, result.reason);
        failures.push({ provider, error: describeError(result.reason) });
      }
    });

    const rootStore = new OutputStore(this.options.outputRoot);
    await rootStore.ensureDirectory();
    const summaryPath = await rootStore.writeCombinedSummary(timestamp, summary);

    const totalRuntime = (Date.now() - startTime) / 1000;
    this.logger.completed({ completed: Object.keys(summary).length, failed: failures.length, totalRuntime });

    return { timestamp, summary, failures, totalRuntime, summaryPath };
  }

  private async runProvider(definition: ProviderDefinition, records: readonly InputRecord[], timestamp: string) {
    const adapter = this.registry.create(definition.name);
    const store = new OutputStore(providerOutputDirectory(this.options.outputRoot, definition.name));
    const scheduler = new RequestScheduler(adapter, store, this.options.promptTemplate, {
      concurrencyLimit: this.options.concurrencyLimit,
      timestamp,
    });

    this.logger.info(`Starting ${definition.name} (${definition.model})`);
    const { summary } = await scheduler.run(records);
    return summary;
  }
}
