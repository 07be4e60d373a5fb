import pLimit from 'p-limit';
import { DEFAULT_CONCURRENCY_LIMIT } from '../config/pipeline.js';
import { describeError } from '../core/errors.js';
import type { ProviderAdapter } from '../core/providers/ProviderAdapter.js';
import { ComponentLogger } from '../utils/logger.js';
import { summarizeOutcomes } from './outcomes.js';
import { OutputStore, formatRunDate } from './OutputStore.js';
import { renderPrompt } from './prompt.js';
import type { ExtractionOutcome, InputRecord, ProviderSummary } from './types.js';

/**
 * Request Scheduler Options
 */
export interface SchedulerOptions {
  /** Maximum in-flight provider calls (default 15) */
  concurrencyLimit?: number;
  /** Run date stamped on output files and the summary (default: today) */
  timestamp?: string;
}

export interface SchedulerResult {
  summary: ProviderSummary;
  summaryPath: string;
}

/**
 * Request Scheduler
 *
 * Sends every pending record of one provider through its adapter with a fixed
 * number of permits, persists each success, and writes one summary once the
 * whole batch has settled.
 */
export class RequestScheduler {
  private adapter: ProviderAdapter;
  private store: OutputStore;
  private promptTemplate: string;
  private concurrencyLimit: number;
  private timestamp: string;
  private logger: ComponentLogger;

  constructor(
    adapter: ProviderAdapter,
    store: OutputStore,
    promptTemplate: string,
    options: SchedulerOptions = {}
  ) {
    this.adapter = adapter;
    this.store = store;
    this.promptTemplate = promptTemplate;
    this.concurrencyLimit = options.concurrencyLimit ?? DEFAULT_CONCURRENCY_LIMIT;
    this.timestamp = options.timestamp ?? formatRunDate();
    this.logger = new ComponentLogger(`RequestScheduler:${adapter.provider}`);
  }

  async run(records: readonly InputRecord[]): Promise<SchedulerResult> {
    this.logger.started({ records: records.length, concurrencyLimit: this.concurrencyLimit });
    const startTime = Date.now();

    await this.store.ensureDirectory();
    const persisted = await this.store.listRecordKeys();
    if (persisted.size > 0) {
      this.logger.info(`Found ${persisted.size} records already processed, they will be skipped`);
    }

    const limit = pLimit(this.concurrencyLimit);
    const total = records.length;
    let settled = 0;

    const outcomes = await Promise.all(
      records.map(async (record) => {
        const outcome = await this.processRecord(record, persisted, limit);

        settled++;
        if (settled % 10 === 0 || settled === total) {
          this.logger.info(`Progress: ${settled}/${total} settled`);
        }

        return outcome;
      })
    );

    const summary = summarizeOutcomes({
      provider: this.adapter.provider,
      model: this.adapter.model,
      timestamp: this.timestamp,
      totalRuntime: (Date.now() - startTime) / 1000,
      outcomes,
    });
    const summaryPath = await this.store.writeSummary(summary);

    this.logger.completed({
      success: summary.successCount,
      errors: summary.errorCount,
      skipped: summary.skippedCount,
      summaryPath,
    });

    return { summary, summaryPath };
  }

  /**
   * One record's attempt; never rejects
   */
  private async processRecord(
    record: InputRecord,
    persisted: ReadonlySet<string>,
    limit: ReturnType<typeof pLimit>
  ): Promise<ExtractionOutcome> {
    const provider = this.adapter.provider;

    if (persisted.has(OutputStore.recordKey(record.recordId))) {
      return { status: 'skipped', recordId: record.recordId, provider, reason: 'already_persisted' };
    }

    const content = record.content;
    if (content === null || content.length === 0) {
      this.logger.debug(`Skipping ${record.recordId}: empty content`);
      return { status: 'skipped', recordId: record.recordId, provider, reason: 'empty_content' };
    }

    return limit(async (): Promise<ExtractionOutcome> => {
      const requestStart = Date.now();

      try {
        const response = await this.adapter.process(renderPrompt(this.promptTemplate, content));
        const outputFile = await this.store.saveOutput(
          record.recordId,
          this.adapter.model,
          this.timestamp,
          response.content
        );

        return {
          status: 'success',
          recordId: record.recordId,
          provider,
          model: this.adapter.model,
          elapsedSeconds: (Date.now() - requestStart) / 1000,
          tokens: response.tokens,
          outputFile,
          content: response.content,
        };
      } catch (error) {
        this.logger.error(`Error processing record ${record.recordId}`, error);

        return {
          status: 'error',
          recordId: record.recordId,
          provider,
          model: this.adapter.model,
          elapsedSeconds: (Date.now() - requestStart) / 1000,
          error: describeError(error),
        };
      }
    });
  }
}
