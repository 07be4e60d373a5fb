import type {
  ExtractionOutcome,
  OutcomeDocument,
  ProviderSummary,
  ProviderSummaryDocument,
  SummaryOutcome,
} from './types.js';

interface SummaryInput {
  provider: string;
  model: string;
  timestamp: string;
  totalRuntime: number;
  outcomes: readonly ExtractionOutcome[];
}

/**
 * Drop the raw payload from a success before it goes into a summary
 */
export function toSummaryOutcome(outcome: ExtractionOutcome): SummaryOutcome {
  if (outcome.status !== 'success') {
    return outcome;
  }
  const { content: _content, ...rest } = outcome;
  return rest;
}

/**
 * Fold a settled batch into its provider summary
 */
export function summarizeOutcomes(input: SummaryInput): ProviderSummary {
  let successCount = 0;
  let errorCount = 0;
  let skippedCount = 0;
  let successSeconds = 0;
  let totalTokens = 0;
  let untrackedTokenRequests = 0;

  for (const outcome of input.outcomes) {
    switch (outcome.status) {
      case 'success':
        successCount++;
        successSeconds += outcome.elapsedSeconds;
        if (outcome.tokens === null) {
          untrackedTokenRequests++;
        } else {
          totalTokens += outcome.tokens;
        }
        break;
      case 'error':
        errorCount++;
        break;
      case 'skipped':
        skippedCount++;
        break;
    }
  }

  return {
    provider: input.provider,
    model: input.model,
    timestamp: input.timestamp,
    totalRuntime: input.totalRuntime,
    successCount,
    errorCount,
    skippedCount,
    avgTimePerRequest: successCount > 0 ? successSeconds / successCount : 0,
    totalTokens,
    untrackedTokenRequests,
    throughput: input.totalRuntime > 0 ? successCount / input.totalRuntime : 0,
    results: input.outcomes.map(toSummaryOutcome),
  };
}

function toOutcomeDocument(outcome: SummaryOutcome): OutcomeDocument {
  switch (outcome.status) {
    case 'success':
      return {
        status: 'success',
        file_id: outcome.recordId,
        llm_type: outcome.provider,
        model: outcome.model,
        time: outcome.elapsedSeconds,
        tokens: outcome.tokens,
        output_file: outcome.outputFile,
      };
    case 'error':
      return {
        status: 'error',
        file_id: outcome.recordId,
        llm_type: outcome.provider,
        model: outcome.model,
        time: outcome.elapsedSeconds,
        error: outcome.error,
      };
    case 'skipped':
      return {
        status: 'skipped',
        file_id: outcome.recordId,
        llm_type: outcome.provider,
        reason: outcome.reason,
      };
  }
}

/**
 * Summary in the field names used by summary files on disk
 */
export function toSummaryDocument(summary: ProviderSummary): ProviderSummaryDocument {
  return {
    llm_type: summary.provider,
    model_name: summary.model,
    timestamp: summary.timestamp,
    total_runtime: summary.totalRuntime,
    success_count: summary.successCount,
    error_count: summary.errorCount,
    skipped_count: summary.skippedCount,
    avg_time_per_request: summary.avgTimePerRequest,
    total_tokens: summary.totalTokens,
    untracked_token_requests: summary.untrackedTokenRequests,
    throughput: summary.throughput,
    results: summary.results.map(toOutcomeDocument),
  };
}
