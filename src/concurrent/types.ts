/**
 * One complaint document to extract from
 */
export interface InputRecord {
  readonly recordId: string;
  /** Null or zero-length means there is nothing to send */
  readonly content: string | null;
}

export type SkipReason = 'already_persisted' | 'empty_content';

export interface SuccessOutcome {
  readonly status: 'success';
  readonly recordId: string;
  readonly provider: string;
  readonly model: string;
  readonly elapsedSeconds: number;
  readonly tokens: number | null;
  readonly outputFile: string;
  readonly content: string;
}

export interface SkippedOutcome {
  readonly status: 'skipped';
  readonly recordId: string;
  readonly provider: string;
  readonly reason: SkipReason;
}

export interface ErrorOutcome {
  readonly status: 'error';
  readonly recordId: string;
  readonly provider: string;
  readonly model: string;
  readonly elapsedSeconds: number;
  readonly error: string;
}

/**
 * Result of one (record, provider) attempt within a run
 */
export type ExtractionOutcome = SuccessOutcome | SkippedOutcome | ErrorOutcome;

/**
 * Outcome as written to the summary document (raw payload lives in its own file)
 */
export type SummaryOutcome = Omit<SuccessOutcome, 'content'> | SkippedOutcome | ErrorOutcome;

export interface ProviderSummary {
  provider: string;
  model: string;
  timestamp: string;
  /** Wall-clock seconds for the whole batch */
  totalRuntime: number;
  successCount: number;
  errorCount: number;
  skippedCount: number;
  /** Mean seconds over successful requests, 0 when none succeeded */
  avgTimePerRequest: number;
  /** Sum over successes; a success without a usage figure counts as 0 */
  totalTokens: number;
  /** Successes whose provider reported no usage figure */
  untrackedTokenRequests: number;
  /** Successful requests per second of wall time */
  throughput: number;
  results: SummaryOutcome[];
}

export type CombinedSummary = Record<string, ProviderSummary>;

/**
 * One outcome in a written summary file
 */
export type OutcomeDocument =
  | {
      status: 'success';
      file_id: string;
      llm_type: string;
      model: string;
      time: number;
      tokens: number | null;
      output_file: string;
    }
  | {
      status: 'error';
      file_id: string;
      llm_type: string;
      model: string;
      time: number;
      error: string;
    }
  | {
      status: 'skipped';
      file_id: string;
      llm_type: string;
      reason: SkipReason;
    };

/**
 * `summary_<YYYYMMDD>.json` as written to disk
 */
export interface ProviderSummaryDocument {
  llm_type: string;
  model_name: string;
  timestamp: string;
  total_runtime: number;
  success_count: number;
  error_count: number;
  skipped_count: number;
  avg_time_per_request: number;
  total_tokens: number;
  untracked_token_requests: number;
  throughput: number;
  results: OutcomeDocument[];
}
