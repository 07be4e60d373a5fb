import { describe, expect, it } from 'vitest';
import { summarizeOutcomes, toSummaryDocument, toSummaryOutcome } from '../../src/concurrent/outcomes.js';
import type { ExtractionOutcome } from '../../src/concurrent/types.js';

const success = (recordId: string, elapsedSeconds: number, tokens: number | null): ExtractionOutcome => ({
  status: 'success',
  recordId,
  provider: 'openai',
  model: 'gpt-4o-mini',
  elapsedSeconds,
  tokens,
  outputFile: `${recordId}_gpt-4o-mini_20240102.txt`,
  content: '[]',
});

describe('summarizeOutcomes', () => {
  it('averages latency over successes only', () => {
    const summary = summarizeOutcomes({
      provider: 'openai',
      model: 'gpt-4o-mini',
      timestamp: '20240102',
      totalRuntime: 4,
      outcomes: [
        success('r1', 1, 100),
        success('r2', 3, 50),
        { status: 'error', recordId: 'r3', provider: 'openai', model: 'gpt-4o-mini', elapsedSeconds: 10, error: 'Rate limited (429): slow down' },
        { status: 'skipped', recordId: 'r4', provider: 'openai', reason: 'empty_content' },
      ],
    });

    expect(summary.successCount).toBe(2);
    expect(summary.errorCount).toBe(1);
    expect(summary.skippedCount).toBe(1);
    expect(summary.avgTimePerRequest).toBe(2);
    expect(summary.totalTokens).toBe(150);
    expect(summary.throughput).toBe(0.5);
  });

  it('counts successes without usage separately', () => {
    const summary = summarizeOutcomes({
      provider: 'gemini',
      model: 'gemini-2.5-flash-lite',
      timestamp: '20240102',
      totalRuntime: 0,
      outcomes: [success('r1', 1, null), success('r2', 1, 30)],
    });

    expect(summary.totalTokens).toBe(30);
    expect(summary.untrackedTokenRequests).toBe(1);
    expect(summary.throughput).toBe(0);
  });

  it('keeps outcome order and drops payloads', () => {
    const outcome = success('r1', 1, 10);
    expect(toSummaryOutcome(outcome)).not.toHaveProperty('content');

    const summary = summarizeOutcomes({
      provider: 'openai',
      model: 'gpt-4o-mini',
      timestamp: '20240102',
      totalRuntime: 1,
      outcomes: [success('b', 1, 1), success('a', 1, 1)],
    });
    expect(summary.results.map((result) => result.recordId)).toEqual(['b', 'a']);
  });
});

describe('toSummaryDocument', () => {
  it('writes summary and outcome fields under their file names', () => {
    const summary = summarizeOutcomes({
      provider: 'openai',
      model: 'gpt-4o-mini',
      timestamp: '20240102',
      totalRuntime: 2,
      outcomes: [
        success('r1', 1.5, 40),
        { status: 'error', recordId: 'r2', provider: 'openai', model: 'gpt-4o-mini', elapsedSeconds: 0.5, error: 'Request failed: socket hang up' },
        { status: 'skipped', recordId: 'r3', provider: 'openai', reason: 'already_persisted' },
      ],
    });

    expect(toSummaryDocument(summary)).toEqual({
      llm_type: 'openai',
      model_name: 'gpt-4o-mini',
      timestamp: '20240102',
      total_runtime: 2,
      success_count: 1,
      error_count: 1,
      skipped_count: 1,
      avg_time_per_request: 1.5,
      total_tokens: 40,
      untracked_token_requests: 0,
      throughput: 0.5,
      results: [
        {
          status: 'success',
          file_id: 'r1',
          llm_type: 'openai',
          model: 'gpt-4o-mini',
          time: 1.5,
          tokens: 40,
          output_file: 'r1_gpt-4o-mini_20240102.txt',
        },
        { status: 'error', file_id: 'r2', llm_type: 'openai', model: 'gpt-4o-mini', time: 0.5, error: 'Request failed: socket hang up' },
        { status: 'skipped', file_id: 'r3', llm_type: 'openai', reason: 'already_persisted' },
      ],
    });
  });
});
