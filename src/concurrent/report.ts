import type { RunResult } from './RunCoordinator.js';
import type { ProviderSummary } from './types.js';

const RULE = '='.repeat(70);

export function formatProviderReport(summary: ProviderSummary): string[] {
  const lines = [
    `${summary.provider.toUpperCase()} (${summary.model})`,
    `  Runtime: ${summary.totalRuntime.toFixed(2)}s`,
    `  Success: ${summary.successCount} | Errors: ${summary.errorCount} | Skipped: ${summary.skippedCount}`,
    `  Avg time per record: ${summary.avgTimePerRequest.toFixed(2)}s`,
    `  Total tokens: ${summary.totalTokens.toLocaleString('en-US')}`,
  ];

  if (summary.untrackedTokenRequests > 0) {
    lines.push(`  Requests without usage data: ${summary.untrackedTokenRequests}`);
  }
  if (summary.successCount > 0) {
    lines.push(`  Throughput: ${summary.throughput.toFixed(2)} records/sec`);
  }

  return lines;
}

/**
 * Human-readable end-of-run report
 */
export function formatRunReport(result: RunResult): string {
  const lines = [
    '',
    RULE,
    'Overall Summary',
    RULE,
    `Total execution time: ${result.totalRuntime.toFixed(2)}s`,
    `Providers completed: ${Object.keys(result.summary).length}`,
    RULE,
    '',
  ];

  for (const summary of Object.values(result.summary)) {
    lines.push(...formatProviderReport(summary), '');
  }

  if (result.failures.length > 0) {
    lines.push('❌ Failed providers:');
    for (const failure of result.failures) {
      lines.push(`  ${failure.provider}: ${failure.error}`);
    }
    lines.push('');
  }

  lines.push(`Summary saved: ${result.summaryPath}`);
  return lines.join('\n');
}
