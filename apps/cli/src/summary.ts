import type { BatchReport } from '@quarry/schemas';

function formatPercent(value: number, signed = false): string {
  const sign = signed && value >= 0 ? '+' : '';
  return `${sign}${value.toFixed(1)}%`;
}

/**
 * Human-readable end-of-run summary, one entry per output line
 */
export function formatBatchSummary(report: BatchReport): string[] {
  const successRate = report.total > 0 ? (report.succeeded / report.total) * 100 : 0;

  let records = 0;
  let returnSum = 0;
  const failures: string[] = [];
  for (const [symbol, outcome] of report.outcomes) {
    if (outcome.status === 'success') {
      records += outcome.recordCount;
      returnSum += outcome.totalReturnPct;
    } else {
      const detail = outcome.detail ? ` (${outcome.detail})` : '';
      failures.push(`  ${symbol}: ${outcome.reason}${detail}`);
    }
  }

  const lines = [
    `Batch ${report.startDate} to ${report.endDate} (${report.barSize})`,
    `Succeeded:    ${report.succeeded} / ${report.total}`,
    `Failed:       ${report.failed} / ${report.total}`,
    `Success rate: ${formatPercent(successRate)}`,
    `Records:      ${records.toLocaleString('en-US')}`,
    `Elapsed:      ${(report.elapsedMs / 60_000).toFixed(1)} min`,
  ];

  if (report.succeeded > 0) {
    lines.push(`Avg return:   ${formatPercent(returnSum / report.succeeded, true)}`);
  }

  if (failures.length > 0) {
    lines.push('Failed symbols:', ...failures);
  }

  // Sliced-out symbols are only counted; a long list would drown the rest
  const notSelected = report.skipped.filter((entry) => entry.reason === 'not selected');
  const dropped = report.skipped.filter((entry) => entry.reason !== 'not selected');
  if (dropped.length > 0) {
    lines.push('Skipped entries:');
    for (const entry of dropped) {
      lines.push(`  "${entry.raw}": ${entry.reason}`);
    }
  }
  if (notSelected.length > 0) {
    lines.push(`Not selected: ${notSelected.length} (outside --start-from/--max-count)`);
  }

  return lines;
}

/**
 * Process exit code for a finished batch: 0 when every symbol succeeded, 2 otherwise
 */
export function exitCodeFor(report: BatchReport): number {
  return report.failed > 0 ? 2 : 0;
}
