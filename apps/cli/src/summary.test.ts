import { describe, it, expect } from 'vitest';
import type { BatchReport, SymbolOutcome } from '@quarry/schemas';
import { exitCodeFor, formatBatchSummary } from './summary';

function success(recordCount: number, totalReturnPct: number): SymbolOutcome {
  return {
    status: 'success',
    recordCount,
    firstDate: '2024-01-02',
    lastDate: '2024-06-28',
    totalReturnPct,
    dataQualityWarning: false,
    elapsedMs: 1000,
    outputPath: 'data/X.csv',
  };
}

function report(outcomes: Array<[string, SymbolOutcome]>, overrides: Partial<BatchReport> = {}): BatchReport {
  const succeeded = outcomes.filter(([, o]) => o.status === 'success').length;
  return {
    outcomes: new Map(outcomes),
    skipped: [],
    total: outcomes.length,
    succeeded,
    failed: outcomes.length - succeeded,
    elapsedMs: 90_000,
    startDate: '2024-01-01',
    endDate: '2024-06-28',
    barSize: '1 day',
    ...overrides,
  };
}

describe('formatBatchSummary', () => {
  it('should list totals, failures and skipped entries', () => {
    const mixed = report(
      [
        ['AAPL', success(1200, 10)],
        ['MSFT', success(300, -4)],
        [
          'BADSYM',
          {
            status: 'failure',
            reason: 'unresolvable security',
            detail: 'No contract for BADSYM',
            elapsedMs: 500,
          },
        ],
      ],
      { skipped: [{ raw: 'aapl ', reason: 'duplicate' }] }
    );

    expect(formatBatchSummary(mixed)).toEqual([
      'Batch 2024-01-01 to 2024-06-28 (1 day)',
      'Succeeded:    2 / 3',
      'Failed:       1 / 3',
      'Success rate: 66.7%',
      'Records:      1,500',
      'Elapsed:      1.5 min',
      'Avg return:   +3.0%',
      'Failed symbols:',
      '  BADSYM: unresolvable security (No contract for BADSYM)',
      'Skipped entries:',
      '  "aapl ": duplicate',
    ]);
  });

  it('should count symbols left out by the slice instead of listing them', () => {
    const lines = formatBatchSummary(
      report([['AAPL', success(10, 1)]], {
        skipped: [
          { raw: '', reason: 'blank' },
          { raw: 'MSFT', reason: 'not selected' },
          { raw: 'NVDA', reason: 'not selected' },
        ],
      })
    );

    expect(lines.slice(-3)).toEqual([
      'Skipped entries:',
      '  "": blank',
      'Not selected: 2 (outside --start-from/--max-count)',
    ]);
  });

  it('should omit the return line when nothing succeeded', () => {
    const lines = formatBatchSummary(
      report([['NDX', { status: 'failure', reason: 'no data', elapsedMs: 10 }]])
    );

    expect(lines).toContain('Success rate: 0.0%');
    expect(lines).toContain('  NDX: no data');
    expect(lines.some((line) => line.startsWith('Avg return'))).toBe(false);
  });

  it('should report an empty batch without dividing by zero', () => {
    const lines = formatBatchSummary(report([], { elapsedMs: 0 }));

    expect(lines).toEqual([
      'Batch 2024-01-01 to 2024-06-28 (1 day)',
      'Succeeded:    0 / 0',
      'Failed:       0 / 0',
      'Success rate: 0.0%',
      'Records:      0',
      'Elapsed:      0.0 min',
    ]);
  });
});

describe('exitCodeFor', () => {
  it('should return 0 when every symbol succeeded', () => {
    expect(exitCodeFor(report([['AAPL', success(10, 1)]]))).toBe(0);
  });

  it('should return 2 when any symbol failed', () => {
    expect(
      exitCodeFor(
        report([
          ['AAPL', success(10, 1)],
          ['NDX', { status: 'failure', reason: 'cancelled', elapsedMs: 0 }],
        ])
      )
    ).toBe(2);
  });
});
