import { promises as fs } from 'fs';
import * as path from 'path';
import Papa from 'papaparse';
import { HARDCODED_CONFIG, type Bar } from '@quarry/schemas';
import { createLogger } from '@quarry/utils';
import type { OutputSink, OutputWriteResult } from './output-sink';

const logger = createLogger({ name: 'output:csv', service: 'output' });

/**
 * File name for a symbol; characters that cannot appear in a path become '_'
 */
export function symbolFileName(symbol: string): string {
  return `${symbol.replace(/[\\/:*?"<>|\s]/g, '_')}.csv`;
}

/**
 * Render bars as CSV: header row, comma separated, '\n' line endings
 */
export function formatBarsCsv(bars: readonly Bar[]): string {
  const csv = Papa.unparse(
    {
      fields: [...HARDCODED_CONFIG.output.columns],
      data: bars.map((bar) => [bar.date, bar.open, bar.high, bar.low, bar.close, bar.volume]),
    },
    { newline: '\n' }
  );
  return `${csv}\n`;
}

/**
 * One UTF-8 CSV file per symbol: <dir>/<SYMBOL>.csv
 *
 * Writes go to <SYMBOL>.csv.tmp first and are renamed into place, so an
 * interrupted run never leaves a truncated file behind.
 */
export class CsvOutputSink implements OutputSink {
  async write(symbol: string, bars: readonly Bar[], destinationDir: string): Promise<OutputWriteResult> {
    await fs.mkdir(destinationDir, { recursive: true });

    const filePath = path.join(destinationDir, symbolFileName(symbol));
    const tempPath = `${filePath}.tmp`;

    await fs.writeFile(tempPath, formatBarsCsv(bars), 'utf8');
    await fs.rename(tempPath, filePath);

    logger.debug({ event: 'csv_written', symbol, path: filePath, rows: bars.length }, `Wrote ${filePath}`);
    return { path: filePath };
  }
}
