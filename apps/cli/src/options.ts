import { Command, InvalidArgumentError } from 'commander';
import { DEFAULT_BAR_SIZE, type BarSize, type CalendarDate, type QuarryEnvConfig } from '@quarry/schemas';
import { parseBarSize, parseCalendarDate } from '@quarry/utils';

export const DEFAULT_START_DATE = '2008-01-01';

/**
 * Raw flag values as commander hands them over
 */
export interface CliFlags {
  list?: string[];
  index?: string[];
  symbolsFile?: string;
  startDate: string;
  endDate?: string;
  barSize?: string;
  outputDir?: string;
  persist: boolean;
  maxCount?: number;
  startFrom?: number;
  spacingMs?: number;
  maxRetries?: number;
  gatewayUrl?: string;
}

export type SymbolSource =
  | { kind: 'list'; symbols: string[] }
  | { kind: 'index'; symbols: string[] }
  | { kind: 'file'; path: string };

/**
 * Everything one batch run needs, after flags have been merged over the environment
 */
export interface RunConfig {
  source: SymbolSource;
  startDate: CalendarDate;
  endDate?: CalendarDate;
  barSize: BarSize;
  outputDir: string;
  persist: boolean;
  maxCount?: number;
  startFrom?: number;
  requestSpacingMs: number;
  maxRetries: number;
  retryBaseDelayMs: number;
  requestTimeoutMs?: number;
  maxWindowDays?: number;
  gatewayUrl: string;
}

function positiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

function nonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

export function createProgram(): Command {
  return new Command()
    .name('quarry')
    .description('Fetch historical price bars for a list of symbols into per-symbol CSV files')
    .option('--list <symbols...>', 'symbols to fetch')
    .option('--index <symbols...>', 'index symbols to fetch (e.g. NDX SPX)')
    .option('--symbols-file <path>', 'file with one symbol per line (first column)')
    .option('--start-date <date>', 'first date, YYYY-MM-DD or YYYYMMDD', DEFAULT_START_DATE)
    .option('--end-date <date>', 'last date (default: today)')
    .option('--bar-size <size>', `bar size (default: ${DEFAULT_BAR_SIZE})`)
    .option('--output-dir <dir>', 'directory for the CSV files')
    .option('--no-persist', 'fetch without writing any files')
    .option('--max-count <n>', 'process at most n symbols', positiveInt)
    .option('--start-from <n>', '1-based position in the cleaned list to start from', positiveInt)
    .option('--spacing-ms <ms>', 'minimum time between provider requests', nonNegativeInt)
    .option('--max-retries <n>', 'retries per chunk after the first attempt', nonNegativeInt)
    .option('--gateway-url <url>', 'Client Portal gateway API root');
}

function resolveSource(flags: CliFlags): SymbolSource {
  const sources: SymbolSource[] = [];
  if (flags.list) sources.push({ kind: 'list', symbols: flags.list });
  if (flags.index) sources.push({ kind: 'index', symbols: flags.index });
  if (flags.symbolsFile) sources.push({ kind: 'file', path: flags.symbolsFile });

  if (sources.length !== 1) {
    throw new Error('Provide exactly one of --list, --index or --symbols-file');
  }
  return sources[0];
}

/**
 * Merge parsed flags over the validated environment
 *
 * @throws Error when the symbol source is missing or ambiguous
 * @throws Error on an invalid date or bar size
 */
export function resolveRunConfig(flags: CliFlags, env: QuarryEnvConfig): RunConfig {
  return {
    source: resolveSource(flags),
    startDate: parseCalendarDate(flags.startDate),
    endDate: flags.endDate === undefined ? undefined : parseCalendarDate(flags.endDate),
    barSize: parseBarSize(flags.barSize),
    outputDir: flags.outputDir ?? env.QUARRY_OUTPUT_DIR,
    persist: flags.persist,
    maxCount: flags.maxCount,
    startFrom: flags.startFrom,
    requestSpacingMs: flags.spacingMs ?? env.QUARRY_REQUEST_SPACING_MS,
    maxRetries: flags.maxRetries ?? env.QUARRY_MAX_RETRIES,
    retryBaseDelayMs: env.QUARRY_RETRY_BASE_DELAY_MS,
    requestTimeoutMs: env.QUARRY_REQUEST_TIMEOUT_MS,
    maxWindowDays: env.QUARRY_MAX_WINDOW_DAYS,
    gatewayUrl: flags.gatewayUrl ?? env.QUARRY_GATEWAY_URL,
  };
}
