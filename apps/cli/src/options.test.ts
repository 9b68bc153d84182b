import { describe, it, expect } from 'vitest';
import { QuarryEnvSchema } from '@quarry/schemas';
import { createProgram, resolveRunConfig, type CliFlags } from './options';

function parseFlags(args: string[]): CliFlags {
  const program = createProgram()
    .exitOverride()
    .configureOutput({ writeErr: () => undefined, writeOut: () => undefined });
  program.parse(args, { from: 'user' });
  return program.opts<CliFlags>();
}

const defaultEnv = QuarryEnvSchema.parse({});

describe('resolveRunConfig', () => {
  it('should fill defaults from the environment', () => {
    const config = resolveRunConfig(parseFlags(['--list', 'AAPL', 'MSFT']), defaultEnv);

    expect(config).toEqual({
      source: { kind: 'list', symbols: ['AAPL', 'MSFT'] },
      startDate: '2008-01-01',
      endDate: undefined,
      barSize: '1 day',
      outputDir: 'data',
      persist: true,
      maxCount: undefined,
      startFrom: undefined,
      requestSpacingMs: 3000,
      maxRetries: 2,
      retryBaseDelayMs: 3000,
      requestTimeoutMs: undefined,
      maxWindowDays: undefined,
      gatewayUrl: 'https://localhost:5000/v1/api',
    });
  });

  it('should let flags override the environment', () => {
    const flags = parseFlags([
      '--index', 'NDX', 'SPX',
      '--start-date', '20200102',
      '--end-date', '2020-03-31',
      '--bar-size', '5 min',
      '--output-dir', 'out',
      '--no-persist',
      '--max-count', '3',
      '--start-from', '2',
      '--spacing-ms', '0',
      '--max-retries', '0',
      '--gateway-url', 'https://gateway.test:5000/v1/api',
    ]);
    const env = QuarryEnvSchema.parse({ QUARRY_OUTPUT_DIR: 'env-out', QUARRY_MAX_WINDOW_DAYS: '10' });

    const config = resolveRunConfig(flags, env);

    expect(config.source).toEqual({ kind: 'index', symbols: ['NDX', 'SPX'] });
    expect(config.startDate).toBe('2020-01-02');
    expect(config.endDate).toBe('2020-03-31');
    expect(config.barSize).toBe('5 mins');
    expect(config.outputDir).toBe('out');
    expect(config.persist).toBe(false);
    expect(config.maxCount).toBe(3);
    expect(config.startFrom).toBe(2);
    expect(config.requestSpacingMs).toBe(0);
    expect(config.maxRetries).toBe(0);
    expect(config.maxWindowDays).toBe(10);
    expect(config.gatewayUrl).toBe('https://gateway.test:5000/v1/api');
  });

  it('should take the output directory from the environment when no flag is given', () => {
    const env = QuarryEnvSchema.parse({ QUARRY_OUTPUT_DIR: 'env-out' });
    expect(resolveRunConfig(parseFlags(['--symbols-file', 'list.txt']), env)).toMatchObject({
      source: { kind: 'file', path: 'list.txt' },
      outputDir: 'env-out',
    });
  });

  it('should require exactly one symbol source', () => {
    expect(() => resolveRunConfig(parseFlags([]), defaultEnv)).toThrow(
      'Provide exactly one of --list, --index or --symbols-file'
    );
    expect(() =>
      resolveRunConfig(parseFlags(['--list', 'AAPL', '--index', 'NDX']), defaultEnv)
    ).toThrow('Provide exactly one of --list, --index or --symbols-file');
  });

  it('should reject an unsupported bar size', () => {
    expect(() =>
      resolveRunConfig(parseFlags(['--list', 'AAPL', '--bar-size', '7 mins']), defaultEnv)
    ).toThrow('Unsupported bar size "7 mins"');
  });

  it('should reject an invalid start date', () => {
    expect(() =>
      resolveRunConfig(parseFlags(['--list', 'AAPL', '--start-date', '2020-02-30']), defaultEnv)
    ).toThrow(RangeError);
  });
});

describe('createProgram', () => {
  it('should reject a non-numeric max count', () => {
    expect(() => parseFlags(['--list', 'AAPL', '--max-count', 'abc'])).toThrow(
      'Expected a positive integer.'
    );
  });

  it('should reject a negative retry count', () => {
    expect(() => parseFlags(['--list', 'AAPL', '--max-retries', '-1'])).toThrow(
      'Expected a non-negative integer.'
    );
  });
});
