import 'dotenv/config';
import {
  BatchOrchestrator,
  CsvOutputSink,
  LinearRetryPolicy,
  createLoggerEventSink,
} from '@quarry/fetch-core';
import { GatewaySession } from '@quarry/gateway-client';
import { ConnectionError } from '@quarry/schemas';
import { closeAllLogs, createLogger, flushAllLogs, validateEnv } from '@quarry/utils';
import { createProgram, resolveRunConfig, type CliFlags, type RunConfig } from './options';
import { exitCodeFor, formatBatchSummary } from './summary';
import { loadSymbolsFile } from './symbols-file';

const logger = createLogger({ name: 'cli', service: 'cli' });

async function readSymbols(config: RunConfig): Promise<string[]> {
  switch (config.source.kind) {
    case 'list':
    case 'index':
      return config.source.symbols;
    case 'file':
      return loadSymbolsFile(config.source.path);
  }
}

async function main(argv: string[]): Promise<number> {
  const program = createProgram();
  program.parse(argv);

  const env = validateEnv();
  const config = resolveRunConfig(program.opts<CliFlags>(), env);
  const symbols = await readSymbols(config);

  logger.info(
    {
      event: 'cli_start',
      source: config.source.kind,
      symbols: symbols.length,
      startDate: config.startDate,
      endDate: config.endDate ?? 'today',
      barSize: config.barSize,
      persist: config.persist,
      outputDir: config.outputDir,
    },
    'Starting batch fetch'
  );

  const session = new GatewaySession({
    baseUrl: config.gatewayUrl,
    barSize: config.barSize,
    requestTimeoutMs: config.requestTimeoutMs,
  });

  const orchestrator = new BatchOrchestrator({
    session,
    sink: new CsvOutputSink(),
    events: createLoggerEventSink(createLogger({ name: 'batch', service: 'batch' })),
    requestSpacingMs: config.requestSpacingMs,
    retryPolicy: new LinearRetryPolicy({
      maxRetries: config.maxRetries,
      baseDelayMs: config.retryBaseDelayMs,
    }),
    maxWindowDays: config.maxWindowDays ?? session.maxWindowDays,
  });

  // First SIGINT stops after the current request; a second one kills the process
  const controller = new AbortController();
  const cancel = () => {
    logger.warn({ event: 'cli_cancel' }, 'Interrupted, finishing the current request');
    controller.abort();
  };
  process.once('SIGINT', cancel);

  try {
    const report = await orchestrator.run({
      symbols,
      startDate: config.startDate,
      endDate: config.endDate,
      outputDir: config.outputDir,
      persist: config.persist,
      barSize: config.barSize,
      declaredKind: config.source.kind === 'index' ? 'index' : undefined,
      startFrom: config.startFrom,
      maxCount: config.maxCount,
      signal: controller.signal,
    });

    console.log(formatBatchSummary(report).join('\n'));
    return exitCodeFor(report);
  } finally {
    process.off('SIGINT', cancel);
  }
}

main(process.argv)
  .then(async (code) => {
    await flushAllLogs();
    closeAllLogs();
    process.exitCode = code;
  })
  .catch(async (error: unknown) => {
    const message = error instanceof Error ? error.message : String(error);
    if (error instanceof ConnectionError) {
      logger.fatal({ event: 'cli_connection_failed', error: message }, 'Cannot reach the gateway');
    } else {
      logger.fatal(
        { event: 'cli_failed', error: message, stack: error instanceof Error ? error.stack : undefined },
        'Batch fetch aborted'
      );
    }
    await flushAllLogs();
    closeAllLogs();
    process.exit(1);
  });
