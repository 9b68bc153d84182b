import type { FetchEvent, FetchEventSink, FetchEventType } from '@quarry/schemas';
import type { Logger } from '@quarry/utils';

/**
 * Renders fetch events as structured log lines
 *
 * Event names become snake_case `event` fields (symbol-result -> symbol_result).
 * Failed symbols log at error level so they also land in the error log file.
 */
export function createLoggerEventSink(logger: Logger): FetchEventSink {
  return {
    emit(event) {
      const { type, ...fields } = event;
      const line = { event: type.replace(/-/g, '_'), ...fields };

      switch (event.type) {
        case 'batch-started':
          logger.info(
            line,
            `Starting batch: ${event.total} symbols from ${event.startDate} to ${event.endDate} (${event.barSize})`
          );
          return;
        case 'fetch-started':
          logger.info(line, `Fetching ${event.symbol} (${event.kind}) in ${event.chunkCount} chunk(s)`);
          return;
        case 'chunk-result':
          if (event.outcome === 'succeeded') {
            logger.debug(line, `${event.symbol} chunk ${event.chunkIndex}: ${event.barCount ?? 0} bars`);
          } else {
            logger.warn(line, `${event.symbol} chunk ${event.chunkIndex} failed: ${event.reason ?? 'unknown'}`);
          }
          return;
        case 'chunk-retry':
          logger.warn(
            line,
            `Retrying ${event.symbol} chunk ${event.chunkIndex} in ${event.delayMs}ms (${event.reason})`
          );
          return;
        case 'series-reconciled':
          logger.debug(
            line,
            `${event.symbol}: ${event.barCount} bars after reconciliation, ${event.droppedOutOfRange} outside the range`
          );
          return;
        case 'reconciliation-warning':
          logger.warn(line, `${event.symbol}: ${event.warnings.length} data quality warning(s)`);
          return;
        case 'symbol-result':
          if (event.outcome === 'success') {
            logger.info(line, `${event.symbol}: ${event.recordCount} records`);
          } else {
            logger.error(line, `${event.symbol} failed: ${event.reason ?? 'unknown'}`);
          }
          return;
        case 'batch-progress':
          logger.info(line, `Progress: ${event.completed}/${event.total}`);
          return;
        case 'batch-summary':
          logger.info(
            line,
            `Batch complete: ${event.success}/${event.total} succeeded in ${(event.elapsedMs / 1000).toFixed(1)}s`
          );
          return;
        default: {
          const _exhaustive: never = event;
          return _exhaustive;
        }
      }
    },
  };
}

export interface CollectingEventSink extends FetchEventSink {
  readonly events: FetchEvent[];
  ofType<T extends FetchEventType>(type: T): Extract<FetchEvent, { type: T }>[];
}

/**
 * Keeps every event in memory, in emission order
 */
export function createCollectingEventSink(): CollectingEventSink {
  const events: FetchEvent[] = [];
  return {
    events,
    emit(event) {
      events.push(event);
    },
    ofType<T extends FetchEventType>(type: T) {
      return events.filter((event): event is Extract<FetchEvent, { type: T }> => event.type === type);
    },
  };
}
