/**
 * @quarry/schemas
 *
 * Shared zod schemas, types and error taxonomy for the historical bar fetcher
 */

// Market data
export * from './market/bar.schema';

// Provider session contract
export * from './provider/errors';
export * from './provider/session.schema';

// Fetch lifecycle, results and events
export * from './fetch/transitions';
export * from './report/series.schema';
export * from './events/fetch-event.schema';

// Environment and configuration
export * from './env/config.schema';
