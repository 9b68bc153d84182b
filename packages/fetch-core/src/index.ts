/**
 * @quarry/fetch-core
 *
 * Batch orchestration of chunked, paced, retried historical bar requests
 */

export * from './clock';

// Planning, pacing and retries
export * from './planning/chunk-planner';
export * from './throttle/throttle';
export * from './retry/retry-policy';
export * from './security/security-kind';

// Per-symbol fetch
export * from './reconciliation/reconcile-bars';
export * from './fetcher/fetch-state';
export * from './fetcher/symbol-fetcher';

// Batch
export * from './batch/symbol-list';
export * from './batch/batch-report';
export * from './batch/batch-orchestrator';
export * from './session/with-session';

// Output and events
export * from './output/output-sink';
export * from './output/csv-output-sink';
export * from './events/event-sinks';
