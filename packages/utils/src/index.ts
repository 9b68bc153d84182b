/**
 * @quarry/utils
 *
 * Shared utility functions and helpers
 */

// Logger
export * from './logger/logger';
export * from './logger/log-config';
export * from './logger/file-transport';

// Time utilities
export * from './time/calendar';
export * from './time/bar-size';

// Validation utilities
export * from './validation/env-validator';
