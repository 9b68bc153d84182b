import { z } from 'zod';

const optionalPositiveInt = () =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().positive()).optional();

const nonNegativeInt = (fallback: string) =>
  z.string().transform((val) => parseInt(val, 10)).pipe(z.number().int().nonnegative()).default(fallback);

/**
 * Environment configuration schema
 * Validated once at CLI startup; command-line flags override these values
 */
export const QuarryEnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('production'),

  // Client Portal gateway running beside the broker session
  QUARRY_GATEWAY_URL: z.string().url('Invalid gateway URL').default('https://localhost:5000/v1/api'),

  // Pacing and retries
  QUARRY_REQUEST_SPACING_MS: nonNegativeInt('3000'),
  QUARRY_MAX_RETRIES: nonNegativeInt('2'),
  QUARRY_RETRY_BASE_DELAY_MS: nonNegativeInt('3000'),

  // Overrides the bar-size based request timeout when set
  QUARRY_REQUEST_TIMEOUT_MS: optionalPositiveInt(),
  // Overrides the bar-size based chunk window when set
  QUARRY_MAX_WINDOW_DAYS: optionalPositiveInt(),

  QUARRY_OUTPUT_DIR: z.string().min(1).default('data'),

  // Logging
  LOG_DIR: z.string().min(1).default('logs'),
  LOG_FILE_ENABLED: z.enum(['true', 'false']).default('false').transform((val) => val === 'true'),
});

/**
 * Validated environment configuration type
 */
export type QuarryEnvConfig = z.infer<typeof QuarryEnvSchema>;

/**
 * Values that are not configurable from the environment
 */
export const HARDCODED_CONFIG = {
  gateway: {
    /** Keepalive interval; the gateway drops idle sessions after ~5 minutes */
    tickleIntervalMs: 55_000,
    /** Timeout for status, tickle and contract lookups */
    controlTimeoutMs: 10_000,
  },
  output: {
    columns: ['date', 'open', 'high', 'low', 'close', 'volume'],
  },
} as const;

export type HardcodedConfig = typeof HARDCODED_CONFIG;
