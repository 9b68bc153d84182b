/**
 * Log levels in order of verbosity (most verbose first)
 */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/**
 * Log level priority (lower number = more verbose)
 */
export const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  fatal: 60,
};

/**
 * Per-service log level configuration
 *
 * Service names follow the pattern: category:subcategory
 * e.g., 'fetch:chunk', 'gateway:http'
 */
export interface LogConfig {
  /** Default log level for all services */
  defaultLevel: LogLevel;
  /** Per-service level overrides */
  services: Record<string, LogLevel>;
  /** Enable JSON file logging */
  enableFileLogging: boolean;
  /** Log directory path */
  logDir: string;
}

/**
 * Default log configuration
 *
 * Chunk-level and HTTP chatter stays at warn; batch and symbol progress at info.
 * To debug, set LOG_LEVEL=debug or LOG_LEVEL_GATEWAY=debug.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  defaultLevel: 'info',
  services: {
    batch: 'info',
    fetch: 'info',
    'fetch:chunk': 'warn',
    gateway: 'info',
    'gateway:http': 'warn',
    output: 'info',
    cli: 'info',
  },
  enableFileLogging: false,
  logDir: 'logs',
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LOG_LEVEL_PRIORITY, value);
}

/**
 * Get the effective log level for a service
 *
 * Checks in order:
 * 1. Environment variable: LOG_LEVEL_{SERVICE} (e.g., LOG_LEVEL_FETCH_CHUNK=debug)
 * 2. Global LOG_LEVEL
 * 3. Per-service config
 * 4. Parent service config (e.g., 'fetch' for 'fetch:chunk')
 * 5. Default level
 */
export function getLogLevel(
  serviceName: string,
  config: LogConfig = DEFAULT_LOG_CONFIG,
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const envKey = `LOG_LEVEL_${serviceName.replace(/:/g, '_').toUpperCase()}`;
  const envLevel = env[envKey]?.toLowerCase();
  if (isLogLevel(envLevel)) {
    return envLevel;
  }

  const globalEnvLevel = env.LOG_LEVEL?.toLowerCase();
  if (isLogLevel(globalEnvLevel)) {
    return globalEnvLevel;
  }

  const exact = config.services[serviceName];
  if (exact) {
    return exact;
  }

  const parentService = getServiceFromName(serviceName);
  const parent = config.services[parentService];
  if (parentService !== serviceName && parent) {
    return parent;
  }

  return config.defaultLevel;
}

/**
 * Check if a log level should be logged given the minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[minLevel];
}

/**
 * Get the service name from a logger name (first segment before ':')
 */
export function getServiceFromName(name: string): string {
  return name.split(':')[0];
}

/**
 * Build runtime config by merging defaults with environment
 */
export function buildRuntimeConfig(env: NodeJS.ProcessEnv = process.env): LogConfig {
  return {
    ...DEFAULT_LOG_CONFIG,
    enableFileLogging: env.LOG_FILE_ENABLED === 'true',
    logDir: env.LOG_DIR || DEFAULT_LOG_CONFIG.logDir,
  };
}
