import pino from 'pino';
import { FileTransport } from './file-transport';
import {
  type LogLevel,
  type LogConfig,
  getLogLevel,
  getServiceFromName,
  buildRuntimeConfig,
  shouldLog,
  LOG_LEVEL_PRIORITY,
} from './log-config';

/**
 * Logger options for creating a new logger
 */
export interface LoggerOptions {
  /** Logger name (e.g., 'fetch:chunk') */
  name: string;
  /** Service for file grouping (auto-detected from name if not provided) */
  service?: string;
  /** Minimum log level (auto-detected from config if not provided) */
  level?: LogLevel;
  /** Enable file logging (default: from config) */
  enableFileLogging?: boolean;
  /** Custom log config (default: runtime config) */
  config?: LogConfig;
}

export type LogMethod = (obj: Record<string, unknown> | string, msg?: string) => void;

/**
 * Structured logger writing to the console (pino) and optionally to JSON files
 */
export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  flush: () => Promise<void>;
}

// One file transport per service, shared by every logger of that service
const fileTransports: Map<string, FileTransport> = new Map();

let runtimeConfig: LogConfig | null = null;

function getFileTransport(service: string, config: LogConfig): FileTransport {
  const existing = fileTransports.get(service);
  if (existing) {
    return existing;
  }
  const transport = new FileTransport({
    logDir: config.logDir,
    service,
    separateErrorLog: true,
  });
  fileTransports.set(service, transport);
  return transport;
}

function getRuntimeConfig(): LogConfig {
  if (!runtimeConfig) {
    runtimeConfig = buildRuntimeConfig();
  }
  return runtimeConfig;
}

/**
 * Create a structured logger instance
 *
 * - Console output via pino (pino-pretty when NODE_ENV=development)
 * - JSON file output with rotation and a separate error log, when enabled
 *
 * @param options - Logger options, or just a name
 */
export function createLogger(options: LoggerOptions | string): Logger {
  const opts: LoggerOptions = typeof options === 'string' ? { name: options } : options;

  const config = opts.config ?? getRuntimeConfig();
  const service = opts.service ?? getServiceFromName(opts.name);
  const level = opts.level ?? getLogLevel(opts.name, config);
  const enableFileLogging = opts.enableFileLogging ?? config.enableFileLogging;

  const isDevelopment = process.env.NODE_ENV === 'development';

  const pinoLogger = pino({
    name: opts.name,
    level,
    ...(isDevelopment && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
    formatters: {
      level: (label) => ({ level: label.toUpperCase() }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  });

  const fileTransport = enableFileLogging ? getFileTransport(service, config) : null;

  function build(target: pino.Logger, name: string): Logger {
    const method = (logLevel: LogLevel): LogMethod => {
      const write = target[logLevel].bind(target);
      return (obj, msg) => {
        if (typeof obj === 'string') {
          write(obj);
        } else {
          write(obj, msg);
        }

        if (fileTransport && shouldLog(logLevel, level)) {
          const logObj: Record<string, unknown> =
            typeof obj === 'string' ? { msg: obj } : { ...obj, msg };
          fileTransport.write({
            timestamp: new Date().toISOString(),
            level: logLevel.toUpperCase(),
            name,
            service,
            ...logObj,
          });
        }
      };
    };

    return {
      trace: method('trace'),
      debug: method('debug'),
      info: method('info'),
      warn: method('warn'),
      error: method('error'),
      fatal: method('fatal'),
      flush: async () => {
        if (fileTransport) await fileTransport.flush();
      },
    };
  }

  return build(pinoLogger, opts.name);
}

/**
 * Global logger instance for general use
 */
export const logger = createLogger('quarry');

/**
 * Flush all file transports (for graceful shutdown)
 */
export async function flushAllLogs(): Promise<void> {
  await Promise.all([...fileTransports.values()].map((transport) => transport.flush()));
}

/**
 * Close all file transports (for shutdown)
 */
export function closeAllLogs(): void {
  for (const transport of fileTransports.values()) {
    transport.closeStreams();
  }
  fileTransports.clear();
}

export type { LogLevel, LogConfig };
export { LOG_LEVEL_PRIORITY };
