import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from 'pino';
import { CLI_SECURITY } from '../constants.js';

const IS_TEST_ENV =
  process.env.NODE_ENV === 'test' ||
  process.env.VITEST === 'true' ||
  process.env.VITEST_WORKER_ID !== undefined;

/**
 * Log levels supported by octoterm.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Logger configuration options.
 */
export interface LoggerConfig {
  /** Log level (default: 'warn', 'silent' under tests) */
  level?: LogLevel;
  /** Output file path (default: stderr) */
  file?: string;
  /** Explicit destination stream; takes precedence over `file` */
  stream?: DestinationStream;
  /** Human-readable lines through pino-pretty */
  pretty?: boolean;
  /** Include timestamps in output */
  timestamp?: boolean;
  /** Component name for context */
  name?: string;
}

const DEFAULT_LEVEL: LogLevel = IS_TEST_ENV ? 'silent' : 'warn';

let rootLogger: PinoLogger | null = null;

function loggerOptions(config: LoggerConfig): LoggerOptions {
  return {
    level: config.level ?? DEFAULT_LEVEL,
    name: config.name,
    timestamp: config.timestamp === false ? false : pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    redact: {
      paths: [...CLI_SECURITY.REDACT_PATHS],
      censor: CLI_SECURITY.REDACTED,
    },
  };
}

/**
 * Where records go when no stream is given. Never stdout: that belongs to
 * command output such as `--json` documents.
 */
function defaultDestination(file: string | undefined): DestinationStream {
  return file ? pino.destination(file) : process.stderr;
}

/**
 * Create a logger. Credential-bearing paths (authorization headers, tokens,
 * secrets) are censored on every record.
 */
export function createLogger(config: LoggerConfig = {}): PinoLogger {
  const options = loggerOptions(config);

  if (config.stream) {
    return pino(options, config.stream);
  }

  if (config.pretty) {
    // The transport writes from a worker thread and owns the destination
    return pino({
      ...options,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: !config.file,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
          destination: config.file ?? 2,
        },
      },
    });
  }

  return pino(options, defaultDestination(config.file));
}

/**
 * The process-wide logger, or a child tagged with `component`.
 */
export function getLogger(component?: string): PinoLogger {
  if (!rootLogger) {
    rootLogger = createLogger();
  }
  return component ? childLogger(rootLogger, { component }) : rootLogger;
}

/**
 * Replace the process-wide logger. Loggers handed out earlier keep the old
 * settings.
 */
export function configureLogger(config: LoggerConfig): void {
  rootLogger = createLogger(config);
}

/**
 * Drop the process-wide logger so the next `getLogger` starts fresh.
 */
export function resetLogger(): void {
  rootLogger = null;
}

export function childLogger(parent: PinoLogger, bindings: Record<string, unknown>): PinoLogger {
  return parent.child(bindings);
}

/**
 * Start a stopwatch; the returned function reports elapsed milliseconds.
 */
export function startTiming(): () => number {
  const startedAt = performance.now();
  return () => Math.round(performance.now() - startedAt);
}

export type { PinoLogger as Logger };
