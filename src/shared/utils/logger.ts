import winston from 'winston';
import { AppError, HttpStatusError, NetworkError, ResponseParseError } from './errors';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

// Define log formats
const { combine, timestamp, printf, colorize, json } = winston.format;

// Custom format for console outputs
const prettyFormat = combine(
  colorize(),
  timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  printf(({ level, message, timestamp, ...meta }) => {
    return `${timestamp} ${level}: ${message} ${
      Object.keys(meta).length ? JSON.stringify(meta, null, 2) : ''
    }`;
  })
);

// One JSON object per line, for CI log collectors
const jsonFormat = combine(
  timestamp(),
  json()
);

function resolveLevel(): string {
  const requested = process.env.LOG_LEVEL?.toLowerCase();
  const known: readonly string[] = LOG_LEVELS;
  if (requested && known.includes(requested)) {
    return requested;
  }
  return process.env.NODE_ENV === 'production' ? 'info' : 'debug';
}

/**
 * Collects the fields worth logging for any thrown value
 */
export function describeError(err: unknown): Record<string, unknown> {
  if (!(err instanceof Error)) {
    return { message: String(err) };
  }

  const details: Record<string, unknown> = {
    error: err.name,
    message: err.message,
    isOperational: err instanceof AppError && err.isOperational,
  };

  if (err instanceof HttpStatusError || err instanceof ResponseParseError) {
    details.statusCode = err.statusCode;
    details.responseBody = err.responseBody;
  }
  if (err instanceof NetworkError && err.code) {
    details.code = err.code;
  }
  if (!(err instanceof AppError)) {
    details.stack = err.stack;
  }

  return details;
}

// Create the logger
const winstonLogger = winston.createLogger({
  level: resolveLevel(),
  silent: process.env.NODE_ENV === 'test',
  defaultMeta: { service: 'model-deploy' },
  transports: [
    new winston.transports.Console({
      format: process.env.LOG_FORMAT === 'json' ? jsonFormat : prettyFormat,
    }),
  ],
});

// Helper method to log a failure together with what was being attempted
const logger = Object.assign(winstonLogger, {
  logError(err: unknown, context: Record<string, unknown> = {}): void {
    const message = err instanceof Error ? err.message : String(err);
    winstonLogger.error(message, { ...context, ...describeError(err) });
  },
});

export interface LoggerSettings {
  level?: string;
  format?: 'pretty' | 'json';
}

/**
 * Applies settings that only become known after .env has been loaded
 */
export function configureLogger(settings: LoggerSettings): void {
  if (settings.level) {
    winstonLogger.level = settings.level;
  }
  if (settings.format) {
    const format = settings.format === 'json' ? jsonFormat : prettyFormat;
    for (const transport of winstonLogger.transports) {
      transport.format = format;
    }
  }
}

export default logger;
