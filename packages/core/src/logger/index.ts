/**
 * Logger Module
 *
 * Provides structured logging with Winston, supporting:
 * - JSON lines (for CloudWatch) or a human-readable format (for the CLI)
 * - Service-specific loggers with explicit, injected context
 * - Sensitive data redaction
 */

import winston from 'winston';
import type { LogFormat, LogLevel } from '../config/schema.js';

const TIMESTAMP_FORMAT = 'YYYY-MM-DD HH:mm:ss.SSS';

// Patterns for sensitive data redaction inside free-form strings. The
// lookbehind keeps step names such as "setSecret: ..." intact.
const SENSITIVE_PATTERNS = [
  /(?<![a-z])password['"]?\s*[:=]\s*['"]?([^'"}\s,]+)/gi,
  /(?<![a-z])secret['"]?\s*[:=]\s*['"]?([^'"}\s,]+)/gi,
  /(?<![a-z])api_?token['"]?\s*[:=]\s*['"]?([^'"}\s,]+)/gi,
  /(?<![a-z])authorization['"]?\s*[:=]\s*['"]?([^'"}\s,]+)/gi,
  /(?<![a-z])bearer\s+([^\s'"]+)/gi,
  /(?<![a-z])basic\s+([^\s'"]+)/gi,
];

const SENSITIVE_KEY_FRAGMENTS = ['password', 'secret', 'token', 'apikey', 'api_key', 'authorization'];

// Identifiers whose names contain a sensitive fragment
const IDENTIFIER_KEYS = new Set(['secretarn', 'secretid', 'secretname']);

function isSensitiveKey(key: string): boolean {
  const lowerKey = key.toLowerCase();
  if (IDENTIFIER_KEYS.has(lowerKey)) return false;
  return SENSITIVE_KEY_FRAGMENTS.some((fragment) => lowerKey.includes(fragment));
}

/**
 * Redact sensitive information from log data
 */
export function redactSensitive(data: unknown): unknown {
  if (typeof data === 'string') {
    let result = data;
    for (const pattern of SENSITIVE_PATTERNS) {
      result = result.replace(pattern, (match: string, group: string) =>
        match.replace(group, '[REDACTED]')
      );
    }
    return result;
  }
  if (Array.isArray(data)) {
    return data.map(redactSensitive);
  }
  if (data && typeof data === 'object') {
    const redacted: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (isSensitiveKey(key)) {
        redacted[key] = '[REDACTED]';
      } else {
        redacted[key] = redactSensitive(value);
      }
    }
    return redacted;
  }
  return data;
}

/**
 * Format log entry as structured JSON
 */
const jsonFormat = winston.format.printf((info) => {
  const { level, message, timestamp, correlationId, service, operation, duration, ...meta } = info;

  const logEntry: Record<string, unknown> = {
    timestamp,
    level: level.toUpperCase(),
    message: redactSensitive(String(message)),
  };

  if (correlationId) logEntry.correlationId = correlationId;
  if (service) logEntry.service = service;
  if (operation) logEntry.operation = operation;
  if (duration !== undefined) logEntry.durationMs = duration;

  // Add any additional metadata
  if (Object.keys(meta).length > 0) {
    logEntry.meta = redactSensitive(meta);
  }

  return JSON.stringify(logEntry);
});

/**
 * Human-readable format for the terminal
 */
const humanFormat = winston.format.printf((info) => {
  const { level, message, timestamp, correlationId, service, operation, duration, stack, ...meta } =
    info;

  let output = `${timestamp} [${level.toUpperCase()}]`;

  if (correlationId && typeof correlationId === 'string') {
    output += ` [${correlationId.slice(0, 8)}]`;
  }
  if (service) output += ` [${service}]`;
  if (operation) output += ` ${operation}:`;

  output += ` ${redactSensitive(String(message))}`;

  if (duration !== undefined) output += ` (${duration}ms)`;

  if (stack) {
    output += `\n${stack}`;
  }

  if (Object.keys(meta).length > 0) {
    output += `\n  → ${JSON.stringify(redactSensitive(meta), null, 2).replace(/\n/g, '\n  ')}`;
  }

  return output;
});

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Defaults to a single console transport writing every level to stderr */
  transports?: winston.transport[];
}

/**
 * Create a Winston logger with the project's formats
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const { level = 'info', format = 'json' } = options;

  const transports = options.transports ?? [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn', 'info', 'debug'],
    }),
  ];

  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ format: TIMESTAMP_FORMAT }),
      winston.format.errors({ stack: true }),
      format === 'pretty' ? humanFormat : jsonFormat
    ),
    transports,
  });
}

let rootLogger: winston.Logger | null = null;

/**
 * The process-wide logger used when no logger is injected. Reads LOG_LEVEL
 * and LOG_FORMAT directly so that logging works even when the rest of the
 * configuration fails validation.
 */
export function getRootLogger(): winston.Logger {
  if (!rootLogger) {
    const level = process.env.LOG_LEVEL;
    rootLogger = createLogger({
      level: level === 'debug' || level === 'warn' || level === 'error' ? level : 'info',
      format: process.env.LOG_FORMAT === 'pretty' ? 'pretty' : 'json',
    });
  }
  return rootLogger;
}

/**
 * Replace the process-wide logger (entry points call this once config is loaded)
 */
export function configureRootLogger(options: LoggerOptions): winston.Logger {
  rootLogger = createLogger(options);
  return rootLogger;
}

export interface OperationLogger {
  success: (message?: string, resultMeta?: Record<string, unknown>) => void;
  failure: (error: unknown, resultMeta?: Record<string, unknown>) => void;
}

/**
 * Service logger interface - returned by createServiceLogger
 */
export interface ServiceLogger {
  debug: (message: string, meta?: Record<string, unknown>) => void;
  info: (message: string, meta?: Record<string, unknown>) => void;
  warn: (message: string, meta?: Record<string, unknown>) => void;
  error: (message: string, meta?: Record<string, unknown>) => void;
  startOperation: (operation: string, meta?: Record<string, unknown>) => OperationLogger;
  /** A logger for the same service that adds `context` to every entry */
  child: (context: Record<string, unknown>) => ServiceLogger;
}

export interface ServiceLoggerOptions {
  logger?: winston.Logger;
  /** Fields attached to every entry, e.g. a correlationId */
  context?: Record<string, unknown>;
}

/**
 * Create a logger bound to a service name and an explicit context
 */
export function createServiceLogger(
  serviceName: string,
  options: ServiceLoggerOptions = {}
): ServiceLogger {
  const context = options.context ?? {};
  const target = (): winston.Logger => options.logger ?? getRootLogger();

  const write = (level: LogLevel, message: string, meta?: Record<string, unknown>): void => {
    target().log(level, message, { service: serviceName, ...context, ...meta });
  };

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
    /**
     * Log the start of an operation and return handles to log its outcome
     */
    startOperation: (operation, meta) => {
      const startTime = Date.now();
      write('debug', `Starting ${operation}`, { operation, ...meta });

      return {
        success: (message, resultMeta) => {
          write('info', message || `Completed ${operation}`, {
            operation,
            duration: Date.now() - startTime,
            status: 'success',
            ...meta,
            ...resultMeta,
          });
        },
        failure: (error, resultMeta) => {
          const errorMessage = error instanceof Error ? error.message : String(error);
          write('error', `Failed ${operation}: ${errorMessage}`, {
            operation,
            duration: Date.now() - startTime,
            status: 'failure',
            error: errorMessage,
            errorName: error instanceof Error ? error.name : undefined,
            ...meta,
            ...resultMeta,
          });
        },
      };
    },
    child: (childContext) =>
      createServiceLogger(serviceName, {
        logger: options.logger,
        context: { ...context, ...childContext },
      }),
  };
}
