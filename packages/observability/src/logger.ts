import pino from 'pino';

export type { Logger } from 'pino';

/**
 * Render bigint values as decimal strings, at any depth
 */
function toLoggableValue(value: unknown): unknown {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(toLoggableValue);
  }
  if (value instanceof Map) {
    return toLoggableRecord(Object.fromEntries(value));
  }
  if (value && typeof value === 'object' && !(value instanceof Error)) {
    return toLoggableRecord(value);
  }
  return value;
}

function toLoggableRecord(obj: object): Record<string, unknown> {
  // fromEntries defines own properties, so keys such as "__proto__" survive
  return Object.fromEntries(
    Object.entries(obj).map(([key, entry]): [string, unknown] => [key, toLoggableValue(entry)])
  );
}

/**
 * Create a structured logger instance with Pino
 *
 * Features:
 * - Environment-based log levels
 * - bigint-safe JSON output
 * - ISO 8601 timestamps
 */
export function createLogger(options?: pino.LoggerOptions, destination?: pino.DestinationStream) {
  const loggerOptions: pino.LoggerOptions = {
    level: process.env.LOG_LEVEL || 'info',
    serializers: {
      err: pino.stdSerializers.err,
    },
    formatters: {
      log: (object) => toLoggableRecord(object),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...options,
  };

  return destination ? pino(loggerOptions, destination) : pino(loggerOptions);
}

/**
 * Default logger instance for convenience
 */
export const logger = createLogger();
