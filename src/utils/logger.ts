/**
 * Structured console logger
 * One line per entry: `[timestamp] LEVEL: message {metadata}`
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

export interface Logger {
  debug(message: string, metadata?: Record<string, unknown>): void;
  info(message: string, metadata?: Record<string, unknown>): void;
  warn(message: string, metadata?: Record<string, unknown>): void;
  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): Logger;
}

export function parseLogLevel(value: string | undefined): LogLevel {
  switch ((value || '').toUpperCase()) {
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'WARN':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata && Object.keys(entry.metadata).length > 0
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function serializeError(error: unknown): unknown {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
      ...(error.cause !== undefined && { cause: serializeError(error.cause) }),
    };
  }
  return error;
}

function createLogger(context: Record<string, unknown>): Logger {
  const threshold = parseLogLevel(process.env.LOG_LEVEL);

  const enabled = (level: LogLevel): boolean => LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];

  const write = (level: LogLevel, message: string, metadata?: Record<string, unknown>): void => {
    if (!enabled(level)) return;
    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      metadata: { ...context, ...metadata },
    };
    const line = formatLog(entry);
    if (level === LogLevel.ERROR) {
      console.error(line);
    } else if (level === LogLevel.WARN) {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug(message, metadata) {
      write(LogLevel.DEBUG, message, metadata);
    },

    info(message, metadata) {
      write(LogLevel.INFO, message, metadata);
    },

    warn(message, metadata) {
      write(LogLevel.WARN, message, metadata);
    },

    error(message, error, metadata) {
      write(LogLevel.ERROR, message, {
        ...metadata,
        ...(error !== undefined && { error: serializeError(error) }),
      });
    },

    child(childContext) {
      return createLogger({ ...context, ...childContext });
    },
  };
}

export const logger: Logger = createLogger({});
