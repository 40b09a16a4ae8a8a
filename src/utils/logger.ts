/**
 * Console logging utility
 * Verbosity: 0 = errors only, 1 = progress, 2 = detailed
 */

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

export type Verbosity = 0 | 1 | 2;

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata?: Record<string, unknown>;
}

const MIN_VERBOSITY: Record<LogLevel, Verbosity> = {
  [LogLevel.DEBUG]: 2,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 1,
  [LogLevel.ERROR]: 0,
};

let verbosity: Verbosity = 1;

function formatLog(entry: LogEntry): string {
  const metadataStr = entry.metadata
    ? ` ${JSON.stringify(entry.metadata)}`
    : '';
  return `[${entry.timestamp}] ${entry.level}: ${entry.message}${metadataStr}`;
}

function emit(
  level: LogLevel,
  write: (line: string) => void,
  message: string,
  metadata?: Record<string, unknown>
): void {
  if (verbosity < MIN_VERBOSITY[level]) return;
  write(formatLog({
    level,
    message,
    timestamp: new Date().toISOString(),
    metadata,
  }));
}

export const logger = {
  setVerbosity(level: Verbosity): void {
    verbosity = level;
  },

  debug(message: string, metadata?: Record<string, unknown>): void {
    emit(LogLevel.DEBUG, line => console.log(line), message, metadata);
  },

  info(message: string, metadata?: Record<string, unknown>): void {
    emit(LogLevel.INFO, line => console.log(line), message, metadata);
  },

  warn(message: string, metadata?: Record<string, unknown>): void {
    emit(LogLevel.WARN, line => console.warn(line), message, metadata);
  },

  error(message: string, error?: Error | unknown, metadata?: Record<string, unknown>): void {
    emit(LogLevel.ERROR, line => console.error(line), message, {
      ...metadata,
      error: error instanceof Error ? {
        name: error.name,
        message: error.message,
        stack: error.stack,
      } : error,
    });
  },
};
