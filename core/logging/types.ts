export type LogContext = {
  source?: string;
  lineNumber?: number;
  kind?: string;
  [key: string]: unknown;
};

export type LogEntryLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogEntryLevel;
  source: string;
  message: string;
  data?: unknown;
  context?: LogContext;
}

export interface ILogAdapter {
  log(entry: LogEntry): void;
}

export type LoggingLevelName = 'TRACE' | 'DEBUG' | 'INFO' | 'WARN' | 'ERROR' | 'NONE';

export type LoggingConfig = {
  logLevel?: LoggingLevelName;
  sourceFilters?: Record<string, LoggingLevelName>;
  adapters?: string[]; // e.g., ['console', 'memory']
};
