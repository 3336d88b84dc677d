/* eslint-disable no-restricted-syntax */
// NOTE: LogManager is for internal logger system use only. Engine modules log through dxfLogger from utils/logging/dxfLogger.
import { v4 as uuidv4 } from 'uuid';
import { LoggingConfig, LoggingLevelName, LogEntry, LogEntryLevel, ILogAdapter, LogContext } from './types';
import { isLogLevelEnabled, setLogLevel, getLogLevel, getLogLevelConfig, isLogLevel, LogLevel } from './logLevelConfig';

/**
 * Singleton log buffer and dispatcher for the engine
 */
export class LogManager {
  private static instance: LogManager;
  private logs: LogEntry[] = [];
  private readonly MAX_LOGS = 10000; // Prevent memory issues
  private config: LoggingConfig = loadLoggingConfig();
  private adapters: ILogAdapter[] = resolveAdapters(this.config.adapters);
  private readonly instanceId: string;

  private constructor() {
    this.instanceId = uuidv4();
    applyLevels(this.config);
  }

  /**
   * Get the singleton instance
   */
  public static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  public getInstanceId(): string {
    return this.instanceId;
  }

  // Log level management delegates to logLevelConfig
  public setLogLevel(level: LogLevel): void {
    setLogLevel(level);
  }

  public getLogLevel(): LogLevel {
    return getLogLevel();
  }

  public setComponentLogLevel(component: string, level: LogLevel): void {
    setLogLevel(level, component);
  }

  public getComponentLogLevel(component: string): LogLevel {
    return getLogLevel(component);
  }

  public getComponentFilters(): [string, LogLevel][] {
    return Object.entries(getLogLevelConfig().modules);
  }

  public addAdapter(adapter: ILogAdapter): () => void {
    this.adapters.push(adapter);
    return () => {
      this.adapters = this.adapters.filter(a => a !== adapter);
    };
  }

  private shouldLog(level: LogEntryLevel, source: string): boolean {
    return isLogLevelEnabled(source, level);
  }

  /**
   * Safely stringify an object, handling circular references and large objects
   */
  public safeStringify(obj: unknown, indent: number = 2): string {
    const MAX_ARRAY_LENGTH = 10;
    const TRUNCATE_LENGTH = 100;
    const seen = new WeakSet<object>();

    function truncate(str: string): string {
      return str.length > TRUNCATE_LENGTH ?
        str.slice(0, TRUNCATE_LENGTH) + '...' : str;
    }

    return JSON.stringify(obj, function(key: string, value: unknown) {
      if (key.startsWith('_') || typeof value === 'function') {
        return '[Omitted]';
      }
      if (typeof value === 'string') {
        return truncate(value);
      }
      if (typeof value === 'bigint') {
        return value.toString();
      }
      if (typeof value !== 'object' || value === null) {
        return value;
      }
      if (value instanceof Error) {
        return {
          name: value.name,
          message: value.message,
          stack: value.stack?.split('\n').slice(0, 3).join('\n')
        };
      }
      if (seen.has(value)) {
        return '[Circular]';
      }
      if (value instanceof LogManager) {
        return '[Logger]';
      }
      if (value instanceof Map) {
        return `[Map(${value.size})]`;
      }
      if (value instanceof Set) {
        return `[Set(${value.size})]`;
      }
      seen.add(value);
      if (Array.isArray(value) && value.length > MAX_ARRAY_LENGTH) {
        return [...value.slice(0, MAX_ARRAY_LENGTH), `...${value.length - MAX_ARRAY_LENGTH} more items`];
      }
      return value;
    }, indent) ?? '';
  }

  public formatLogEntry(entry: LogEntry): string {
    let dataStr = '';
    if (entry.data !== undefined) {
      try {
        dataStr = '\n' + this.safeStringify(entry.data);
      } catch {
        dataStr = '\n[Error stringifying data]';
      }
    }
    return `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}${dataStr}`;
  }

  private addLog(entry: LogEntry): void {
    this.logs.push(entry);
    if (this.logs.length > this.MAX_LOGS) {
      this.logs.shift(); // Remove oldest log if buffer is full
    }
    for (const adapter of this.adapters) {
      adapter.log(entry);
    }
  }

  private record(level: LogEntryLevel, source: string, message: string, data?: unknown, context?: LogContext): void {
    if (this.shouldLog(level, source)) {
      this.addLog({
        timestamp: new Date().toISOString(),
        level, source, message, data, context
      });
    }
  }

  /**
   * Log a debug message
   */
  public debug(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.record('debug', source, message, data, context);
  }

  /**
   * Log an info message
   */
  public info(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.record('info', source, message, data, context);
  }

  /**
   * Log a warning message
   */
  public warn(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.record('warn', source, message, data, context);
  }

  /**
   * Log an error message
   */
  public error(source: string, message: string, data?: unknown, context?: LogContext): void {
    this.record('error', source, message, data, context);
  }

  /**
   * Get all logs
   */
  public getLogs(): LogEntry[] {
    return [...this.logs];
  }

  /**
   * Clear all logs
   */
  public clearLogs(): void {
    this.logs = [];
  }

  /**
   * Render the buffered logs as plain text
   */
  public dumpLogs(): string {
    const header = [
      '=== DXF Engine Logs ===',
      `Generated: ${new Date().toISOString()}`,
      `Environment: ${process.env.NODE_ENV}`,
      `Log Level: ${this.getLogLevel()}`,
      `Total Logs: ${this.logs.length}`,
      '=======================\n'
    ].join('\n');
    return header + this.logs.map(entry => this.formatLogEntry(entry)).join('\n');
  }
}

// Config loader (env)
function loadLoggingConfig(): LoggingConfig {
  const rawLevel = (process.env.LOG_LEVEL || '').toUpperCase();
  const logLevel = isLoggingLevel(rawLevel) ? rawLevel : undefined;
  let sourceFilters: LoggingConfig['sourceFilters'] = undefined;
  if (process.env.LOG_SOURCES) {
    sourceFilters = process.env.LOG_SOURCES.split(',').reduce<Record<string, LoggingLevelName>>((acc, pair) => {
      const [src, lvl] = pair.split(':');
      const level = (lvl || '').trim().toUpperCase();
      if (src && isLoggingLevel(level)) acc[src.trim()] = level;
      return acc;
    }, {});
  }
  const adapters = process.env.NODE_ENV === 'test' ? [] : ['console'];
  return { logLevel, sourceFilters, adapters };
}

function isLoggingLevel(value: string): value is LoggingLevelName {
  return isLogLevel(value.toLowerCase());
}

function applyLevels(config: LoggingConfig): void {
  if (config.logLevel) {
    const level = config.logLevel.toLowerCase();
    if (isLogLevel(level)) setLogLevel(level);
  }
  for (const [source, lvl] of Object.entries(config.sourceFilters ?? {})) {
    const level = lvl.toLowerCase();
    if (isLogLevel(level)) setLogLevel(level, source);
  }
}

// Adapter registry
const adapterRegistry: Record<string, ILogAdapter> = {};

// Console adapter: everything goes to stderr so logs never mix with serialized output
class ConsoleAdapter implements ILogAdapter {
  log(entry: LogEntry): void {
    const line = `[${entry.timestamp}] [${entry.level}] [${entry.source}] ${entry.message}`;
    if (entry.level === 'error') {
      console.error(line, entry.data ?? '');
    } else {
      console.warn(line, entry.data ?? '');
    }
  }
}
adapterRegistry['console'] = new ConsoleAdapter();

function resolveAdapters(names: string[] | undefined): ILogAdapter[] {
  return (names ?? ['console'])
    .map(name => adapterRegistry[name])
    .filter((adapter): adapter is ILogAdapter => adapter !== undefined);
}
/* eslint-enable no-restricted-syntax */
