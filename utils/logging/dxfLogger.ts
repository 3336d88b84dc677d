/* eslint-disable no-restricted-syntax */
import { LogContext, LogEntryLevel } from '../../core/logging/types';
import { LogManager } from '../../core/logging/log-manager';

type LogEventListener = (log: EmittedLogEntry) => void;

export interface EmittedLogEntry {
  timestamp: string;
  level: LogEntryLevel;
  message: string;
  data?: Record<string, unknown>;
  context?: LogContext;
}

class LogEventEmitter {
  private listeners: LogEventListener[] = [];

  addListener(listener: LogEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter(l => l !== listener);
    };
  }

  emit(log: EmittedLogEntry): void {
    this.listeners.forEach(listener => listener(log));
  }
}

const logEmitter = new LogEventEmitter();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeData(data?: unknown): Record<string, unknown> | undefined {
  if (data === undefined) return undefined;
  if (isRecord(data)) return data;
  return { value: data };
}

function getSource(context?: LogContext): string {
  return typeof context?.source === 'string' ? context.source : 'unknown';
}

function dispatch(level: LogEntryLevel, message: string, data?: unknown, context?: LogContext): void {
  const manager = LogManager.getInstance();
  const source = getSource(context);
  manager[level](source, message, data, context);
  logEmitter.emit({
    timestamp: new Date().toISOString(),
    level,
    message,
    data: normalizeData(data),
    context
  });
}

export const dxfLogger = {
  addLogListener: (listener: LogEventListener) => logEmitter.addListener(listener),

  debug(message: string, data?: unknown, context?: LogContext): void {
    dispatch('debug', message, data, context);
  },

  info(message: string, data?: unknown, context?: LogContext): void {
    dispatch('info', message, data, context);
  },

  warn(message: string, data?: unknown, context?: LogContext): void {
    dispatch('warn', message, data, context);
  },

  error(message: string, data?: unknown, context?: LogContext): void {
    dispatch('error', message, data, context);
  }
};

export type DxfLogger = typeof dxfLogger;

/* eslint-enable no-restricted-syntax */
