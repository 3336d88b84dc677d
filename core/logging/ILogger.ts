/**
 * Logging contract accepted by the reader, assembler and serializer.
 * Pass a custom implementation through their `logger` option to redirect engine logs.
 */
import { LogContext } from './types';

export interface ILogger {
  /**
   * Log a debug level message
   * @param source - The component generating the log
   */
  debug(source: string, message: string, data?: unknown, context?: LogContext): void;

  info(source: string, message: string, data?: unknown, context?: LogContext): void;

  warn(source: string, message: string, data?: unknown, context?: LogContext): void;

  error(source: string, message: string, data?: unknown, context?: LogContext): void;
}
