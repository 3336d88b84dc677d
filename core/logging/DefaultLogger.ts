import { ILogger } from './ILogger';
import { LogContext } from './types';
import { dxfLogger } from '../../utils/logging/dxfLogger';

// Direct LogManager usage is reserved for the logging system itself. Engine code goes through this wrapper.

/**
 * Default implementation of ILogger that forwards to dxfLogger
 */
export class DefaultLogger implements ILogger {
  debug(source: string, message: string, data?: unknown, context?: LogContext): void {
    dxfLogger.debug(message, data, { ...context, source });
  }

  info(source: string, message: string, data?: unknown, context?: LogContext): void {
    dxfLogger.info(message, data, { ...context, source });
  }

  warn(source: string, message: string, data?: unknown, context?: LogContext): void {
    dxfLogger.warn(message, data, { ...context, source });
  }

  error(source: string, message: string, data?: unknown, context?: LogContext): void {
    dxfLogger.error(message, data, { ...context, source });
  }
}

export const defaultLogger: ILogger = new DefaultLogger();
