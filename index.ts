export * from './core/dxf';
export * from './core/config/engine-config';
export * from './core/errors/types';
export * from './core/errors/reporter';
export { ErrorSeverity } from './types/errors';
export type { StreamPosition, DiagnosticSummary } from './types/errors';
export type { ILogger } from './core/logging/ILogger';
export { DefaultLogger, defaultLogger } from './core/logging/DefaultLogger';
export { LogManager } from './core/logging/log-manager';
export { setLogLevel, getLogLevel } from './core/logging/logLevelConfig';
export type { LogLevel } from './core/logging/logLevelConfig';
export { dxfLogger } from './utils/logging/dxfLogger';
