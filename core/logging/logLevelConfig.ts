import { isDebugEnabled } from '../../utils/logging/debugFlags';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'none'] as const;

export type LogLevel = typeof LOG_LEVELS[number];
const LOG_LEVEL_NUM: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  none: 5,
};

interface LogLevelConfig {
  global: LogLevel;
  modules: Record<string, LogLevel>;
  environment: 'development' | 'production' | 'test';
}

function resolveEnvironment(): LogLevelConfig['environment'] {
  const value = typeof process !== 'undefined' ? process.env.NODE_ENV : undefined;
  if (value === 'production' || value === 'test') return value;
  return 'development';
}

const env = resolveEnvironment();

function defaultGlobalLevel(): LogLevel {
  switch (env) {
    case 'production':
      return 'info';
    case 'test':
      return 'warn';
    default:
      return 'debug';
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

// Default config
const defaultConfig: LogLevelConfig = {
  global: defaultGlobalLevel(),
  modules: {},
  environment: env,
};

let config: LogLevelConfig = { ...defaultConfig, modules: {} };

export function getLogLevel(moduleName?: string): LogLevel {
  if (moduleName && config.modules[moduleName]) {
    return config.modules[moduleName];
  }
  return config.global;
}

export function setLogLevel(level: LogLevel, moduleName?: string): void {
  if (moduleName) {
    config.modules[moduleName] = level;
  } else {
    config.global = level;
  }
}

export function isLogLevelEnabled(moduleName: string, level: LogLevel): boolean {
  if (level === 'none') return false;
  // If debug flag is enabled, treat as minimum 'debug' level
  if (isDebugEnabled(moduleName)) {
    return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM['debug'];
  }
  const configuredLevel = config.modules[moduleName] || config.global;
  return LOG_LEVEL_NUM[level] >= LOG_LEVEL_NUM[configuredLevel];
}

export function getLogLevelConfig(): LogLevelConfig {
  return { ...config, modules: { ...config.modules } };
}

export function resetLogLevelConfig(): void {
  config = { ...defaultConfig, modules: {} };
}
