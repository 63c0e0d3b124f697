/**
 * Pokedex Logger
 *
 * Semantic logging with configurable levels per module.
 * Levels come from the settings store:
 *   POKEDEX_LOG_MODULES='{"FilterEngine":"debug","Import":"warn"}'
 *
 * Default level is 'info' for all modules.
 */

import { settingsHelpers, type LogLevel } from '../../stores/settingsStore';

export type { LogLevel };

export type LogModule =
  | 'Database'
  | 'Store'
  | 'FilterEngine'
  | 'FilterSession'
  | 'Comparison'
  | 'Import'
  | 'Export';

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function getModuleLevel(module: LogModule): LogLevel {
  const { logging } = settingsHelpers.getSettings();
  return logging.modules[module] ?? logging.defaultLevel;
}

function shouldLog(level: LogLevel, module: LogModule): boolean {
  const moduleLevel = getModuleLevel(module);
  return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[moduleLevel];
}

function formatMessage(level: LogLevel, module: LogModule, message: string): string {
  const timestamp = new Date().toISOString().substring(11, 23);
  return `[${timestamp}] [Pokedex:${module}] ${level.toUpperCase()} ${message}`;
}

function log(level: LogLevel, module: LogModule, message: string, args: unknown[]): void {
  if (!shouldLog(level, module)) {
    return;
  }

  const line = formatMessage(level, module, message);

  switch (level) {
    case 'debug':
      console.debug(line, ...args);
      break;
    case 'info':
      console.info(line, ...args);
      break;
    case 'warn':
      console.warn(line, ...args);
      break;
    case 'error':
      console.error(line, ...args);
      break;
  }
}

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void;
  info: (message: string, ...args: unknown[]) => void;
  warn: (message: string, ...args: unknown[]) => void;
  error: (message: string, ...args: unknown[]) => void;
}

/**
 * Create a logger for a specific module
 */
export function createLogger(module: LogModule): Logger {
  return {
    debug: (message: string, ...args: unknown[]) => log('debug', module, message, args),
    info: (message: string, ...args: unknown[]) => log('info', module, message, args),
    warn: (message: string, ...args: unknown[]) => log('warn', module, message, args),
    error: (message: string, ...args: unknown[]) => log('error', module, message, args),
  };
}

/**
 * Set log level for a module (for testing/debugging)
 */
export function setLogLevel(module: LogModule, level: LogLevel): void {
  settingsHelpers.setModuleLogLevel(module, level);
}

/**
 * Enable debug logging for all modules
 */
export function enableDebugLogging(): void {
  settingsHelpers.setDefaultLogLevel('debug');
}

/**
 * Drop runtime overrides and re-read the environment
 */
export function resetLogging(): void {
  settingsHelpers.reset();
}
