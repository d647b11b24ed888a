import debug from 'debug';
import chalk from 'chalk';
import { LogLevel } from './types';

const LOG_LEVELS: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
};

const NAMESPACE = 'speedup';

const debugTrace = debug(`${NAMESPACE}:trace`);
const debugDebug = debug(`${NAMESPACE}:debug`);
const debugInfo = debug(`${NAMESPACE}:info`);
const debugWarn = debug(`${NAMESPACE}:warn`);
const debugError = debug(`${NAMESPACE}:error`);
const debugSuccess = debug(`${NAMESPACE}:success`);

// stdout is reserved for result tables, diagnostics go to stderr
debug.log = (...args: unknown[]) => console.error(...args);

class Logger {
  private level: LogLevel;

  constructor(level: LogLevel = 'info') {
    this.level = level;
    this.updateDebugNamespaces();
  }

  setLevel(level: LogLevel): void {
    this.level = level;
    this.updateDebugNamespaces();
  }

  private updateDebugNamespaces(): void {
    const threshold = LOG_LEVELS[this.level];
    const namespaces: string[] = [];

    if (threshold <= LOG_LEVELS.trace) {
      namespaces.push(`${NAMESPACE}:trace`);
    }
    if (threshold <= LOG_LEVELS.debug) {
      namespaces.push(`${NAMESPACE}:debug`);
    }
    if (threshold <= LOG_LEVELS.info) {
      namespaces.push(`${NAMESPACE}:info`, `${NAMESPACE}:success`);
    }
    if (threshold <= LOG_LEVELS.warn) {
      namespaces.push(`${NAMESPACE}:warn`);
    }
    namespaces.push(`${NAMESPACE}:error`);

    debug.enable(namespaces.join(','));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.shouldLog('trace')) {
      debugTrace(chalk.dim(`[TRACE] ${message}`), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      debugDebug(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      debugInfo(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      debugWarn(chalk.yellow(`[WARN] ${message}`), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      debugError(chalk.red(`[ERROR] ${message}`), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      debugSuccess(chalk.green(`[SUCCESS] ${message}`), ...args);
    }
  }
}

export const logger = new Logger();
