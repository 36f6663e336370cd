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

// One debug namespace per level
const debugTrace = debug('logstream:trace');
const debugDebug = debug('logstream:debug');
const debugInfo = debug('logstream:info');
const debugWarn = debug('logstream:warn');
const debugError = debug('logstream:error');
const debugSuccess = debug('logstream:success');

// stdout carries records, diagnostics go to stderr
debug.log = (...args: unknown[]) => console.error(...args);

/**
 * Level-filtered logger. Children made with `child()` share the root's level
 * and tag their messages with a scope, e.g. `[DEBUG] [file] ...`.
 */
export class Logger {
  private level: LogLevel;
  private readonly root: Logger;

  constructor(level: LogLevel = 'info', private readonly scope?: string, parent?: Logger) {
    this.level = level;
    this.root = parent ? parent.root : this;
    if (!parent) {
      this.updateDebugNamespaces();
    }
  }

  setLevel(level: LogLevel): void {
    this.root.level = level;
    this.root.updateDebugNamespaces();
  }

  getLevel(): LogLevel {
    return this.root.level;
  }

  /** Logger whose messages carry `scope`; nested scopes join with ':' */
  child(scope: string): Logger {
    return new Logger(this.root.level, this.scope ? `${this.scope}:${scope}` : scope, this);
  }

  private updateDebugNamespaces(): void {
    const namespaces: string[] = [];

    if (LOG_LEVELS[this.level] <= LOG_LEVELS.trace) {
      namespaces.push('logstream:trace');
    }
    if (LOG_LEVELS[this.level] <= LOG_LEVELS.debug) {
      namespaces.push('logstream:debug');
    }
    if (LOG_LEVELS[this.level] <= LOG_LEVELS.info) {
      namespaces.push('logstream:info', 'logstream:success');
    }
    if (LOG_LEVELS[this.level] <= LOG_LEVELS.warn) {
      namespaces.push('logstream:warn');
    }
    namespaces.push('logstream:error');

    debug.enable(namespaces.join(','));
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.root.level];
  }

  private tag(label: string, message: string): string {
    return this.scope ? `[${label}] [${this.scope}] ${message}` : `[${label}] ${message}`;
  }

  trace(message: string, ...args: unknown[]): void {
    if (this.shouldLog('trace')) {
      debugTrace(chalk.dim(this.tag('TRACE', message)), ...args);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.shouldLog('debug')) {
      debugDebug(chalk.gray(this.tag('DEBUG', message)), ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      debugInfo(chalk.blue(this.tag('INFO', message)), ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.shouldLog('warn')) {
      debugWarn(chalk.yellow(this.tag('WARN', message)), ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (this.shouldLog('error')) {
      debugError(chalk.red(this.tag('ERROR', message)), ...args);
    }
  }

  success(message: string, ...args: unknown[]): void {
    if (this.shouldLog('info')) {
      debugSuccess(chalk.green(this.tag('SUCCESS', message)), ...args);
    }
  }
}

export const logger = new Logger();
