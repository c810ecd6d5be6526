/**
 * QKD Telemetry - Logger
 *
 * Scoped, level-filtered console logger. Colour comes from chalk; the
 * threshold is read from QKD_LOG_LEVEL and can be changed at runtime.
 */

import chalk from 'chalk';

// ============================================
// TYPES
// ============================================

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER;
}

function levelFromEnv(): LogLevel {
  const raw = (process.env.QKD_LOG_LEVEL ?? '').toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

let threshold: LogLevel = levelFromEnv();

// ============================================
// LEVEL CONTROL
// ============================================

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

// ============================================
// FACTORY
// ============================================

/**
 * Create a logger whose lines are prefixed with `[scope]`
 */
export function createLogger(scope: string): Logger {
  const prefix = chalk.gray(`[${scope}]`);

  return {
    debug(message: string): void {
      if (enabled('debug')) console.log(`${prefix} ${chalk.dim(message)}`);
    },
    info(message: string): void {
      if (enabled('info')) console.log(`${prefix} ${message}`);
    },
    success(message: string): void {
      if (enabled('info')) console.log(`${prefix} ${chalk.green('✓')} ${message}`);
    },
    warn(message: string): void {
      if (enabled('warn')) console.warn(`${prefix} ${chalk.yellow('!')} ${chalk.yellow(message)}`);
    },
    error(message: string): void {
      if (enabled('error')) console.error(`${prefix} ${chalk.red(message)}`);
    },
  };
}
