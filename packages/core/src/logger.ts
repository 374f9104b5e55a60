import chalk from 'chalk';

/** Severity levels, lowest first. `silent` suppresses everything. */
export const LogLevel = {
  Debug: 'debug',
  Info: 'info',
  Warn: 'warn',
  Error: 'error',
  Silent: 'silent',
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Minimal logging surface accepted by every Colloquy component. */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Lowest level that is printed (default: `info`, or `debug` when COLLOQUY_VERBOSE=1). */
  level?: LogLevel;
}

function defaultLevel(): LogLevel {
  return process.env['COLLOQUY_VERBOSE'] === '1' ? LogLevel.Debug : LogLevel.Info;
}

/**
 * Create a console logger whose lines are prefixed with `[scope]`.
 * Debug and info go to stdout, warnings and errors to stderr.
 */
export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? defaultLevel()];
  const enabled = (level: LogLevel): boolean => LEVEL_RANK[level] >= threshold;
  const prefix = `[${scope}]`;

  return {
    debug(message: string): void {
      if (enabled('debug')) {
        console.log(chalk.gray(`${prefix} [debug] ${message}`));
      }
    },

    info(message: string): void {
      if (enabled('info')) {
        console.log(`${prefix} ${message}`);
      }
    },

    warn(message: string): void {
      if (enabled('warn')) {
        console.error(chalk.yellow(`${prefix} Warning: ${message}`));
      }
    },

    error(message: string): void {
      if (enabled('error')) {
        console.error(chalk.red(`${prefix} Error: ${message}`));
      }
    },
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
