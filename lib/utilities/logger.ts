/**
 * Logger Utility
 *
 * Styled console logging for the lookup pipeline and CLI.
 *
 *   | Level   | Default | --verbose |
 *   |---------|---------|-----------|
 *   | error   | ✓       | ✓         |
 *   | warn    | ✓       | ✓         |
 *   | info    | ✓       | ✓         |
 *   | verbose | ✗       | ✓         |
 *   | debug   | ✗       | ✓         |
 *
 * The level is determined by:
 *   1. LOG_LEVEL env var (explicit override)
 *   2. Fallback: info
 *
 * Errors and warnings go to stderr so stdout stays readable when a
 * report is piped.
 */

import chalk from 'chalk';

// =============================================================================
// Log Levels
// =============================================================================

export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  VERBOSE = 3,
  DEBUG = 4,
}

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  verbose: LogLevel.VERBOSE,
  debug: LogLevel.DEBUG,
};

/**
 * Resolve the active log level from environment.
 */
export function resolveLogLevel(value: string | undefined = process.env.LOG_LEVEL): LogLevel {
  const explicit = value?.toLowerCase();
  if (explicit && explicit in LOG_LEVEL_MAP) {
    return LOG_LEVEL_MAP[explicit];
  }
  return LogLevel.INFO;
}

let currentLevel = resolveLogLevel();

// =============================================================================
// Logger
// =============================================================================

const logger = {
  // ---------------------------------------------------------------------------
  // Level management
  // ---------------------------------------------------------------------------

  /** Override the current log level programmatically */
  setLevel: (level: LogLevel): void => {
    currentLevel = level;
  },

  // ---------------------------------------------------------------------------
  // Core output (always shown: error, warn, success)
  // ---------------------------------------------------------------------------

  success: (message: string): void => {
    console.log(chalk.green('✓'), message);
  },

  warn: (message: string): void => {
    console.warn(chalk.yellow('⚠'), message);
  },

  error: (message: string): void => {
    console.error(chalk.red('✗'), message);
  },

  // ---------------------------------------------------------------------------
  // Info level
  // ---------------------------------------------------------------------------

  info: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.blue('ℹ'), message);
    }
  },

  task: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(chalk.cyan('→'), message);
    }
  },

  keyValue: (key: string, value: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(`  ${chalk.dim(key + ':')} ${value}`);
    }
  },

  listItem: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(`  ${chalk.dim('•')} ${message}`);
    }
  },

  // ---------------------------------------------------------------------------
  // Verbose level (request parameters, resolved configuration)
  // ---------------------------------------------------------------------------

  verbose: (message: string): void => {
    if (currentLevel >= LogLevel.VERBOSE) {
      console.log(chalk.gray('⋯'), message);
    }
  },

  // ---------------------------------------------------------------------------
  // Debug level (counts, ids, internal state)
  // ---------------------------------------------------------------------------

  debug: (message: string): void => {
    if (currentLevel >= LogLevel.DEBUG) {
      console.log(chalk.gray('⊡'), chalk.dim(message));
    }
  },
};

export type Logger = typeof logger;

export default logger;
