/**
 * Logger Utility
 *
 * Styled console logging for the configuration scripts.
 *
 * Log levels control verbosity per environment:
 *
 *   | Level   | Shown in prod/staging | Shown in dev |
 *   |---------|-----------------------|--------------|
 *   | error   | ✓                     | ✓            |
 *   | warn    | ✓                     | ✓            |
 *   | info    | ✓                     | ✓            |
 *   | verbose | ✗                     | ✓            |
 *   | debug   | ✗                     | ✓            |
 *
 * The level is determined by:
 *   1. LOG_LEVEL env var (explicit override)
 *   2. ENVIRONMENT env var (production/staging → info, else → debug)
 *   3. Fallback: debug (local development assumed)
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

function levelForEnvironment(environment: string | undefined): LogLevel {
  const env = environment?.toLowerCase();
  return env === 'production' || env === 'staging' ? LogLevel.INFO : LogLevel.DEBUG;
}

/**
 * Resolve the active log level from the process environment.
 */
export function resolveLogLevel(): LogLevel {
  const explicit = process.env.LOG_LEVEL?.toLowerCase();
  if (explicit && Object.hasOwn(LOG_LEVEL_MAP, explicit)) {
    return LOG_LEVEL_MAP[explicit];
  }
  return levelForEnvironment(process.env.ENVIRONMENT);
}

let currentLevel = resolveLogLevel();

// =============================================================================
// Logger
// =============================================================================

const logger = {
  /**
   * Set log level from the target environment.
   * An explicit LOG_LEVEL still wins.
   */
  setEnvironment: (environment: string): void => {
    if (process.env.LOG_LEVEL) return;
    currentLevel = levelForEnvironment(environment);
  },

  // ---------------------------------------------------------------------------
  // Core output (always shown)
  // ---------------------------------------------------------------------------

  header: (message: string): void => {
    console.log();
    console.log(chalk.bold.cyan(`━━━ ${message} ━━━`));
    console.log();
  },

  success: (message: string): void => {
    console.log(chalk.green('✓'), message);
  },

  error: (message: string): void => {
    console.log(chalk.red('✗'), message);
  },

  // ---------------------------------------------------------------------------
  // Info level
  // ---------------------------------------------------------------------------

  listItem: (message: string): void => {
    if (currentLevel >= LogLevel.INFO) {
      console.log(`  ${chalk.dim('•')} ${message}`);
    }
  },

  // ---------------------------------------------------------------------------
  // Debug (dev only)
  // ---------------------------------------------------------------------------

  debug: (message: string): void => {
    if (currentLevel >= LogLevel.DEBUG) {
      console.log(chalk.gray('⊡'), chalk.dim(message));
    }
  },

  /** Table for summaries (always shown) */
  table: (headers: string[], rows: string[][]): void => {
    const colWidths = headers.map((h, i) =>
      Math.max(h.length, ...rows.map((r) => (r[i] || '').length))
    );

    const separator = colWidths.map((w) => '─'.repeat(w + 2)).join('┼');
    const headerRow = headers
      .map((h, i) => h.padEnd(colWidths[i]))
      .join(' │ ');

    console.log();
    console.log(chalk.dim('┌─' + separator + '─┐'));
    console.log(chalk.dim('│ ') + chalk.bold(headerRow) + chalk.dim(' │'));
    console.log(chalk.dim('├─' + separator + '─┤'));

    rows.forEach((row) => {
      const rowStr = row
        .map((cell, i) => (cell || '').padEnd(colWidths[i]))
        .join(' │ ');
      console.log(chalk.dim('│ ') + rowStr + chalk.dim(' │'));
    });

    console.log(chalk.dim('└─' + separator + '─┘'));
    console.log();
  },
};

export default logger;
