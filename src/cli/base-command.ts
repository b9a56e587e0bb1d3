/**
 * Base Command
 *
 * Provides common functionality for all CLI commands including:
 * - Global option handling (verbose, quiet, no-color)
 * - Error-to-exit-code mapping
 * - Output utilities (log, warn, error)
 * - A `Logger` adapter handed to the scan core
 *
 * @module cli/base-command
 */

import chalk from 'chalk';
import { isConfigurationError } from '../config/errors.js';
import { isAuthError } from '../auth/service-account.js';
import { isInsightsApiError } from '../insights/client.js';
import { isLedgerError } from '../ledger/types.js';
import { isNotificationError } from '../notify/types.js';
import type { Logger } from '../pipeline/types.js';
import { getDataDir, resolveDataDir } from '../storage/paths.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Global CLI options available to all commands.
 */
export interface GlobalOptions {
  /** Enable verbose output for debugging */
  verbose?: boolean;
  /** Suppress all non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  color?: boolean; // commander inverts --no-color to color: false
  /** Override default data directory */
  dataDir?: string;
}

// ============================================================================
// Exit Codes
// ============================================================================

/**
 * Standard exit codes for the CLI.
 */
export const EXIT_CODES = {
  /** Successful execution */
  SUCCESS: 0,
  /** General error */
  ERROR: 1,
  /** Invalid usage or arguments */
  USAGE_ERROR: 2,
  /** Auth, ledger, insights or email API error */
  API_ERROR: 4,
  /** Missing or invalid configuration (sysexits EX_CONFIG) */
  CONFIG_ERROR: 78,
  /** User cancelled operation */
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Flags that cannot be combined or do not parse.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

/**
 * Map a failure to the exit code the process should end with.
 */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof UsageError) {
    return EXIT_CODES.USAGE_ERROR;
  }
  if (isConfigurationError(error)) {
    return EXIT_CODES.CONFIG_ERROR;
  }
  if (isAuthError(error) || isLedgerError(error) || isNotificationError(error) || isInsightsApiError(error)) {
    return EXIT_CODES.API_ERROR;
  }
  return EXIT_CODES.ERROR;
}

// ============================================================================
// BaseCommand Class
// ============================================================================

/**
 * Base command class providing common CLI functionality.
 *
 * All command handlers receive a BaseCommand instance
 * to access consistent logging, error handling, and options.
 *
 * @example
 * ```typescript
 * .action(async (options: ScanOptions, cmd: Command) => {
 *   const base = getBaseCommand(cmd.parent ?? cmd);
 *   await base.run(async () => {
 *     const result = await runSingleCity(controls, services);
 *     base.success(`Appended ${result.rowsAppended} rows`);
 *   });
 * });
 * ```
 */
export class BaseCommand {
  /** Global options from CLI */
  readonly options: GlobalOptions;

  /** Whether colored output is enabled */
  private readonly useColor: boolean;

  /** Resolved data directory path */
  readonly dataDir: string;

  constructor(options: GlobalOptions) {
    this.options = options;
    this.useColor = options.color !== false && process.stdout.isTTY === true;
    this.dataDir = options.dataDir ? resolveDataDir(options.dataDir) : getDataDir();

    // Configure chalk based on color preference
    if (!this.useColor) {
      chalk.level = 0;
    }
  }

  // ==========================================================================
  // Output Methods
  // ==========================================================================

  /**
   * Log a debug message (only visible in verbose mode).
   */
  debug(message: string, ...args: unknown[]): void {
    if (this.options.verbose) {
      console.log(chalk.dim(`[DEBUG] ${message}`), ...args);
    }
  }

  /**
   * Log an informational message (hidden in quiet mode).
   */
  info(message: string, ...args: unknown[]): void {
    if (!this.options.quiet) {
      console.log(message, ...args);
    }
  }

  /**
   * Log a warning message (always visible).
   */
  warn(message: string, ...args: unknown[]): void {
    console.warn(chalk.yellow(`Warning: ${message}`), ...args);
  }

  /**
   * Print an error without exiting.
   */
  report(message: string, ...args: unknown[]): void {
    console.error(chalk.red(`Error: ${message}`), ...args);
  }

  /**
   * Log an error message and exit.
   *
   * @param errorOrCode - Error object (mapped through `exitCodeFor`) or exit code
   */
  error(message: string, errorOrCode?: Error | ExitCode): never {
    this.report(message);

    if (errorOrCode instanceof Error) {
      if (this.options.verbose) {
        console.error(chalk.dim(errorOrCode.stack ?? errorOrCode.message));
      }
      process.exit(exitCodeFor(errorOrCode));
    } else if (typeof errorOrCode === 'number') {
      process.exit(errorOrCode);
    }
    process.exit(EXIT_CODES.ERROR);
  }

  /**
   * Run a command body, turning any failure into an error message and exit code.
   */
  async run(task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error) {
      if (error instanceof Error) {
        this.error(error.message, error);
      }
      this.error(String(error), EXIT_CODES.ERROR);
    }
  }

  /**
   * Log a success message with green checkmark.
   */
  success(message: string): void {
    if (!this.options.quiet) {
      console.log(chalk.green(`${this.useColor ? '✔' : '[OK]'} ${message}`));
    }
  }

  /**
   * Print a blank line (hidden in quiet mode).
   */
  blank(): void {
    if (!this.options.quiet) {
      console.log();
    }
  }

  /**
   * Print data as formatted JSON.
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  // ==========================================================================
  // Logger Adapter
  // ==========================================================================

  /**
   * Logger for the scan core. Errors are reported without exiting; the
   * command decides whether the run fails.
   */
  logger(): Logger {
    return {
      debug: (message, ...args) => this.debug(message, ...args),
      info: (message, ...args) => this.info(message, ...args),
      warn: (message, ...args) => this.warn(message, ...args),
      error: (message, ...args) => this.report(message, ...args),
    };
  }

  // ==========================================================================
  // Utility Methods
  // ==========================================================================

  isVerbose(): boolean {
    return this.options.verbose === true;
  }

  isQuiet(): boolean {
    return this.options.quiet === true;
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

export function createBaseCommand(options: GlobalOptions): BaseCommand {
  return new BaseCommand(options);
}

/**
 * Get the base command from a commander Command instance.
 * Used by subcommand handlers to access shared functionality.
 */
export function getBaseCommand(cmd: { opts(): Record<string, unknown> }): BaseCommand {
  const base = cmd.opts()['_baseCommand'];
  if (!(base instanceof BaseCommand)) {
    // Create a default one if not available (for testing)
    return new BaseCommand({});
  }
  return base;
}
