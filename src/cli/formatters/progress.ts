/**
 * Progress Formatters
 *
 * CLI progress display utilities including:
 * - Spinner for long-running operations
 * - Per-city progress display with checkmarks
 *
 * Uses the ora library for terminal spinners.
 *
 * @module cli/formatters/progress
 */

import ora from 'ora';
import chalk from 'chalk';

type Ora = ReturnType<typeof ora>;

// ============================================================================
// Types
// ============================================================================

export type CityStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface CityDisplay {
  /** Position in the run, 1-based */
  index: number;
  name: string;
  status: CityStatus;
  /** Rows appended (if completed) */
  appended?: number;
  /** Duration in milliseconds (if completed) */
  durationMs?: number;
  /** Error message (if failed) */
  error?: string;
}

export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner("Appending placeholder row to 'Test_Raw'");
 * spinner.start();
 *
 * try {
 *   await tab.appendRows([placeholderRow()]);
 *   spinner.succeed('Row appended');
 * } catch (err) {
 *   spinner.fail('Append failed');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: process.stdout.isTTY === true,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop spinner with success state, appending the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// City Progress Display
// ============================================================================

/**
 * Display all-cities progress with checkmarks.
 *
 * @example
 * ```typescript
 * const progress = new CityProgressDisplay(controls.citiesList);
 *
 * progress.startCity('Chattanooga');
 * progress.completeCity('Chattanooga', 12, 5300);
 * ```
 */
export class CityProgressDisplay {
  private cities: Map<string, CityDisplay> = new Map();
  private readonly useSpinner: boolean;
  private currentSpinner: ProgressSpinner | null = null;

  /**
   * @param spinner - Animate the running city; only safe when nothing else logs
   */
  constructor(cityNames: readonly string[], options: { spinner?: boolean } = {}) {
    this.useSpinner = process.stdout.isTTY === true && options.spinner === true;

    cityNames.forEach((name, position) => {
      this.cities.set(name, { index: position + 1, name, status: 'pending' });
    });
  }

  startCity(name: string): void {
    const city = this.cities.get(name);
    if (!city) {
      return;
    }
    city.status = 'running';

    if (this.useSpinner) {
      this.currentSpinner = new ProgressSpinner(`${name}...`);
      this.currentSpinner.start();
    } else {
      console.log(`[*] City ${city.index}/${this.cities.size}: ${name}...`);
    }
  }

  completeCity(name: string, appended: number, durationMs: number): void {
    const city = this.cities.get(name);
    if (!city) {
      return;
    }
    city.status = 'completed';
    city.appended = appended;
    city.durationMs = durationMs;

    if (this.currentSpinner) {
      this.currentSpinner.succeed(`${name}: ${appended} new`);
      this.currentSpinner = null;
    } else {
      console.log(`[+] City ${city.index}/${this.cities.size}: ${name} (${formatDuration(durationMs)})`);
    }
  }

  failCity(name: string, error: string): void {
    const city = this.cities.get(name);
    if (!city) {
      return;
    }
    city.status = 'failed';
    city.error = error;

    if (this.currentSpinner) {
      this.currentSpinner.fail(`${name} failed`);
      this.currentSpinner = null;
    } else {
      console.log(`[X] City ${city.index}/${this.cities.size}: ${name} - ${error}`);
    }
  }

  getCityDisplay(name: string): CityDisplay | undefined {
    return this.cities.get(name);
  }

  getCounts(): Record<CityStatus, number> {
    const counts: Record<CityStatus, number> = {
      pending: 0,
      running: 0,
      completed: 0,
      failed: 0,
    };

    for (const city of this.cities.values()) {
      counts[city.status]++;
    }

    return counts;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}

export function createSpinner(text: string, options?: SpinnerOptions): ProgressSpinner {
  return new ProgressSpinner(text, options);
}
