/**
 * CLI Output Module
 *
 * Provides structured output for CLI commands with support for:
 * - Different message types (info, success, error, warning)
 * - Quiet mode to suppress non-essential output
 * - Status symbols colored with chalk unless NO_COLOR is set
 *
 * This module is for USER-FACING output only. For diagnostic/debug logging,
 * use the logging module (src/logging/logger.ts).
 */

import chalk from 'chalk';

/**
 * Output configuration options.
 */
export interface OutputConfig {
  /** Suppress non-essential output */
  quiet?: boolean;
  /** Disable colored output */
  noColor?: boolean;
}

/**
 * Check if colors should be disabled based on environment.
 * Respects NO_COLOR standard (https://no-color.org/)
 */
function shouldDisableColor(): boolean {
  if (process.env.NO_COLOR !== undefined && process.env.NO_COLOR !== '') {
    return true;
  }
  if (process.env.FORCE_COLOR === '0') {
    return true;
  }
  return false;
}

let globalConfig: OutputConfig = {
  quiet: false,
  noColor: shouldDisableColor(),
};

/**
 * Configure global output settings.
 */
export function configureOutput(config: OutputConfig): void {
  globalConfig = { ...globalConfig, ...config };
}

export function getOutputConfig(): OutputConfig {
  return { ...globalConfig };
}

/**
 * Reset output configuration to defaults.
 */
export function resetOutput(): void {
  globalConfig = { quiet: false, noColor: shouldDisableColor() };
}

export function isQuiet(): boolean {
  return globalConfig.quiet ?? false;
}

type Tint = (text: string) => string;

function tint(color: Tint, text: string): string {
  return globalConfig.noColor ? text : color(text);
}

/**
 * Status symbols, colored when color is enabled.
 */
export const symbols = {
  success: (): string => tint(chalk.green, '✓'),
  failure: (): string => tint(chalk.red, '✗'),
  warning: (): string => tint(chalk.yellow, '⚠'),
};

/**
 * Dim secondary text (URLs, hints).
 */
export function dim(text: string): string {
  return tint(chalk.gray, text);
}

/**
 * Bold headings.
 */
export function bold(text: string): string {
  return tint(chalk.bold, text);
}

/**
 * Standard information output.
 * Use for progress messages, status updates, and general information.
 */
export function info(message: string): void {
  if (!globalConfig.quiet) {
    console.log(message);
  }
}

/**
 * Success message output, prefixed with a check mark.
 */
export function success(message: string): void {
  if (!globalConfig.quiet) {
    console.log(`${symbols.success()} ${message}`);
  }
}

/**
 * Warning message output.
 * Always shown (not suppressed by quiet mode) as warnings are important.
 */
export function warn(message: string): void {
  console.warn(`${symbols.warning()} ${message}`);
}

/**
 * Error message output.
 * Always shown (not suppressed by quiet mode) as errors are critical.
 */
export function error(message: string): void {
  console.error(message);
}

export function newline(): void {
  if (!globalConfig.quiet) {
    console.log('');
  }
}

/**
 * Print formatted JSON output.
 * Always shown as this is requested data output.
 */
export function json(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

/**
 * Print a section header.
 */
export function section(title: string): void {
  if (!globalConfig.quiet) {
    console.log(`\n--- ${bold(title)} ---`);
  }
}

/**
 * Print a key-value pair. Null and undefined values are skipped.
 */
export function keyValue(key: string, value: string | number | boolean | null | undefined): void {
  if (!globalConfig.quiet && value !== undefined && value !== null) {
    console.log(`${key}: ${value}`);
  }
}

/**
 * Print a list item.
 */
export function listItem(item: string, indent: number = 0): void {
  if (!globalConfig.quiet) {
    const prefix = `${'  '.repeat(indent)}- `;
    console.log(`${prefix}${item}`);
  }
}

/**
 * Print numbered list items.
 */
export function numberedList(items: string[], startIndex: number = 1): void {
  if (!globalConfig.quiet) {
    items.forEach((item, i) => {
      console.log(`  ${startIndex + i}) ${item}`);
    });
  }
}
