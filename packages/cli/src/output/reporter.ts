/**
 * Diagnostic output for CLI commands
 */

import chalk from 'chalk';

import type { ColorFunctions, ReporterOptions } from './types.js';

export type { ReporterOptions } from './types.js';

// Helper function for colorized output
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
    };
  }
  // No colors - return text as-is
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
  };
}

/**
 * Reporter for diagnostics. Results are written by the commands themselves;
 * everything here goes to stderr so piped output stays clean.
 */
export class Reporter {
  private readonly silent: boolean;
  private readonly verbose: boolean;
  private readonly write: (line: string) => void;
  private readonly c: ColorFunctions;

  constructor(options: ReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.verbose = options.verbose ?? false;
    this.write = options.write ?? ((line: string) => console.error(line));
    this.c = createColorFns(options.color ?? true);
  }

  info(message: string): void {
    if (this.silent) return;
    this.write(message);
  }

  success(message: string): void {
    if (this.silent) return;
    this.write(this.c.green(`✓ ${message}`));
  }

  warn(message: string): void {
    if (this.silent) return;
    this.write(this.c.yellow(`⚠ ${message}`));
  }

  debug(message: string): void {
    if (this.silent || !this.verbose) return;
    this.write(this.c.dim(`[debug] ${message}`));
  }

  /**
   * Print a titled block of key/value lines
   */
  section(title: string, entries: Array<[string, string]>): void {
    if (this.silent) return;
    this.write(this.c.bold(title));
    for (const [key, value] of entries) {
      this.write(`  ${this.c.dim(`${key}:`)} ${value}`);
    }
  }
}
