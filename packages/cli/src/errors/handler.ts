/**
 * Error handling utilities
 */

import chalk from 'chalk';

import { IllegalMoveError, InvalidFenError, InvalidPlacementError } from '@chessplanes/board';
import { InvalidShapeError, TensorDecodeError } from '@chessplanes/tensor';

import { ConfigValidationError } from '../config/validation.js';

import { CliError } from './cli-errors.js';

/**
 * Suggestions for errors raised by the board and tensor packages
 */
function suggestionFor(error: Error): string | undefined {
  if (error instanceof InvalidFenError) {
    return 'Check the FEN string: six space-separated fields, both kings on the board';
  }
  if (error instanceof IllegalMoveError) {
    return 'Moves are applied in order in Standard Algebraic Notation, e.g. --moves "e4 e5 Nf3"';
  }
  if (error instanceof InvalidShapeError) {
    return 'Tensor documents hold 12 or 19 planes of 8x8 cells, as written by `chessplanes encode`';
  }
  if (error instanceof TensorDecodeError) {
    return 'Run without --strict to let the highest channel and the last king win';
  }
  if (error instanceof InvalidPlacementError) {
    return 'Use --strict to list the cells that cannot be decoded';
  }
  return undefined;
}

/**
 * Format an error for CLI output
 */
export function formatError(error: unknown, useColor = true): string {
  const red = useColor ? (text: string) => chalk.red(text) : (text: string) => text;

  if (error instanceof ConfigValidationError || error instanceof CliError) {
    return red(error.format());
  }

  if (error instanceof Error) {
    const suggestion = suggestionFor(error);
    const lines = [`Error: ${error.message}`];
    if (suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${suggestion}`);
    }
    return red(lines.join('\n'));
  }

  return red(`Error: ${String(error)}`);
}

/**
 * Exit code for an error
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }
  if (error instanceof ConfigValidationError) {
    return 2;
  }
  return 1;
}

/**
 * Whether error output may be colored. Errors can be raised before the
 * configuration is resolved, so only the flag and the environment count.
 */
export function errorColorEnabled(
  argv: readonly string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env,
): boolean {
  if (argv.includes('--no-color')) return false;
  const setting = env['CHESSPLANES_COLOR']?.toLowerCase();
  return setting !== 'false' && setting !== '0';
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown, useColor = errorColorEnabled()): never {
  console.error(formatError(error, useColor));
  process.exit(exitCodeFor(error));
}
