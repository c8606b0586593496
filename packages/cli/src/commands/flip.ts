/**
 * Flip command implementation
 */

import { flip, parseTensorJson, stringifyTensor } from '@chessplanes/tensor';

import { prepareCommand } from './context.js';
import { readInput, writeOutput } from './io.js';

/**
 * Flip a tensor document, returning the flipped document
 */
export function runFlip(documentText: string, pretty = false): string {
  return stringifyTensor(flip(parseTensorJson(documentText)), pretty);
}

/**
 * `chessplanes flip [file]`
 */
export async function flipCommand(
  file: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const context = await prepareCommand(rawOptions);
  if (!context) return;
  const { options, config, reporter } = context;

  const input = await readInput(file);
  writeOutput(runFlip(input, config.output.pretty), options.output);

  if (options.output) {
    reporter.success(`Wrote flipped tensor to ${options.output}`);
  }
}
