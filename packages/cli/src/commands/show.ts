/**
 * Show command implementation
 */

import { channelSum, formatTensor, parseTensorJson } from '@chessplanes/tensor';

import { prepareCommand } from './context.js';
import { readInput, writeOutput } from './io.js';

/**
 * Render a tensor document as text
 */
export function runShow(documentText: string, channel?: number): string {
  const tensor = parseTensorJson(documentText);
  return channel === undefined ? formatTensor(tensor) : formatTensor(tensor, { channel });
}

/**
 * Per-channel sums, for a quick look at which planes are set
 */
export function channelSums(documentText: string): number[] {
  const tensor = parseTensorJson(documentText);
  return Array.from({ length: tensor.shape[0] }, (_, channel) => channelSum(tensor, channel));
}

/**
 * `chessplanes show [file]`
 */
export async function showCommand(
  file: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const context = await prepareCommand(rawOptions);
  if (!context) return;
  const { options, reporter } = context;

  const input = await readInput(file);
  writeOutput(runShow(input, options.channel), options.output);

  if (options.verbose) {
    reporter.section(
      'Channel sums:',
      channelSums(input).map((sum, channel): [string, string] => [String(channel), String(sum)]),
    );
  }
}
