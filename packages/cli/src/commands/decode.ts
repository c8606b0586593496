/**
 * Decode command implementation
 */

import { renderBoard } from '@chessplanes/board';
import { BASIC_CHANNELS, decode, parseTensorJson, type DecodeOptions } from '@chessplanes/tensor';

import { prepareCommand } from './context.js';
import { readInput, writeOutput } from './io.js';

export interface DecodeResult {
  fen: string;
  board: string;
  /** Number of game-state planes present in the input and not decoded */
  ignoredChannels: number;
}

/**
 * Decode the piece planes of a tensor document
 */
export function runDecode(documentText: string, options: DecodeOptions = {}): DecodeResult {
  const tensor = parseTensorJson(documentText);
  const position = decode(tensor, options);

  return {
    fen: position.fen(),
    board: renderBoard(position),
    ignoredChannels: tensor.shape[0] - BASIC_CHANNELS,
  };
}

/**
 * `chessplanes decode [file]`
 */
export async function decodeCommand(
  file: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const context = await prepareCommand(rawOptions);
  if (!context) return;
  const { options, config, reporter } = context;

  const input = await readInput(file);
  const result = runDecode(input, {
    threshold: config.decode.threshold,
    strict: config.decode.strict,
  });

  if (result.ignoredChannels > 0) {
    reporter.warn(
      `Ignored ${result.ignoredChannels} game-state planes: side to move, castling rights, en passant and clock are not decoded`,
    );
  }

  writeOutput(`FEN: ${result.fen}\n\n${result.board}`, options.output);
}
