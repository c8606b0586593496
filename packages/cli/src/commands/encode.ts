/**
 * Encode command implementation
 */

import { ChessPosition } from '@chessplanes/board';
import {
  encodePosition,
  flip,
  formatTensor,
  stringifyTensor,
  type BoardTensor,
  type EncodingMode,
} from '@chessplanes/tensor';

import type { OutputFormat } from '../config/index.js';

import { prepareCommand } from './context.js';
import { writeOutput } from './io.js';

export interface EncodeRequest {
  /** Starting FEN (default: standard starting position) */
  fen?: string;
  /** SAN moves applied in order after loading the FEN */
  moves?: string[];
  mode: EncodingMode;
  flip: boolean;
  format: OutputFormat;
  pretty: boolean;
}

/**
 * Build the position to encode
 * @throws InvalidFenError, IllegalMoveError
 */
export function buildPosition(fen?: string, moves: string[] = []): ChessPosition {
  const position = fen ? ChessPosition.fromFen(fen) : ChessPosition.startingPosition();
  for (const san of moves) {
    position.move(san);
  }
  return position;
}

/**
 * Encode a position and render it in the requested format
 */
export function runEncode(request: EncodeRequest): { tensor: BoardTensor; text: string } {
  const position = buildPosition(request.fen, request.moves);
  const encoded = encodePosition(position, request.mode);
  const tensor = request.flip ? flip(encoded) : encoded;

  const text =
    request.format === 'text' ? formatTensor(tensor) : stringifyTensor(tensor, request.pretty);

  return { tensor, text };
}

/**
 * `chessplanes encode [fen]`
 */
export async function encodeCommand(
  fen: string | undefined,
  rawOptions: Record<string, unknown>,
): Promise<void> {
  const context = await prepareCommand(rawOptions);
  if (!context) return;
  const { options, config, reporter } = context;

  const request: EncodeRequest = {
    mode: config.encoding.mode,
    flip: options.flip ?? false,
    format: options.format ?? 'json',
    pretty: config.output.pretty,
  };
  if (fen !== undefined) request.fen = fen;
  if (options.moves !== undefined) request.moves = options.moves;

  reporter.debug(
    `Encoding ${fen ?? 'starting position'}${options.moves ? ` after ${options.moves.join(' ')}` : ''} (${request.mode})`,
  );

  const { tensor, text } = runEncode(request);
  writeOutput(text, options.output);

  if (options.output) {
    reporter.success(`Wrote [${tensor.shape.join(', ')}] tensor to ${options.output}`);
  }
}
