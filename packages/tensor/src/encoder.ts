/**
 * Position -> plane encoding
 */

import type { PositionReader } from '@chessplanes/board';

import {
  BASIC_CHANNELS,
  BLACK_KINGSIDE_CHANNEL,
  BLACK_QUEENSIDE_CHANNEL,
  BOARD_SIZE,
  EN_PASSANT_CHANNEL,
  EXTENDED_CHANNELS,
  HALFMOVE_CHANNEL,
  HALFMOVE_NORMALIZER,
  SIDE_TO_MOVE_CHANNEL,
  WHITE_KINGSIDE_CHANNEL,
  WHITE_QUEENSIDE_CHANNEL,
  pieceChannel,
} from './channels.js';
import { createTensor, fillPlane, setCell, type BoardTensor } from './tensor.js';

/**
 * Which channel set to produce
 */
export type EncodingMode = 'basic' | 'extended';

function writePieces(tensor: BoardTensor, position: PositionReader): void {
  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    for (let file = 0; file < BOARD_SIZE; file++) {
      const piece = position.pieceAt(file, rank);
      if (piece) {
        setCell(tensor, pieceChannel(piece), rank, file, 1.0);
      }
    }
  }
}

/**
 * Encode piece placement into 12 one-hot planes.
 *
 * @returns Tensor of shape [12, 8, 8]
 */
export function encodeBasic(position: PositionReader): BoardTensor {
  const tensor = createTensor(BASIC_CHANNELS);
  writePieces(tensor, position);
  return tensor;
}

/**
 * Encode piece placement plus game state into 19 planes.
 *
 * Planes 0-11 are the basic encoding; 12-18 carry side to move, the four
 * castling rights, the en passant file and the normalized halfmove clock.
 *
 * @returns Tensor of shape [19, 8, 8]
 */
export function encodeExtended(position: PositionReader): BoardTensor {
  const tensor = createTensor(EXTENDED_CHANNELS);
  writePieces(tensor, position);

  if (position.turn() === 'w') {
    fillPlane(tensor, SIDE_TO_MOVE_CHANNEL, 1.0);
  }

  const rights = position.castlingRights();
  if (rights.whiteKingside) fillPlane(tensor, WHITE_KINGSIDE_CHANNEL, 1.0);
  if (rights.whiteQueenside) fillPlane(tensor, WHITE_QUEENSIDE_CHANNEL, 1.0);
  if (rights.blackKingside) fillPlane(tensor, BLACK_KINGSIDE_CHANNEL, 1.0);
  if (rights.blackQueenside) fillPlane(tensor, BLACK_QUEENSIDE_CHANNEL, 1.0);

  const epSquare = position.enPassantSquare();
  if (epSquare) {
    for (let rank = 0; rank < BOARD_SIZE; rank++) {
      setCell(tensor, EN_PASSANT_CHANNEL, rank, epSquare.file, 1.0);
    }
  }

  fillPlane(
    tensor,
    HALFMOVE_CHANNEL,
    Math.min(position.halfmoveClock() / HALFMOVE_NORMALIZER, 1.0),
  );

  return tensor;
}

/**
 * Encode with the given channel set
 */
export function encodePosition(position: PositionReader, mode: EncodingMode): BoardTensor {
  return mode === 'extended' ? encodeExtended(position) : encodeBasic(position);
}
