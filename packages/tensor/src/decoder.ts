/**
 * Plane -> position decoding (piece placement only)
 *
 * Side to move, castling rights, en passant and the halfmove clock are never
 * reconstructed, even from a 19-channel tensor. Callers that need them must
 * carry that state separately.
 */

import { ChessPosition, type PositionWriter } from '@chessplanes/board';

import {
  BASIC_CHANNELS,
  BLACK_OFFSET,
  BOARD_SIZE,
  CHANNEL_PIECES,
  DEFAULT_THRESHOLD,
  PIECE_TYPE_RANK,
} from './channels.js';
import { TensorDecodeError, type DecodeIssue } from './errors.js';
import { assertTensorShape, getCell, type BoardTensor } from './tensor.js';

export interface DecodeOptions {
  /** Activation above which a cell counts as occupied (default: 0.5) */
  threshold?: number;
  /**
   * Reject cells with more than one active piece plane, values outside
   * [0, 1] and more than one king of a color, instead of letting the
   * highest channel and the last king win (default: false)
   */
  strict?: boolean;
}

const KING_CHANNELS = [PIECE_TYPE_RANK.k, PIECE_TYPE_RANK.k + BLACK_OFFSET];

/**
 * Collect every cell that is not a clean one-hot encoding, and every king
 * cell of a color that has more than one
 */
export function findDecodeIssues(tensor: BoardTensor, threshold = DEFAULT_THRESHOLD): DecodeIssue[] {
  assertTensorShape(tensor);
  const issues: DecodeIssue[] = [];

  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    for (let file = 0; file < BOARD_SIZE; file++) {
      const active: number[] = [];
      const outOfRange: number[] = [];

      for (let channel = 0; channel < BASIC_CHANNELS; channel++) {
        const value = getCell(tensor, channel, rank, file);
        if (!Number.isFinite(value) || value < 0 || value > 1) {
          outOfRange.push(channel);
        } else if (value > threshold) {
          active.push(channel);
        }
      }

      if (outOfRange.length > 0) {
        issues.push({ kind: 'out-of-range', rank, file, channels: outOfRange });
      }
      if (active.length > 1) {
        issues.push({ kind: 'multiple-pieces', rank, file, channels: active });
      }
    }
  }

  for (const channel of KING_CHANNELS) {
    const kings: Array<{ rank: number; file: number }> = [];
    for (let rank = 0; rank < BOARD_SIZE; rank++) {
      for (let file = 0; file < BOARD_SIZE; file++) {
        const value = getCell(tensor, channel, rank, file);
        if (value > threshold && value <= 1) kings.push({ rank, file });
      }
    }
    if (kings.length > 1) {
      for (const { rank, file } of kings) {
        issues.push({ kind: 'multiple-kings', rank, file, channels: [channel] });
      }
    }
  }

  return issues;
}

/**
 * Place the pieces encoded in planes 0-11 onto a caller-supplied position.
 *
 * Channels are visited in ascending order, so without `strict` the highest
 * active channel on a cell decides the piece. Of several active cells on one
 * king plane, the last in rank-major order keeps the king.
 *
 * @throws InvalidShapeError for tensors that are not 12 or 19 channels of 8x8
 * @throws TensorDecodeError in strict mode when a cell is ambiguous
 */
export function decodeInto<P extends PositionWriter>(
  tensor: BoardTensor,
  target: P,
  options: DecodeOptions = {},
): P {
  assertTensorShape(tensor);
  const threshold = options.threshold ?? DEFAULT_THRESHOLD;

  if (options.strict) {
    const issues = findDecodeIssues(tensor, threshold);
    if (issues.length > 0) {
      throw new TensorDecodeError(issues);
    }
  }

  CHANNEL_PIECES.forEach((piece, channel) => {
    for (let rank = 0; rank < BOARD_SIZE; rank++) {
      for (let file = 0; file < BOARD_SIZE; file++) {
        if (getCell(tensor, channel, rank, file) > threshold) {
          target.placePiece(file, rank, piece);
        }
      }
    }
  });

  return target;
}

/**
 * Decode piece planes into a new position (White to move, no castling
 * rights, no en passant, clock 0)
 */
export function decode(tensor: BoardTensor, options: DecodeOptions = {}): ChessPosition {
  return decodeInto(tensor, ChessPosition.empty(), options);
}
