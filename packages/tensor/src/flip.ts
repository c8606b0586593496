/**
 * Board flip: swap colors and mirror ranks, as the other side would see it
 */

import {
  BLACK_KINGSIDE_CHANNEL,
  BLACK_OFFSET,
  BLACK_QUEENSIDE_CHANNEL,
  BOARD_SIZE,
  EN_PASSANT_CHANNEL,
  EXTENDED_CHANNELS,
  HALFMOVE_CHANNEL,
  PLANE_SIZE,
  SIDE_TO_MOVE_CHANNEL,
  WHITE_KINGSIDE_CHANNEL,
  WHITE_QUEENSIDE_CHANNEL,
} from './channels.js';
import { assertTensorShape, createTensor, type BoardTensor } from './tensor.js';

/**
 * Copy one plane into another, reversing the rank axis
 */
function copyMirrored(source: BoardTensor, from: number, target: BoardTensor, to: number): void {
  for (let rank = 0; rank < BOARD_SIZE; rank++) {
    const src = from * PLANE_SIZE + rank * BOARD_SIZE;
    const dst = to * PLANE_SIZE + (BOARD_SIZE - 1 - rank) * BOARD_SIZE;
    target.data.set(source.data.subarray(src, src + BOARD_SIZE), dst);
  }
}

function copyPlane(source: BoardTensor, from: number, target: BoardTensor, to: number): void {
  const src = from * PLANE_SIZE;
  target.data.set(source.data.subarray(src, src + PLANE_SIZE), to * PLANE_SIZE);
}

/**
 * Flip a 12- or 19-channel tensor.
 *
 * - Piece planes: White and Black swap (i <-> i + 6) and ranks are mirrored.
 * - Side to move (12): inverted, 1 - value.
 * - Castling (13-16): White and Black rights swap, no mirror.
 * - En passant (17): ranks mirrored, no swap.
 * - Halfmove clock (18): copied.
 *
 * Applying flip twice gives back the input.
 *
 * @throws InvalidShapeError for any other shape
 */
export function flip(tensor: BoardTensor): BoardTensor {
  const channels = assertTensorShape(tensor);
  const flipped = createTensor(channels);

  for (let i = 0; i < BLACK_OFFSET; i++) {
    copyMirrored(tensor, i + BLACK_OFFSET, flipped, i);
    copyMirrored(tensor, i, flipped, i + BLACK_OFFSET);
  }

  if (channels === EXTENDED_CHANNELS) {
    const sideOffset = SIDE_TO_MOVE_CHANNEL * PLANE_SIZE;
    for (let i = sideOffset; i < sideOffset + PLANE_SIZE; i++) {
      flipped.data[i] = 1.0 - (tensor.data[i] ?? 0);
    }

    copyPlane(tensor, BLACK_KINGSIDE_CHANNEL, flipped, WHITE_KINGSIDE_CHANNEL);
    copyPlane(tensor, BLACK_QUEENSIDE_CHANNEL, flipped, WHITE_QUEENSIDE_CHANNEL);
    copyPlane(tensor, WHITE_KINGSIDE_CHANNEL, flipped, BLACK_KINGSIDE_CHANNEL);
    copyPlane(tensor, WHITE_QUEENSIDE_CHANNEL, flipped, BLACK_QUEENSIDE_CHANNEL);

    copyMirrored(tensor, EN_PASSANT_CHANNEL, flipped, EN_PASSANT_CHANNEL);
    copyPlane(tensor, HALFMOVE_CHANNEL, flipped, HALFMOVE_CHANNEL);
  }

  return flipped;
}
