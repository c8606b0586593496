/**
 * @chessplanes/board - Chess position access for the plane encoders
 *
 * This package handles:
 * - Position wrapper around chess.js (FEN, SAN moves, piece placement)
 * - The read/construct interfaces the encoders are written against
 * - Square coordinate helpers
 * - ASCII board rendering
 */

export const VERSION = '0.1.0';

export type {
  PieceType,
  Side,
  BoardPiece,
  SquareCoord,
  CastlingRights,
  PositionReader,
  PositionWriter,
} from './types.js';
export { PIECE_TYPES } from './types.js';

export { ChessPosition, STARTING_FEN } from './position.js';
export type { MoveResult } from './position.js';

export { FILES, RANKS, BOARD_SIZE, isOnBoard, parseSquare } from './squares.js';

export { renderBoard } from './board-visualizer.js';
export type { Perspective, BoardRenderOptions } from './board-visualizer.js';

export { InvalidFenError, IllegalMoveError, InvalidPlacementError } from './errors.js';
