/**
 * Channel layout of the encoded planes
 *
 * Planes 0-11: one plane per piece kind
 *   0-5:  White pawn, knight, bishop, rook, queen, king
 *   6-11: Black pawn, knight, bishop, rook, queen, king
 * Planes 12-18 (extended encoding only), each a full 8x8 plane:
 *   12: White to move (all ones) / Black to move (all zeros)
 *   13: White kingside castling rights
 *   14: White queenside castling rights
 *   15: Black kingside castling rights
 *   16: Black queenside castling rights
 *   17: en passant target file (ones on every rank of that file)
 *   18: halfmove clock / 100, capped at 1.0
 */

import { PIECE_TYPES, type BoardPiece, type PieceType } from '@chessplanes/board';

export const BOARD_SIZE = 8;
export const PLANE_SIZE = BOARD_SIZE * BOARD_SIZE;

export const BASIC_CHANNELS = 12;
export const EXTENDED_CHANNELS = 19;

/** Offset added to a piece's type rank when the piece is Black */
export const BLACK_OFFSET = 6;

export const SIDE_TO_MOVE_CHANNEL = 12;
export const WHITE_KINGSIDE_CHANNEL = 13;
export const WHITE_QUEENSIDE_CHANNEL = 14;
export const BLACK_KINGSIDE_CHANNEL = 15;
export const BLACK_QUEENSIDE_CHANNEL = 16;
export const EN_PASSANT_CHANNEL = 17;
export const HALFMOVE_CHANNEL = 18;

/** Halfmove clock value that saturates the clock plane */
export const HALFMOVE_NORMALIZER = 100;

/** Activation above which a piece plane cell counts as occupied */
export const DEFAULT_THRESHOLD = 0.5;

export const PIECE_TYPE_RANK: Readonly<Record<PieceType, number>> = {
  p: 0,
  n: 1,
  b: 2,
  r: 3,
  q: 4,
  k: 5,
};

/**
 * Channel for a piece
 */
export function pieceChannel(piece: BoardPiece): number {
  return PIECE_TYPE_RANK[piece.type] + (piece.color === 'b' ? BLACK_OFFSET : 0);
}

/**
 * Piece for each of the channels 0-11, derived from PIECE_TYPE_RANK
 */
export const CHANNEL_PIECES: readonly BoardPiece[] = (['w', 'b'] as const).flatMap((color) =>
  [...PIECE_TYPES]
    .sort((a, b) => PIECE_TYPE_RANK[a] - PIECE_TYPE_RANK[b])
    .map((type) => ({ type, color })),
);

/**
 * FEN letter for each of the channels 0-11
 */
export const CHANNEL_SYMBOLS: readonly string[] = CHANNEL_PIECES.map((piece) =>
  piece.color === 'w' ? piece.type.toUpperCase() : piece.type,
);
