/**
 * Position types shared by the board wrapper and the plane encoders
 */

/**
 * Piece type letter, as used in FEN (lowercase)
 */
export type PieceType = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

/**
 * Side / piece color
 */
export type Side = 'w' | 'b';

/**
 * A piece on the board
 */
export interface BoardPiece {
  type: PieceType;
  color: Side;
}

/**
 * A square as zero-based coordinates.
 * file 0 = a-file, rank 0 = first rank (White's home rank).
 */
export interface SquareCoord {
  file: number;
  rank: number;
}

/**
 * Castling rights per side and direction
 */
export interface CastlingRights {
  whiteKingside: boolean;
  whiteQueenside: boolean;
  blackKingside: boolean;
  blackQueenside: boolean;
}

/**
 * Read access to a position.
 *
 * Anything implementing this can be encoded; the encoders never depend on
 * a particular rules engine.
 */
export interface PositionReader {
  /** Piece on the square, or undefined if empty */
  pieceAt(file: number, rank: number): BoardPiece | undefined;
  turn(): Side;
  castlingRights(): CastlingRights;
  /** En passant target square, if any */
  enPassantSquare(): SquareCoord | undefined;
  /** Half-moves since the last pawn move or capture */
  halfmoveClock(): number;
}

/**
 * Construct access to a position, used when decoding planes back into pieces
 */
export interface PositionWriter {
  placePiece(file: number, rank: number, piece: BoardPiece): void;
}

export const PIECE_TYPES: readonly PieceType[] = ['p', 'n', 'b', 'r', 'q', 'k'];
