import { Chess, SQUARES, type Square } from 'chess.js';

import { IllegalMoveError, InvalidFenError, InvalidPlacementError } from './errors.js';
import { isOnBoard, parseSquare } from './squares.js';
import type {
  BoardPiece,
  CastlingRights,
  PositionReader,
  PositionWriter,
  Side,
  SquareCoord,
} from './types.js';

/**
 * Result of applying a move to a position
 */
export interface MoveResult {
  /** The move in Standard Algebraic Notation */
  san: string;
  /** FEN before the move was made */
  fenBefore: string;
  /** FEN after the move was made */
  fenAfter: string;
}

/**
 * Standard starting position FEN
 */
export const STARTING_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1';

/**
 * Map zero-based coordinates to a chess.js square.
 * chess.js lists SQUARES from a8 to h1.
 */
function toSquare(file: number, rank: number): Square {
  const square = isOnBoard(file, rank) ? SQUARES[(7 - rank) * 8 + file] : undefined;
  if (square === undefined) {
    throw new RangeError(`Square off the board: file=${file}, rank=${rank}`);
  }
  return square;
}

/**
 * A chess position wrapper around chess.js
 *
 * Implements the read and construct interfaces the plane encoders rely on.
 *
 * chess.js drops the en passant square from its FEN unless a capture is
 * actually possible, so the target square of the last double pawn push is
 * tracked here.
 */
export class ChessPosition implements PositionReader, PositionWriter {
  private chess: Chess;
  private epSquare: SquareCoord | undefined;

  constructor(fen?: string) {
    if (fen) {
      try {
        this.chess = new Chess(fen);
      } catch {
        throw new InvalidFenError(`Invalid FEN: ${fen}`);
      }
      this.epSquare = parseSquare(fen.trim().split(/\s+/)[3] ?? '-');
    } else {
      this.chess = new Chess();
      this.epSquare = undefined;
    }
  }

  /**
   * Create a position from the standard starting position
   */
  static startingPosition(): ChessPosition {
    return new ChessPosition();
  }

  /**
   * Create a position from a FEN string
   * @throws InvalidFenError if the FEN is invalid
   */
  static fromFen(fen: string): ChessPosition {
    return new ChessPosition(fen);
  }

  /**
   * Create a position with no pieces, White to move and no castling rights
   */
  static empty(): ChessPosition {
    const pos = new ChessPosition();
    pos.chess.clear();
    return pos;
  }

  /**
   * Independent copy, including the tracked en passant square.
   * Loaded without validation so partial (e.g. kingless) boards copy too.
   */
  clone(): ChessPosition {
    const copy = new ChessPosition();
    copy.chess.load(this.chess.fen(), { skipValidation: true });
    copy.epSquare = this.epSquare;
    return copy;
  }

  /**
   * Get the current position as a FEN string
   */
  fen(): string {
    return this.chess.fen();
  }

  /**
   * Apply a move in SAN notation
   * @throws IllegalMoveError if the move is not legal
   */
  move(san: string): MoveResult {
    const fenBefore = this.chess.fen();
    try {
      const result = this.chess.move(san);
      if (result.flags.includes('b')) {
        const from = parseSquare(result.from);
        const to = parseSquare(result.to);
        this.epSquare =
          from && to ? { file: from.file, rank: (from.rank + to.rank) / 2 } : undefined;
      } else {
        this.epSquare = undefined;
      }
      return {
        san: result.san,
        fenBefore,
        fenAfter: this.chess.fen(),
      };
    } catch {
      // chess.js throws Error for invalid moves, wrap in our custom error
      throw new IllegalMoveError(san, fenBefore);
    }
  }

  /**
   * Get whose turn it is
   */
  turn(): Side {
    return this.chess.turn();
  }

  /**
   * Get the piece on a square
   * @returns Piece or undefined if empty
   */
  pieceAt(file: number, rank: number): BoardPiece | undefined {
    const piece = this.chess.get(toSquare(file, rank));
    if (!piece) return undefined;
    return { type: piece.type, color: piece.color };
  }

  /**
   * Put a piece on a square, replacing whatever stood there.
   * A king replaces the king of its color, wherever it stood, so the latest
   * placement wins.
   * @throws InvalidPlacementError if chess.js refuses the placement
   */
  placePiece(file: number, rank: number, piece: BoardPiece): void {
    const square = toSquare(file, rank);
    if (piece.type === 'k') {
      this.removeKing(piece.color, square);
    }
    if (!this.chess.put({ type: piece.type, color: piece.color }, square)) {
      const symbol = piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
      throw new InvalidPlacementError(square, symbol);
    }
  }

  castlingRights(): CastlingRights {
    const field = this.fenField(2);
    return {
      whiteKingside: field.includes('K'),
      whiteQueenside: field.includes('Q'),
      blackKingside: field.includes('k'),
      blackQueenside: field.includes('q'),
    };
  }

  enPassantSquare(): SquareCoord | undefined {
    return this.epSquare;
  }

  halfmoveClock(): number {
    const clock = Number.parseInt(this.fenField(4), 10);
    return Number.isNaN(clock) ? 0 : clock;
  }

  // chess.js keeps one king per color and refuses to put a second
  private removeKing(color: Side, keep: Square): void {
    for (const square of SQUARES) {
      if (square === keep) continue;
      const current = this.chess.get(square);
      if (current && current.type === 'k' && current.color === color) {
        this.chess.remove(square);
      }
    }
  }

  private fenField(index: number): string {
    return this.chess.fen().split(' ')[index] ?? '';
  }
}
