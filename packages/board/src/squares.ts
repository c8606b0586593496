import type { SquareCoord } from './types.js';

export const FILES = 'abcdefgh';
export const RANKS = '12345678';
export const BOARD_SIZE = 8;

/**
 * Check that a file/rank pair lies on the board
 */
export function isOnBoard(file: number, rank: number): boolean {
  return (
    Number.isInteger(file) &&
    Number.isInteger(rank) &&
    file >= 0 &&
    file < BOARD_SIZE &&
    rank >= 0 &&
    rank < BOARD_SIZE
  );
}

/**
 * Parse algebraic notation ("e4") into zero-based coordinates
 * @returns undefined if the string is not a square
 */
export function parseSquare(name: string): SquareCoord | undefined {
  if (name.length !== 2) return undefined;
  const file = FILES.indexOf(name.charAt(0));
  const rank = RANKS.indexOf(name.charAt(1));
  if (file < 0 || rank < 0) return undefined;
  return { file, rank };
}
