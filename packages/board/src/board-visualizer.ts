/**
 * ASCII board rendering
 */

import { ChessPosition } from './position.js';
import { FILES } from './squares.js';

/**
 * Board orientation perspective
 */
export type Perspective = 'white' | 'black';

/**
 * Options for board rendering
 */
export interface BoardRenderOptions {
  /** Board orientation (default: 'white') */
  perspective?: Perspective;
}

/**
 * Render a chess position as an ASCII board
 *
 * Example output:
 * ```
 *    a   b   c   d   e   f   g   h
 * 8 [r] [n] [b] [q] [k] [b] [n] [r]  8
 * 7 [p] [p] [p] [p] [p] [p] [p] [p]  7
 * 6  .   .   .   .   .   .   .   .   6
 * 5  .   .   .   .   .   .   .   .   5
 * 4  .   .   .   .  [P]  .   .   .   4
 * 3  .   .   .   .   .   .   .   .   3
 * 2 [P] [P] [P] [P]  .  [P] [P] [P]  2
 * 1 [R] [N] [B] [Q] [K] [B] [N] [R]  1
 *    a   b   c   d   e   f   g   h
 * ```
 *
 * Uppercase = White, lowercase = Black.
 *
 * @param position - Position, or FEN string of the position
 */
export function renderBoard(position: ChessPosition | string, options?: BoardRenderOptions): string {
  const perspective = options?.perspective ?? 'white';
  const pos = typeof position === 'string' ? new ChessPosition(position) : position;

  const files = perspective === 'white' ? [...FILES] : [...FILES].reverse();
  const ranks = perspective === 'white' ? [7, 6, 5, 4, 3, 2, 1, 0] : [0, 1, 2, 3, 4, 5, 6, 7];

  const lines: string[] = [];
  lines.push(`   ${files.join('   ')}`);

  for (const rank of ranks) {
    const squares: string[] = [];

    for (let col = 0; col < 8; col++) {
      const file = perspective === 'white' ? col : 7 - col;
      const piece = pos.pieceAt(file, rank);

      if (piece) {
        const symbol = piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
        squares.push(`[${symbol}]`);
      } else {
        squares.push(' . ');
      }
    }

    lines.push(`${rank + 1} ${squares.join(' ')}  ${rank + 1}`);
  }

  lines.push(`   ${files.join('   ')}`);

  return lines.join('\n');
}
