/**
 * Text rendering of plane tensors for debugging
 */

import { FILES } from '@chessplanes/board';

import { BASIC_CHANNELS, BOARD_SIZE, CHANNEL_SYMBOLS, DEFAULT_THRESHOLD } from './channels.js';
import { InvalidShapeError } from './errors.js';
import { assertTensorShape, getCell, type BoardTensor } from './tensor.js';

export interface VisualizeOptions {
  /** Render a single channel instead of the combined piece view */
  channel?: number;
}

/**
 * Render a tensor as an 8-row grid, rank 8 at the top.
 *
 * With `channel`, active cells show as `1`. Otherwise each cell shows the FEN
 * letter of the first active piece plane (lowest channel wins).
 *
 * ```
 * Combined view:
 * 8 r n b q k b n r
 * ...
 * 1 R N B Q K B N R
 *   a b c d e f g h
 * ```
 */
export function formatTensor(tensor: BoardTensor, options: VisualizeOptions = {}): string {
  const channels = assertTensorShape(tensor);
  const { channel } = options;

  if (channel !== undefined && (!Number.isInteger(channel) || channel < 0 || channel >= channels)) {
    throw new InvalidShapeError(`Channel ${channel} out of range 0-${channels - 1}`, tensor.shape);
  }

  const lines: string[] = [channel === undefined ? 'Combined view:' : `Channel ${channel}:`];

  for (let rank = BOARD_SIZE - 1; rank >= 0; rank--) {
    const cells: string[] = [];
    for (let file = 0; file < BOARD_SIZE; file++) {
      if (channel !== undefined) {
        cells.push(getCell(tensor, channel, rank, file) > DEFAULT_THRESHOLD ? '1' : '.');
      } else {
        cells.push(pieceSymbolAt(tensor, rank, file));
      }
    }
    lines.push(`${rank + 1} ${cells.join(' ')}`);
  }

  lines.push(`  ${[...FILES].join(' ')}`);
  return lines.join('\n');
}

function pieceSymbolAt(tensor: BoardTensor, rank: number, file: number): string {
  for (let channel = 0; channel < BASIC_CHANNELS; channel++) {
    if (getCell(tensor, channel, rank, file) > DEFAULT_THRESHOLD) {
      return CHANNEL_SYMBOLS[channel] ?? '?';
    }
  }
  return '.';
}

/**
 * Write the rendering of a tensor to a text sink (console by default)
 */
export function visualizeTensor(
  tensor: BoardTensor,
  options: VisualizeOptions = {},
  write: (text: string) => void = console.log,
): void {
  write(formatTensor(tensor, options));
}
