import { describe, it, expect } from 'vitest';

import { ChessPosition, type PositionReader } from '@chessplanes/board';

import {
  BASIC_CHANNELS,
  EN_PASSANT_CHANNEL,
  HALFMOVE_CHANNEL,
  SIDE_TO_MOVE_CHANNEL,
  channelSum,
  encodeBasic,
  encodeExtended,
  encodePosition,
  getCell,
} from '../index.js';
import type { BoardTensor } from '../index.js';

const MIDDLEGAME_FEN = 'r3k2r/p1ppqpb1/bn2pnp1/3PN3/1p2P3/2N2Q1p/PPPBBPPP/R3K2R w KQkq - 0 1';

function totalSum(tensor: BoardTensor): number {
  return tensor.data.reduce((sum, value) => sum + value, 0);
}

function activePieceChannels(tensor: BoardTensor, rank: number, file: number): number {
  let count = 0;
  for (let channel = 0; channel < BASIC_CHANNELS; channel++) {
    if (getCell(tensor, channel, rank, file) === 1) count++;
  }
  return count;
}

function rankSum(tensor: BoardTensor, channel: number, rank: number): number {
  let sum = 0;
  for (let file = 0; file < 8; file++) sum += getCell(tensor, channel, rank, file);
  return sum;
}

function fileSum(tensor: BoardTensor, channel: number, file: number): number {
  let sum = 0;
  for (let rank = 0; rank < 8; rank++) sum += getCell(tensor, channel, rank, file);
  return sum;
}

describe('encodeBasic', () => {
  it('produces a [12, 8, 8] float tensor', () => {
    const tensor = encodeBasic(ChessPosition.startingPosition());

    expect(tensor.shape).toEqual([12, 8, 8]);
    expect(tensor.data).toBeInstanceOf(Float32Array);
    expect(tensor.data.length).toBe(768);
  });

  it('sets at most one piece channel per cell', () => {
    for (const pos of [ChessPosition.startingPosition(), ChessPosition.fromFen(MIDDLEGAME_FEN)]) {
      const tensor = encodeBasic(pos);
      for (let rank = 0; rank < 8; rank++) {
        for (let file = 0; file < 8; file++) {
          expect(activePieceChannels(tensor, rank, file)).toBe(pos.pieceAt(file, rank) ? 1 : 0);
        }
      }
    }
  });

  it('places pawns on the second and seventh ranks', () => {
    const tensor = encodeBasic(ChessPosition.startingPosition());

    expect(rankSum(tensor, 0, 1)).toBe(8);
    expect(channelSum(tensor, 0)).toBe(8);
    expect(rankSum(tensor, 6, 6)).toBe(8);
    expect(channelSum(tensor, 6)).toBe(8);
  });

  it('places knights on b1, g1, b8 and g8', () => {
    const tensor = encodeBasic(ChessPosition.startingPosition());

    expect(getCell(tensor, 1, 0, 1)).toBe(1);
    expect(getCell(tensor, 1, 0, 6)).toBe(1);
    expect(channelSum(tensor, 1)).toBe(2);
    expect(getCell(tensor, 7, 7, 1)).toBe(1);
    expect(getCell(tensor, 7, 7, 6)).toBe(1);
    expect(channelSum(tensor, 7)).toBe(2);
  });

  it('places kings and queens', () => {
    const tensor = encodeBasic(ChessPosition.startingPosition());

    expect(getCell(tensor, 4, 0, 3)).toBe(1);
    expect(getCell(tensor, 5, 0, 4)).toBe(1);
    expect(getCell(tensor, 10, 7, 3)).toBe(1);
    expect(getCell(tensor, 11, 7, 4)).toBe(1);
    expect(totalSum(tensor)).toBe(32);
  });

  it('encodes an empty board as zeros', () => {
    expect(totalSum(encodeBasic(ChessPosition.empty()))).toBe(0);
  });

  it('encodes a single piece', () => {
    const pos = ChessPosition.empty();
    pos.placePiece(4, 3, { type: 'q', color: 'w' });
    const tensor = encodeBasic(pos);

    expect(getCell(tensor, 4, 3, 4)).toBe(1);
    expect(totalSum(tensor)).toBe(1);
  });

  it('follows moves', () => {
    const pos = ChessPosition.startingPosition();
    pos.move('e4');
    const tensor = encodeBasic(pos);

    expect(getCell(tensor, 0, 1, 4)).toBe(0);
    expect(getCell(tensor, 0, 3, 4)).toBe(1);
  });

  it('works with any position reader', () => {
    const reader: PositionReader = {
      pieceAt: (file, rank) => (file === 0 && rank === 7 ? { type: 'r', color: 'b' } : undefined),
      turn: () => 'b',
      castlingRights: () => ({
        whiteKingside: false,
        whiteQueenside: false,
        blackKingside: false,
        blackQueenside: true,
      }),
      enPassantSquare: () => undefined,
      halfmoveClock: () => 0,
    };
    const tensor = encodeBasic(reader);

    expect(getCell(tensor, 9, 7, 0)).toBe(1);
    expect(totalSum(tensor)).toBe(1);
  });
});

describe('encodeExtended', () => {
  it('produces a [19, 8, 8] tensor', () => {
    const tensor = encodeExtended(ChessPosition.startingPosition());

    expect(tensor.shape).toEqual([19, 8, 8]);
    expect(tensor.data.length).toBe(19 * 64);
  });

  it('starts with the basic encoding', () => {
    const pos = ChessPosition.fromFen(MIDDLEGAME_FEN);

    expect(encodeExtended(pos).data.subarray(0, 768)).toEqual(encodeBasic(pos).data);
  });

  it('fills the side-to-move plane when White is to move', () => {
    const tensor = encodeExtended(ChessPosition.startingPosition());
    expect(channelSum(tensor, SIDE_TO_MOVE_CHANNEL)).toBe(64);
  });

  it('clears the side-to-move plane when Black is to move', () => {
    const pos = ChessPosition.startingPosition();
    pos.move('e4');
    expect(channelSum(encodeExtended(pos), SIDE_TO_MOVE_CHANNEL)).toBe(0);
  });

  it('has all castling rights at the start', () => {
    const tensor = encodeExtended(ChessPosition.startingPosition());

    expect(channelSum(tensor, 13)).toBe(64);
    expect(channelSum(tensor, 14)).toBe(64);
    expect(channelSum(tensor, 15)).toBe(64);
    expect(channelSum(tensor, 16)).toBe(64);
  });

  it('drops lost castling rights', () => {
    const pos = ChessPosition.fromFen('rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBN1 w Qkq - 0 1');
    const tensor = encodeExtended(pos);

    expect(channelSum(tensor, 13)).toBe(0);
    expect(channelSum(tensor, 14)).toBe(64);
    expect(channelSum(tensor, 15)).toBe(64);
    expect(channelSum(tensor, 16)).toBe(64);
  });

  it('marks the en passant file on every rank', () => {
    const pos = ChessPosition.startingPosition();
    pos.move('e4');
    const tensor = encodeExtended(pos);

    expect(fileSum(tensor, EN_PASSANT_CHANNEL, 4)).toBe(8);
    expect(fileSum(tensor, EN_PASSANT_CHANNEL, 3)).toBe(0);
    expect(channelSum(tensor, EN_PASSANT_CHANNEL)).toBe(8);
  });

  it('leaves the en passant plane empty without a target square', () => {
    const tensor = encodeExtended(ChessPosition.startingPosition());
    expect(channelSum(tensor, EN_PASSANT_CHANNEL)).toBe(0);
  });

  it('normalizes the halfmove clock', () => {
    const tensor = encodeExtended(ChessPosition.fromFen('4k3/8/8/8/8/8/8/4K3 w - - 50 80'));

    expect(getCell(tensor, HALFMOVE_CHANNEL, 0, 0)).toBe(0.5);
    expect(getCell(tensor, HALFMOVE_CHANNEL, 7, 7)).toBe(0.5);
    expect(channelSum(tensor, HALFMOVE_CHANNEL)).toBe(32);
  });

  it('caps the halfmove clock at 1', () => {
    const tensor = encodeExtended(ChessPosition.fromFen('4k3/8/8/8/8/8/8/4K3 w - - 150 120'));
    expect(channelSum(tensor, HALFMOVE_CHANNEL)).toBe(64);
  });

  it('does not modify the position', () => {
    const pos = ChessPosition.startingPosition();
    pos.move('e4');
    const before = pos.fen();
    encodeExtended(pos);

    expect(pos.fen()).toBe(before);
    expect(pos.enPassantSquare()).toEqual({ file: 4, rank: 2 });
  });

  it('returns a fresh tensor on every call', () => {
    const pos = ChessPosition.startingPosition();
    const first = encodeExtended(pos);
    const second = encodeExtended(pos);

    expect(first.data).not.toBe(second.data);
    first.data.fill(0);
    expect(getCell(second, 3, 0, 0)).toBe(1);
    expect(channelSum(second, SIDE_TO_MOVE_CHANNEL)).toBe(64);
  });
});

describe('encodePosition', () => {
  it('dispatches on the encoding mode', () => {
    const pos = ChessPosition.startingPosition();

    expect(encodePosition(pos, 'basic').shape[0]).toBe(12);
    expect(encodePosition(pos, 'extended').shape[0]).toBe(19);
  });
});
