/**
 * Error thrown when a FEN string is invalid
 */
export class InvalidFenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidFenError';
  }
}

/**
 * Error thrown when an illegal move is attempted
 */
export class IllegalMoveError extends Error {
  constructor(san: string, fen: string) {
    super(`Illegal move "${san}" in position: ${fen}`);
    this.name = 'IllegalMoveError';
  }
}

/**
 * Error thrown when the rules engine refuses to place a piece
 */
export class InvalidPlacementError extends Error {
  constructor(
    public readonly square: string,
    public readonly piece: string,
  ) {
    super(`Cannot place "${piece}" on ${square}`);
    this.name = 'InvalidPlacementError';
  }
}
