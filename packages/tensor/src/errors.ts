/**
 * Error classes for plane tensors
 */

/**
 * Error thrown when a tensor does not have a supported shape
 * (12 or 19 channels of 8x8) or its data does not match its shape
 */
export class InvalidShapeError extends Error {
  constructor(
    message: string,
    public readonly shape?: readonly number[],
  ) {
    super(message);
    this.name = 'InvalidShapeError';
    // Maintain proper stack trace in V8
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, InvalidShapeError);
    }
  }
}

/**
 * Kind of problem found by strict decoding
 */
export type DecodeIssueKind = 'multiple-pieces' | 'out-of-range' | 'multiple-kings';

/**
 * A cell that strict decoding refuses
 */
export interface DecodeIssue {
  kind: DecodeIssueKind;
  rank: number;
  file: number;
  /** Piece channels involved */
  channels: number[];
}

/**
 * Error thrown by strict decoding when piece planes are not a clean one-hot encoding
 */
export class TensorDecodeError extends Error {
  constructor(public readonly issues: DecodeIssue[]) {
    const details = issues
      .map(
        (issue) =>
          `  ${issue.kind} at rank ${issue.rank}, file ${issue.file} (channels ${issue.channels.join(', ')})`,
      )
      .join('\n');
    super(`Piece planes cannot be decoded:\n${details}`);
    this.name = 'TensorDecodeError';
  }
}
