/**
 * Dense plane tensor: shape [channels, 8, 8], axis order channel, rank, file
 */

import {
  BASIC_CHANNELS,
  BOARD_SIZE,
  EXTENDED_CHANNELS,
  PLANE_SIZE,
} from './channels.js';
import { InvalidShapeError } from './errors.js';

/**
 * Shape of an encoded position: [channels, ranks, files]
 */
export type TensorShape = readonly [channels: number, ranks: number, files: number];

/**
 * An encoded position.
 *
 * `data` is row-major over the shape: index = channel * 64 + rank * 8 + file.
 */
export interface BoardTensor {
  data: Float32Array;
  shape: TensorShape;
}

/**
 * Supported channel counts
 */
export type ChannelCount = typeof BASIC_CHANNELS | typeof EXTENDED_CHANNELS;

export function isSupportedChannelCount(channels: number): channels is ChannelCount {
  return channels === BASIC_CHANNELS || channels === EXTENDED_CHANNELS;
}

/**
 * Allocate a zero-filled tensor
 */
export function createTensor(channels: ChannelCount): BoardTensor {
  return {
    data: new Float32Array(channels * PLANE_SIZE),
    shape: [channels, BOARD_SIZE, BOARD_SIZE],
  };
}

/**
 * Flat index of a cell
 */
function cellIndex(channel: number, rank: number, file: number): number {
  return channel * PLANE_SIZE + rank * BOARD_SIZE + file;
}

export function getCell(tensor: BoardTensor, channel: number, rank: number, file: number): number {
  return tensor.data[cellIndex(channel, rank, file)] ?? 0;
}

export function setCell(
  tensor: BoardTensor,
  channel: number,
  rank: number,
  file: number,
  value: number,
): void {
  tensor.data[cellIndex(channel, rank, file)] = value;
}

/**
 * Set every cell of a plane to the same value
 */
export function fillPlane(tensor: BoardTensor, channel: number, value: number): void {
  const offset = channel * PLANE_SIZE;
  tensor.data.fill(value, offset, offset + PLANE_SIZE);
}

/**
 * Sum of all cells of one plane
 */
export function channelSum(tensor: BoardTensor, channel: number): number {
  const offset = channel * PLANE_SIZE;
  let sum = 0;
  for (let i = offset; i < offset + PLANE_SIZE; i++) {
    sum += tensor.data[i] ?? 0;
  }
  return sum;
}

/**
 * Check that a tensor has a supported shape and that its data matches it
 * @throws InvalidShapeError
 */
export function assertTensorShape(tensor: BoardTensor): ChannelCount {
  const [channels, ranks, files] = tensor.shape;

  if (ranks !== BOARD_SIZE || files !== BOARD_SIZE) {
    throw new InvalidShapeError(
      `Expected 8x8 planes, got ${ranks}x${files}`,
      tensor.shape,
    );
  }
  if (!isSupportedChannelCount(channels)) {
    throw new InvalidShapeError(
      `Expected ${BASIC_CHANNELS} or ${EXTENDED_CHANNELS} channels, got ${channels}`,
      tensor.shape,
    );
  }
  if (tensor.data.length !== channels * PLANE_SIZE) {
    throw new InvalidShapeError(
      `Data length ${tensor.data.length} does not match shape [${tensor.shape.join(', ')}]`,
      tensor.shape,
    );
  }

  return channels;
}
