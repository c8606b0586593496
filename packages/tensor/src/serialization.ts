/**
 * JSON wire format for tensors stored on disk
 *
 * The axis order (channel, rank, file) and channel meanings are part of the
 * format; `version` changes if either ever does.
 */

import { z } from 'zod';

import { BOARD_SIZE } from './channels.js';
import { InvalidShapeError } from './errors.js';
import {
  assertTensorShape,
  createTensor,
  getCell,
  isSupportedChannelCount,
  setCell,
  type BoardTensor,
} from './tensor.js';

export const TENSOR_FORMAT = 'chessplanes/tensor';
export const TENSOR_FORMAT_VERSION = 1;

export const tensorDocumentSchema = z.object({
  format: z.literal(TENSOR_FORMAT),
  version: z.literal(TENSOR_FORMAT_VERSION),
  shape: z.tuple([z.number().int().positive(), z.literal(BOARD_SIZE), z.literal(BOARD_SIZE)]),
  planes: z.array(z.array(z.array(z.number().finite()))),
});

export type TensorDocument = z.infer<typeof tensorDocumentSchema>;

/**
 * Convert a tensor to its JSON document
 */
export function serializeTensor(tensor: BoardTensor): TensorDocument {
  const channels = assertTensorShape(tensor);
  const planes: number[][][] = [];

  for (let channel = 0; channel < channels; channel++) {
    const plane: number[][] = [];
    for (let rank = 0; rank < BOARD_SIZE; rank++) {
      const row: number[] = [];
      for (let file = 0; file < BOARD_SIZE; file++) {
        row.push(getCell(tensor, channel, rank, file));
      }
      plane.push(row);
    }
    planes.push(plane);
  }

  return {
    format: TENSOR_FORMAT,
    version: TENSOR_FORMAT_VERSION,
    shape: [channels, BOARD_SIZE, BOARD_SIZE],
    planes,
  };
}

/**
 * Validate a parsed JSON document and rebuild the tensor
 * @throws InvalidShapeError if the document is malformed
 */
export function deserializeTensor(value: unknown): BoardTensor {
  const result = tensorDocumentSchema.safeParse(value);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  ${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('\n');
    throw new InvalidShapeError(`Invalid tensor document:\n${details}`);
  }

  const { shape, planes } = result.data;
  const [channels] = shape;

  if (!isSupportedChannelCount(channels)) {
    throw new InvalidShapeError(`Unsupported channel count ${channels}`, shape);
  }
  if (planes.length !== channels) {
    throw new InvalidShapeError(
      `Shape declares ${channels} channels but ${planes.length} planes were given`,
      shape,
    );
  }

  const tensor = createTensor(channels);
  planes.forEach((plane, channel) => {
    if (plane.length !== BOARD_SIZE || plane.some((row) => row.length !== BOARD_SIZE)) {
      throw new InvalidShapeError(`Plane ${channel} is not 8x8`, shape);
    }
    plane.forEach((row, rank) => {
      row.forEach((cell, file) => setCell(tensor, channel, rank, file, cell));
    });
  });

  return tensor;
}

/**
 * Parse a JSON string holding a tensor document
 * @throws InvalidShapeError if the text is not JSON or not a tensor document
 */
export function parseTensorJson(text: string): BoardTensor {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    throw new InvalidShapeError(
      `Tensor document is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return deserializeTensor(value);
}

/**
 * Serialize a tensor to a JSON string
 */
export function stringifyTensor(tensor: BoardTensor, pretty = false): string {
  return JSON.stringify(serializeTensor(tensor), null, pretty ? 2 : undefined);
}
