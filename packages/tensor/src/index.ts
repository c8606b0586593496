/**
 * @chessplanes/tensor - Chess positions as neural-network input planes
 *
 * This package handles:
 * - 12-channel piece encoding and 19-channel encoding with game state
 * - Decoding piece planes back into a position
 * - Flipping tensors to the other side's point of view
 * - Text rendering and a JSON format for storing tensors
 */

export const VERSION = '0.1.0';

export {
  BOARD_SIZE,
  PLANE_SIZE,
  BASIC_CHANNELS,
  EXTENDED_CHANNELS,
  BLACK_OFFSET,
  SIDE_TO_MOVE_CHANNEL,
  WHITE_KINGSIDE_CHANNEL,
  WHITE_QUEENSIDE_CHANNEL,
  BLACK_KINGSIDE_CHANNEL,
  BLACK_QUEENSIDE_CHANNEL,
  EN_PASSANT_CHANNEL,
  HALFMOVE_CHANNEL,
  HALFMOVE_NORMALIZER,
  DEFAULT_THRESHOLD,
  PIECE_TYPE_RANK,
  CHANNEL_PIECES,
  CHANNEL_SYMBOLS,
  pieceChannel,
} from './channels.js';

export type { BoardTensor, TensorShape, ChannelCount } from './tensor.js';
export {
  createTensor,
  getCell,
  setCell,
  fillPlane,
  channelSum,
  assertTensorShape,
  isSupportedChannelCount,
} from './tensor.js';

export type { EncodingMode } from './encoder.js';
export { encodeBasic, encodeExtended, encodePosition } from './encoder.js';

export type { DecodeOptions } from './decoder.js';
export { decode, decodeInto, findDecodeIssues } from './decoder.js';

export { flip } from './flip.js';

export type { VisualizeOptions } from './visualizer.js';
export { formatTensor, visualizeTensor } from './visualizer.js';

export type { TensorDocument } from './serialization.js';
export {
  TENSOR_FORMAT,
  TENSOR_FORMAT_VERSION,
  tensorDocumentSchema,
  serializeTensor,
  deserializeTensor,
  parseTensorJson,
  stringifyTensor,
} from './serialization.js';

export type { DecodeIssue, DecodeIssueKind } from './errors.js';
export { InvalidShapeError, TensorDecodeError } from './errors.js';
