/**
 * Default configuration values
 */

import type {
  ChessPlanesConfig,
  DecodeConfigSchema,
  EncodingConfigSchema,
  OutputConfigSchema,
} from './schema.js';

export const DEFAULT_ENCODING_CONFIG: EncodingConfigSchema = {
  mode: 'extended',
};

export const DEFAULT_DECODE_CONFIG: DecodeConfigSchema = {
  threshold: 0.5,
  strict: false,
};

export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  pretty: false,
  color: true,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ChessPlanesConfig = {
  encoding: DEFAULT_ENCODING_CONFIG,
  decode: DEFAULT_DECODE_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
