/**
 * Configuration schema types for the chessplanes CLI
 */

import type { EncodingMode } from '@chessplanes/tensor';

export type { EncodingMode };

/**
 * Output format of the encode command
 */
export type OutputFormat = 'json' | 'text';

/**
 * Encoding configuration
 */
export interface EncodingConfigSchema {
  /** Channel set produced by `encode` */
  mode: EncodingMode;
}

/**
 * Decoding configuration
 */
export interface DecodeConfigSchema {
  /** Activation above which a piece plane cell counts as occupied */
  threshold: number;
  /** Reject ambiguous or out-of-range cells instead of decoding them */
  strict: boolean;
}

/**
 * Output configuration
 */
export interface OutputConfigSchema {
  /** Pretty-print JSON tensor documents */
  pretty: boolean;
  /** Colorize diagnostics */
  color: boolean;
}

/**
 * Complete configuration
 */
export interface ChessPlanesConfig {
  encoding: EncodingConfigSchema;
  decode: DecodeConfigSchema;
  output: OutputConfigSchema;
}

/**
 * CLI options (parsed from command line)
 */
export interface CliOptions {
  output?: string;
  config?: string;
  mode?: EncodingMode;
  format?: OutputFormat;
  moves?: string[];
  flip?: boolean;
  strict?: boolean;
  threshold?: number;
  channel?: number;
  pretty?: boolean;
  noColor?: boolean;
  verbose?: boolean;
  showConfig?: boolean;
}
