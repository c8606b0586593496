/**
 * Configuration module exports
 */

// Schema types
export type {
  EncodingMode,
  OutputFormat,
  EncodingConfigSchema,
  DecodeConfigSchema,
  OutputConfigSchema,
  ChessPlanesConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_ENCODING_CONFIG,
  DEFAULT_DECODE_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  encodingModeSchema,
  outputFormatSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';
export type { PartialChessPlanesConfig } from './validation.js';

// Loader
export { loadConfig, loadEnvConfig, mapCliToConfig, formatConfig } from './loader.js';
