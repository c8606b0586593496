/**
 * Shared types for console output
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
}

/**
 * Reporter options
 */
export interface ReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Show debug messages (default: false) */
  verbose?: boolean;
  /** Line sink (default: console.error, keeping stdout for results) */
  write?: (line: string) => void;
}
