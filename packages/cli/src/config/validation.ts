/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { ChessPlanesConfig } from './schema.js';

/**
 * Encoding mode schema
 */
export const encodingModeSchema = z.enum(['basic', 'extended']);

/**
 * Encode output format schema
 */
export const outputFormatSchema = z.enum(['json', 'text']);

/**
 * Threshold schema (strictly between 0 and 1)
 */
const thresholdSchema = z.number().gt(0).lt(1);

export const encodingConfigSchema = z.object({
  mode: encodingModeSchema,
});

export const decodeConfigSchema = z.object({
  threshold: thresholdSchema,
  strict: z.boolean(),
});

export const outputConfigSchema = z.object({
  pretty: z.boolean(),
  color: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  encoding: encodingConfigSchema,
  decode: decodeConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files, environment and flags)
 */
export const partialConfigSchema = z.object({
  encoding: encodingConfigSchema.partial().optional(),
  decode: decodeConfigSchema.partial().optional(),
  output: outputConfigSchema.partial().optional(),
});

export type PartialChessPlanesConfig = z.infer<typeof partialConfigSchema>;

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly errors: Array<{ path: string; message: string }>,
    public readonly source?: string,
  ) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed${source ? ` (${source})` : ''}:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      `Configuration validation failed${this.source ? ` (${this.source})` : ''}:`,
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationErrors(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown, source?: string): ChessPlanesConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(toValidationErrors(result.error), source);
  }
  return result.data;
}

/**
 * Validate a partial configuration
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown, source?: string): PartialChessPlanesConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(toValidationErrors(result.error), source);
  }
  return result.data;
}
