/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig } from 'cosmiconfig';

import { DEFAULT_CONFIG } from './defaults.js';
import type { ChessPlanesConfig, CliOptions } from './schema.js';
import {
  validateConfig,
  validatePartialConfig,
  type PartialChessPlanesConfig,
} from './validation.js';

type EnvValueKind = 'string' | 'number' | 'boolean';

/**
 * Environment variable mapping
 * Maps env var names to config section, key and value type
 */
const ENV_VAR_MAP: Record<string, { section: keyof ChessPlanesConfig; key: string; kind: EnvValueKind }> = {
  CHESSPLANES_ENCODING: { section: 'encoding', key: 'mode', kind: 'string' },
  CHESSPLANES_DECODE_THRESHOLD: { section: 'decode', key: 'threshold', kind: 'number' },
  CHESSPLANES_DECODE_STRICT: { section: 'decode', key: 'strict', kind: 'boolean' },
  CHESSPLANES_PRETTY: { section: 'output', key: 'pretty', kind: 'boolean' },
  CHESSPLANES_COLOR: { section: 'output', key: 'color', kind: 'boolean' },
};

/**
 * Parse environment variable value based on expected type.
 * Values that do not parse are passed through so validation reports them.
 */
function parseEnvValue(value: string, kind: EnvValueKind): unknown {
  if (kind === 'boolean') {
    const lower = value.toLowerCase();
    if (lower === 'true' || value === '1') return true;
    if (lower === 'false' || value === '0') return false;
    return value;
  }

  if (kind === 'number') {
    const num = parseFloat(value);
    return isNaN(num) ? value : num;
  }

  return value;
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialChessPlanesConfig {
  const config: Record<string, Record<string, unknown>> = {};

  for (const [envVar, target] of Object.entries(ENV_VAR_MAP)) {
    const value = env[envVar];
    if (value !== undefined && value !== '') {
      const section = config[target.section] ?? {};
      section[target.key] = parseEnvValue(value, target.kind);
      config[target.section] = section;
    }
  }

  return validatePartialConfig(config, 'environment');
}

/**
 * Load configuration from config file using cosmiconfig
 */
async function loadConfigFile(configPath?: string): Promise<PartialChessPlanesConfig | null> {
  const explorer = cosmiconfig('chessplanes', {
    searchPlaces: [
      'package.json',
      '.chessplanesrc',
      '.chessplanesrc.json',
      '.chessplanesrc.yaml',
      '.chessplanesrc.yml',
      '.chessplanesrc.js',
      '.chessplanesrc.cjs',
      'chessplanes.config.js',
      'chessplanes.config.cjs',
    ],
  });

  const result = configPath ? await explorer.load(configPath) : await explorer.search();

  if (result && !result.isEmpty) {
    return validatePartialConfig(result.config, result.filepath);
  }

  return null;
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialChessPlanesConfig {
  const config: Record<string, Record<string, unknown>> = {};

  if (options.mode !== undefined) {
    config['encoding'] = { mode: options.mode };
  }

  const decode: Record<string, unknown> = {};
  if (options.threshold !== undefined) decode['threshold'] = options.threshold;
  if (options.strict !== undefined) decode['strict'] = options.strict;
  if (Object.keys(decode).length > 0) config['decode'] = decode;

  const output: Record<string, unknown> = {};
  if (options.pretty !== undefined) output['pretty'] = options.pretty;
  // Note: --no-color maps to noColor
  if (options.noColor) output['color'] = false;
  if (Object.keys(output).length > 0) config['output'] = output;

  return validatePartialConfig(config, 'command line');
}

/**
 * Merge a partial configuration over a complete one
 */
function mergeConfig(
  target: ChessPlanesConfig,
  source: PartialChessPlanesConfig | null,
  sourceName: string,
): ChessPlanesConfig {
  if (!source) return target;

  return validateConfig(
    {
      encoding: { ...target.encoding, ...source.encoding },
      decode: { ...target.decode, ...source.decode },
      output: { ...target.output, ...source.output },
    },
    sourceName,
  );
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  env: NodeJS.ProcessEnv = process.env,
): Promise<ChessPlanesConfig> {
  let config = validateConfig(DEFAULT_CONFIG, 'defaults');

  const fileConfig = await loadConfigFile(cliOptions.config);
  config = mergeConfig(config, fileConfig, 'config file');

  config = mergeConfig(config, loadEnvConfig(env), 'environment');

  config = mergeConfig(config, mapCliToConfig(cliOptions), 'command line');

  return config;
}

/**
 * Format configuration for display
 */
export function formatConfig(config: ChessPlanesConfig): string {
  return JSON.stringify(config, null, 2);
}
