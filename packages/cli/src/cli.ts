/**
 * CLI definition using Commander.js
 */

import { Command } from 'commander';

import type { CliOptions } from './config/schema.js';
import { encodingModeSchema, outputFormatSchema } from './config/validation.js';
import { ConfigError } from './errors/index.js';

export const VERSION = '0.1.0';

/**
 * Encoding mode descriptions for help text
 */
const MODE_HELP = `Encoding mode:
    basic    - 12 piece planes
    extended - 12 piece planes + 7 game-state planes [default]`;

/**
 * Format descriptions for help text
 */
const FORMAT_HELP = `Output format:
    json - Tensor document, readable by decode/flip/show [default]
    text - Combined board view`;

/**
 * Options shared by every command
 */
function withCommonOptions(command: Command): Command {
  return command
    .option('-o, --output <file>', 'Output file (default: stdout)')
    .option('-c, --config <file>', 'Path to config file')
    .option('--verbose', 'Print debug diagnostics to stderr')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)');
}

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command()
    .name('chessplanes')
    .description('Encode chess positions as neural-network input planes and back')
    .version(VERSION);

  withCommonOptions(
    program
      .command('encode')
      .argument('[fen]', 'Position in FEN (default: starting position)')
      .description('Encode a position as a tensor document'),
  )
    .option('-m, --mode <mode>', MODE_HELP)
    .option('--moves <san>', 'SAN moves to play first, space separated (e.g. "e4 e5 Nf3")')
    .option('--flip', 'Flip the tensor to the other side before writing')
    .option('-f, --format <format>', FORMAT_HELP)
    .option('--pretty', 'Pretty-print the JSON document')
    .action(async (fen: string | undefined, options: Record<string, unknown>) => {
      const { encodeCommand } = await import('./commands/encode.js');
      await encodeCommand(fen, options);
    });

  withCommonOptions(
    program
      .command('decode')
      .argument('[file]', 'Tensor document (default: stdin)')
      .description('Decode the piece planes of a tensor document into a FEN'),
  )
    .option('--strict', 'Fail on cells with several active planes or values outside [0, 1]')
    .option('-t, --threshold <value>', 'Activation above which a cell is occupied (default: 0.5)')
    .action(async (file: string | undefined, options: Record<string, unknown>) => {
      const { decodeCommand } = await import('./commands/decode.js');
      await decodeCommand(file, options);
    });

  withCommonOptions(
    program
      .command('flip')
      .argument('[file]', 'Tensor document (default: stdin)')
      .description('Flip a tensor document to the other side'),
  )
    .option('--pretty', 'Pretty-print the JSON document')
    .action(async (file: string | undefined, options: Record<string, unknown>) => {
      const { flipCommand } = await import('./commands/flip.js');
      await flipCommand(file, options);
    });

  withCommonOptions(
    program
      .command('show')
      .argument('[file]', 'Tensor document (default: stdin)')
      .description('Print a tensor document as a board grid'),
  )
    .option('--channel <n>', 'Show a single channel instead of the combined view')
    .action(async (file: string | undefined, options: Record<string, unknown>) => {
      const { showCommand } = await import('./commands/show.js');
      await showCommand(file, options);
    });

  return program;
}

function stringOption(options: Record<string, unknown>, key: string): string | undefined {
  const value = options[key];
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(options: Record<string, unknown>, key: string): boolean | undefined {
  const value = options[key];
  return typeof value === 'boolean' ? value : undefined;
}

function numberOption(
  options: Record<string, unknown>,
  key: string,
  flag: string,
): number | undefined {
  const value = options[key];
  if (typeof value === 'number') return value;
  if (typeof value !== 'string') return undefined;

  const parsed = Number(value);
  if (value.trim() === '' || Number.isNaN(parsed)) {
    throw new ConfigError(`Invalid value for ${flag}: "${value}"`, `${flag} takes a number`);
  }
  return parsed;
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const output = stringOption(options, 'output');
  if (output !== undefined) result.output = output;
  const config = stringOption(options, 'config');
  if (config !== undefined) result.config = config;

  if (options['mode'] !== undefined) {
    const mode = encodingModeSchema.safeParse(options['mode']);
    if (!mode.success) {
      throw new ConfigError(
        `Invalid encoding mode: "${String(options['mode'])}"`,
        'Use --mode basic or --mode extended',
      );
    }
    result.mode = mode.data;
  }

  if (options['format'] !== undefined) {
    const format = outputFormatSchema.safeParse(options['format']);
    if (!format.success) {
      throw new ConfigError(
        `Invalid output format: "${String(options['format'])}"`,
        'Use --format json or --format text',
      );
    }
    result.format = format.data;
  }

  const moves = stringOption(options, 'moves');
  if (moves !== undefined) result.moves = moves.split(/\s+/).filter((san) => san.length > 0);

  const flip = booleanOption(options, 'flip');
  if (flip !== undefined) result.flip = flip;
  const strict = booleanOption(options, 'strict');
  if (strict !== undefined) result.strict = strict;

  const threshold = numberOption(options, 'threshold', '--threshold');
  if (threshold !== undefined) result.threshold = threshold;
  const channel = numberOption(options, 'channel', '--channel');
  if (channel !== undefined) result.channel = channel;

  const pretty = booleanOption(options, 'pretty');
  if (pretty !== undefined) result.pretty = pretty;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;
  const verbose = booleanOption(options, 'verbose');
  if (verbose !== undefined) result.verbose = verbose;
  const showConfig = booleanOption(options, 'showConfig');
  if (showConfig !== undefined) result.showConfig = showConfig;

  return result;
}
