/**
 * Shared setup for command actions: option parsing, configuration, reporter
 */

import { parseCliOptions } from '../cli.js';
import {
  formatConfig,
  loadConfig,
  type ChessPlanesConfig,
  type CliOptions,
} from '../config/index.js';
import { Reporter } from '../output/index.js';

export interface CommandContext {
  options: CliOptions;
  config: ChessPlanesConfig;
  reporter: Reporter;
}

/**
 * Resolve options and configuration for a command.
 * Returns null when --show-config was given and the command should stop.
 */
export async function prepareCommand(rawOptions: Record<string, unknown>): Promise<CommandContext | null> {
  const options = parseCliOptions(rawOptions);
  const config = await loadConfig(options);

  if (options.showConfig) {
    process.stdout.write(`${formatConfig(config)}\n`);
    return null;
  }

  const reporter = new Reporter({
    color: config.output.color,
    verbose: options.verbose ?? false,
  });
  reporter.debug(`Configuration: ${JSON.stringify(config)}`);

  return { options, config, reporter };
}
