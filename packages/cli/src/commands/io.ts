/**
 * File and stdin/stdout helpers shared by the commands
 */

import * as fs from 'node:fs';
import * as readline from 'node:readline';

import { InputError, OutputError, resolveAbsolutePath } from '../errors/index.js';

/**
 * Read input from file or stdin
 */
export async function readInput(inputPath: string | undefined): Promise<string> {
  if (inputPath) {
    if (!fs.existsSync(inputPath)) {
      throw new InputError(
        `Input file not found: ${resolveAbsolutePath(inputPath)}`,
        'Check the file path and try again',
      );
    }
    return fs.readFileSync(inputPath, 'utf-8');
  }

  // Check if stdin is a TTY (no piped input)
  if (process.stdin.isTTY) {
    throw new InputError(
      'No input provided',
      'Provide a tensor file as argument or pipe a tensor document to stdin',
    );
  }

  return new Promise((resolve, reject) => {
    const chunks: string[] = [];
    const rl = readline.createInterface({
      input: process.stdin,
      crlfDelay: Infinity,
    });

    rl.on('line', (line) => {
      chunks.push(line);
    });

    rl.on('close', () => {
      resolve(chunks.join('\n'));
    });

    process.stdin.on('error', (err) => {
      reject(new InputError(`Failed to read from stdin: ${err.message}`));
    });
  });
}

/**
 * Write output to file or stdout
 */
export function writeOutput(output: string, outputPath: string | undefined): void {
  if (outputPath) {
    try {
      fs.writeFileSync(outputPath, `${output}\n`, 'utf-8');
    } catch (error) {
      throw new OutputError(
        `Failed to write output file: ${resolveAbsolutePath(outputPath)}`,
        error instanceof Error ? error.message : 'unknown error',
      );
    }
    return;
  }

  process.stdout.write(`${output}\n`);
}
