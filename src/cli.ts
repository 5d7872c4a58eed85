/**
 * CLI Front-End
 * Argument parsing and dispatch to single-file or directory mode
 */

import fs from 'fs/promises';
import yargs from 'yargs';
import { config } from './config';
import { BatchService, batchService } from './services/batch/batchService';
import { ANCHOR_POSITIONS, WatermarkOptions, toAnchorPosition } from './types';
import { AppError, InputPathError, UsageError } from './utils/errors';
import { AppLogger, logger as defaultLogger } from './utils/logger';

export interface CliArgs {
  inputPath: string;
  options: WatermarkOptions;
}

export interface CliDeps {
  batch?: BatchService;
  logger?: AppLogger;
}

/**
 * Parse argv (without the node and script entries). Throws UsageError on
 * invalid input.
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const parsed = yargs(argv)
    .scriptName('photo-datestamp')
    // input paths such as `2023.10` must stay strings
    .parserConfiguration({ 'parse-positional-numbers': false })
    .usage('$0 <input_path> [options]\n\nStamp photos with their capture date (YYYY-MM-DD).')
    .option('size', {
      alias: 's',
      type: 'number',
      default: config.defaults.fontSize,
      describe: 'Font size in pixels',
    })
    .option('color', {
      alias: 'c',
      type: 'string',
      default: config.defaults.color,
      describe: 'Text color: a name, #rrggbb or rgb(r, g, b)',
    })
    .option('position', {
      alias: 'p',
      type: 'string',
      choices: ANCHOR_POSITIONS,
      default: config.defaults.position,
      describe: 'Where to place the stamp',
    })
    .demandCommand(1, 1, 'Missing input_path', 'Only one input_path is accepted')
    .check((args) => {
      if (!Number.isInteger(args.size) || args.size <= 0) {
        throw new Error('--size must be a positive integer');
      }
      return true;
    })
    .strictOptions()
    .alias('h', 'help')
    .fail((msg, err) => {
      throw new UsageError(msg || (err ? err.message : 'Invalid arguments'));
    })
    .parseSync();

  return {
    inputPath: String(parsed._[0]),
    options: {
      fontSize: parsed.size,
      color: parsed.color,
      position: toAnchorPosition(parsed.position),
    },
  };
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function run(argv: string[], deps: CliDeps = {}): Promise<number> {
  const log = deps.logger ?? defaultLogger;
  const batch = deps.batch ?? batchService;

  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    if (error instanceof AppError) {
      log.error('Invalid arguments', error);
      return error.exitCode;
    }
    throw error;
  }

  const { inputPath, options } = args;
  const stats = await fs.stat(inputPath).catch(() => null);
  if (!stats) {
    const error = new InputPathError(inputPath);
    log.error('Input path not found', error, { inputPath });
    return error.exitCode;
  }

  log.info('Photo watermark run', {
    inputPath,
    fontSize: options.fontSize,
    color: options.color,
    position: options.position,
  });

  const summary = stats.isDirectory()
    ? await batch.processDirectory(inputPath, options)
    : await batch.processFile(inputPath, options);

  log.info('Processing complete', {
    outputDir: summary.outputDir,
    processed: summary.processed.length,
    failed: summary.failed.length,
  });

  return 0;
}
