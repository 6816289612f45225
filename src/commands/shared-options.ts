import { Command, InvalidArgumentError } from 'commander';

import type { CommandResult } from '../types/index.js';
import { LogLevel } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { createCliExecutionContext } from '../cli/context.js';
import { configManager } from '../core/config.js';
import {
  resolveExploreOptions,
  describeConfiguredParameters,
  type ExploreCliOptions,
  type ExploreOptions
} from '../core/explore/explore-options.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { logger } from '../utils/logger.js';

export type GlobalOptions = {
  cwd?: string;
};

/**
 * Commander argument parser for --max-depth.
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!/^\s*\d+\s*$/.test(value) || !Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError(`${value} is not a positive integer`);
  }
  return parsed;
}

/**
 * Options every graph command accepts: where the graph comes from,
 * how to filter it, and where results go.
 */
export function addGraphSourceOptions(command: Command): Command {
  return command
    .requiredOption('-p, --package <name>', 'root package to explore')
    .option('-r, --repo <location>', 'manifest location (directory, file or URL); edge-list file in test mode')
    .option('-t, --test-mode', 'read the graph from a local edge-list file')
    .option('-o, --output <file>', 'write results to a file instead of stdout')
    .option('-f, --filter <substring>', 'exclude packages whose name contains this substring')
    .option('--verbose', 'print configured parameters and debug logging');
}

/**
 * Shared command preamble: logging level, execution context, merged options.
 */
export async function prepareExploreCommand(
  cliOptions: ExploreCliOptions,
  globals: GlobalOptions
): Promise<{ options: ExploreOptions; ctx: ExecutionContext }> {
  if (cliOptions.verbose) {
    logger.setLevel(LogLevel.DEBUG);
  }

  const ctx = await createCliExecutionContext({ cwd: globals.cwd });
  const config = await configManager.load();
  const options = resolveExploreOptions(cliOptions, config);

  if (options.verbose) {
    resolveOutput(ctx).note(describeConfiguredParameters(options), 'Configured parameters:');
  }

  return { options, ctx };
}

export function reportResult(result: CommandResult): void {
  if (!result.success) {
    logger.debug('Command finished without a result', { error: result.error });
  }
}
