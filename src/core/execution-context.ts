/**
 * Execution Context Module
 *
 * Creates and validates the ExecutionContext for commands.
 * sourceCwd is where relative inputs (edge-list files, manifest
 * directories, --output targets) are resolved.
 */

import { resolve } from 'path';
import { stat } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 *
 * sourceCwd is --cwd resolved against process.cwd(), or process.cwd() itself.
 */
export async function createExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const sourceCwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();

  const context: ExecutionContext = {
    sourceCwd,
    output: options.output,
    fetch: options.fetch
  };

  await validateExecutionContext(context);

  logger.debug('Created execution context', { sourceCwd: context.sourceCwd });

  return context;
}

async function validateExecutionContext(context: ExecutionContext): Promise<void> {
  try {
    const sourceStat = await stat(context.sourceCwd);
    if (!sourceStat.isDirectory()) {
      throw new ValidationError(`'${context.sourceCwd}' is not a directory`);
    }
  } catch (error) {
    if (error instanceof ValidationError) {
      throw error;
    }
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(
        `Working directory does not exist: ${context.sourceCwd}\n\n` +
        `Hint: Create the directory or specify a different one with --cwd`
      );
    }
    throw new ValidationError(
      `Invalid working directory: ${context.sourceCwd}\n` +
      `Error: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}
