/**
 * CLI Context Factory
 *
 * Creates ExecutionContext instances with the CLI output adapter injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { createPlainOutput } from './plain-output-adapter.js';
import type { OutputPort } from '../core/ports/output.js';

/** Cached port for the lifetime of the CLI process. */
let cachedPlainOutput: OutputPort | undefined;

export async function createCliExecutionContext(options: ExecutionOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  ctx.output = options.output ?? (cachedPlainOutput ??= createPlainOutput());
  return ctx;
}
