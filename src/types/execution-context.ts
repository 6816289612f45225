/**
 * Execution Context Types
 *
 * Carries the working directory and port interfaces through a command run,
 * so the same pipelines can be driven by the CLI or by tests.
 */

import type { OutputPort } from '../core/ports/output.js';

/**
 * Minimal fetch signature used by the remote collaborators.
 * Matches the global `fetch` available in Node.js 20.
 */
export type FetchFn = (input: string, init?: { headers?: Record<string, string> }) => Promise<Response>;

export interface ExecutionContext {
  /**
   * Absolute path used to resolve relative inputs (edge-list files,
   * manifest directories, the --output file).
   */
  sourceCwd: string;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;

  /**
   * HTTP transport for manifest and registry requests.
   * Defaults to the global fetch.
   */
  fetch?: FetchFn;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  cwd?: string;
  output?: OutputPort;
  fetch?: FetchFn;
}
