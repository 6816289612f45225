/**
 * Option resolution shared by the `tree` and `order` commands.
 *
 * Precedence: CLI options, then environment, then the config file,
 * then built-in defaults.
 */

import type { DeptreeConfig } from '../../types/index.js';
import { DEFAULTS, ENV_VARS, FILE_PATTERNS } from '../../constants/index.js';
import { ValidationError } from '../../utils/errors.js';

export interface ExploreCliOptions {
  package: string;
  repo?: string;
  testMode?: boolean;
  output?: string;
  maxDepth?: number;
  filter?: string;
  verbose?: boolean;
}

export interface ExploreOptions {
  packageName: string;
  /** Remote mode: manifest location. Test mode: edge-list file. */
  repo?: string;
  testMode: boolean;
  outputFile?: string;
  maxDepth: number;
  filter: string;
  verbose: boolean;
  registryUrl: string;
  userAgent: string;
  testGraphFile: string;
}

export function resolveExploreOptions(
  cli: ExploreCliOptions,
  config: DeptreeConfig = {},
  env: NodeJS.ProcessEnv = process.env
): ExploreOptions {
  // Names are matched exactly; the given name is never normalized.
  const packageName = cli.package;
  if (packageName.trim().length === 0) {
    throw new ValidationError('--package must not be empty');
  }

  const testMode = cli.testMode === true;
  if (!testMode && !cli.repo) {
    throw new ValidationError('--repo is required when not using test mode');
  }

  const maxDepth = cli.maxDepth ?? config.maxDepth ?? DEFAULTS.MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth <= 0) {
    throw new ValidationError(`${maxDepth} is not a positive integer`);
  }

  return {
    packageName,
    repo: cli.repo,
    testMode,
    outputFile: cli.output,
    maxDepth,
    filter: cli.filter ?? DEFAULTS.FILTER,
    verbose: cli.verbose === true,
    registryUrl: env[ENV_VARS.REGISTRY_URL] || config.registryUrl || DEFAULTS.REGISTRY_URL,
    userAgent: config.userAgent ?? DEFAULTS.USER_AGENT,
    testGraphFile: config.testGraphFile ?? FILE_PATTERNS.TEST_GRAPH
  };
}

/**
 * Human-readable summary printed in verbose mode.
 */
export function describeConfiguredParameters(options: ExploreOptions): string {
  return [
    `  Package: ${options.packageName}`,
    `  Repository: ${options.repo ?? '(none)'}`,
    `  Test mode: ${options.testMode}`,
    `  Output file: ${options.outputFile ?? '(stdout)'}`,
    `  Max depth: ${options.maxDepth}`,
    `  Filter: ${options.filter || '(none)'}`
  ].join('\n');
}
