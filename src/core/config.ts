import { join } from 'path';
import type { DeptreeConfig } from '../types/index.js';
import { FILE_PATTERNS, ENV_VARS } from '../constants/index.js';
import { exists, readJsonOrJsoncFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { getDeptreeDirectories } from './directory.js';

/**
 * Configuration management for the deptree CLI.
 * Reads ~/.deptree/config.jsonc (or config.json); the file is optional and
 * never created implicitly. DEPTREE_CONFIG points at an explicit file.
 */

const STRING_KEYS = ['registryUrl', 'userAgent', 'testGraphFile'] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the parsed file against the known keys. Unknown keys are ignored
 * with a debug message.
 */
export function validateConfig(raw: unknown, source: string): DeptreeConfig {
  if (!isRecord(raw)) {
    throw new ConfigError(`Configuration in ${source} must be an object`, { source });
  }

  const config: DeptreeConfig = {};

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.length === 0) {
      throw new ConfigError(`Configuration key '${key}' in ${source} must be a non-empty string`, { source, key });
    }
    config[key] = value;
  }

  if (raw.maxDepth !== undefined) {
    const value = raw.maxDepth;
    if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
      throw new ConfigError(`Configuration key 'maxDepth' in ${source} must be a positive integer`, { source });
    }
    config.maxDepth = value;
  }

  const known = new Set<string>([...STRING_KEYS, 'maxDepth']);
  const unknown = Object.keys(raw).filter(key => !known.has(key));
  if (unknown.length > 0) {
    logger.debug(`Ignoring unknown configuration keys in ${source}`, { keys: unknown });
  }

  return config;
}

export class ConfigManager {
  private config: DeptreeConfig | null = null;

  constructor(
    private readonly configDir: string = getDeptreeDirectories().config,
    private readonly env: NodeJS.ProcessEnv = process.env
  ) {}

  /**
   * Explicit file from the environment, else the first existing
   * config file in the config directory.
   */
  async findConfigFile(): Promise<string | null> {
    const explicit = this.env[ENV_VARS.CONFIG];
    if (explicit) {
      if (!(await exists(explicit))) {
        throw new ConfigError(`Configuration file not found: ${explicit}`, { path: explicit });
      }
      return explicit;
    }

    for (const fileName of FILE_PATTERNS.CONFIG_FILES) {
      const path = join(this.configDir, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  async load(): Promise<DeptreeConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      throw new ConfigError(
        `Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`,
        { path: configPath }
      );
    }

    this.config = validateConfig(raw, configPath);
    return this.config;
  }
}

export const configManager = new ConfigManager();
