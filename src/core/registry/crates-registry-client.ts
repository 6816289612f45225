/**
 * crates.io-compatible registry client.
 *
 * Two requests per package:
 *   GET <base>/crates/<name>                         -> latest stable version
 *   GET <base>/crates/<name>/<version>/dependencies  -> dependency list
 *
 * Only dependencies of kind `normal` are returned. Every failure degrades to
 * null ("unknown"); this client never throws.
 */

import type { FetchFn } from '../../types/execution-context.js';
import type { RegistryClient, RegistryDependencies } from './types.js';
import { DEFAULTS, NORMAL_DEPENDENCY_KIND } from '../../constants/index.js';
import { logger } from '../../utils/logger.js';

export interface CratesRegistryClientOptions {
  baseUrl?: string;
  userAgent?: string;
  fetch?: FetchFn;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/**
 * Version to inspect from a `/crates/<name>` payload.
 */
export function selectCrateVersion(payload: unknown): string | undefined {
  if (!isObject(payload) || !isObject(payload.crate)) return undefined;
  return nonEmptyString(payload.crate.max_stable_version) ?? nonEmptyString(payload.crate.newest_version);
}

/**
 * Names of `normal` dependencies from a `/dependencies` payload, sorted and
 * deduplicated; undefined when the payload has an unexpected shape.
 */
export function selectNormalDependencies(payload: unknown): string[] | undefined {
  if (!isObject(payload) || !Array.isArray(payload.dependencies)) return undefined;

  const names = new Set<string>();
  for (const entry of payload.dependencies) {
    if (!isObject(entry) || entry.kind !== NORMAL_DEPENDENCY_KIND) continue;
    const name = nonEmptyString(entry.crate_id);
    if (name) names.add(name);
  }
  return Array.from(names).sort();
}

export class CratesRegistryClient implements RegistryClient {
  private readonly baseUrl: string;
  private readonly userAgent: string;
  private readonly fetchFn: FetchFn;

  constructor(options: CratesRegistryClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULTS.REGISTRY_URL).replace(/\/+$/, '');
    this.userAgent = options.userAgent ?? DEFAULTS.USER_AGENT;
    this.fetchFn = options.fetch ?? fetch;
  }

  async dependenciesOf(packageName: string): Promise<RegistryDependencies> {
    const crateUrl = `${this.baseUrl}/crates/${encodeURIComponent(packageName)}`;
    const version = selectCrateVersion(await this.getJson(crateUrl));
    if (!version) {
      logger.debug(`No usable version for '${packageName}' in registry`);
      return null;
    }

    const depsUrl = `${crateUrl}/${encodeURIComponent(version)}/dependencies`;
    const dependencies = selectNormalDependencies(await this.getJson(depsUrl));
    if (!dependencies) {
      logger.debug(`Unexpected dependency payload for '${packageName}@${version}'`);
      return null;
    }

    logger.debug(`Fetched ${dependencies.length} dependencies for ${packageName}@${version}`);
    return dependencies;
  }

  private async getJson(url: string): Promise<unknown> {
    try {
      const response = await this.fetchFn(url, {
        headers: { 'User-Agent': this.userAgent, Accept: 'application/json' }
      });
      if (!response.ok) {
        logger.debug(`Registry request failed: ${url}`, { status: response.status });
        return undefined;
      }
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      logger.debug(`Registry request error: ${url}`, { error });
      return undefined;
    }
  }
}
