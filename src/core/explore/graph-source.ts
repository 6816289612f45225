/**
 * Loads the graph an invocation explores.
 *
 * Test mode reads an edge-list file (`--repo`, else the configured test
 * graph file). Remote mode reads the root manifest named by `--repo` and
 * expands it through the registry. Either way the graph is complete before
 * any traversal starts.
 */

import { resolve } from 'path';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { ExploreOptions } from './explore-options.js';
import { GraphStore, loadEdgeListFile } from '../dependency-graph/index.js';
import { parseManifest, extractManifestDependencies, readManifestPackageName } from '../manifest/manifest-reader.js';
import { CratesRegistryClient } from '../registry/crates-registry-client.js';
import { RegistryCache } from '../registry/registry-cache.js';
import type { RegistryClient } from '../registry/types.js';
import { resolveManifestLocation, fetchManifestText, describeManifestLocation } from '../remote/manifest-source.js';
import { buildRemoteGraph, type RemoteGraphResult } from '../remote/remote-graph-builder.js';
import { resolveOutput } from '../ports/resolve.js';
import { GraphSourceError, ManifestParseError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface GraphSourceOverrides {
  /** Registry to use instead of a CratesRegistryClient built from the options. */
  registry?: RegistryClient;
}

export async function loadGraph(
  options: ExploreOptions,
  ctx: ExecutionContext,
  overrides: GraphSourceOverrides = {}
): Promise<GraphStore> {
  if (options.testMode) {
    const graphFile = resolve(ctx.sourceCwd, options.repo ?? options.testGraphFile);
    logger.debug(`Test mode: reading edge list ${graphFile}`);
    return loadEdgeListFile(graphFile);
  }

  if (!options.repo) {
    throw new GraphSourceError('no repository given for remote mode');
  }

  const location = await resolveManifestLocation(options.repo, ctx.sourceCwd);
  const manifestText = await fetchManifestText(location, ctx.fetch, options.userAgent);

  let rootDependencies: string[];
  try {
    const manifest = parseManifest(manifestText);
    const declaredName = readManifestPackageName(manifest);
    if (declaredName && declaredName !== options.packageName) {
      logger.debug(`Manifest declares package '${declaredName}', exploring it as '${options.packageName}'`);
    }
    rootDependencies = extractManifestDependencies(manifest);
  } catch (error) {
    if (error instanceof ManifestParseError) {
      throw new GraphSourceError(
        `${describeManifestLocation(location)}: ${error.message}`,
        { location: describeManifestLocation(location) }
      );
    }
    throw error;
  }

  // One cache per invocation; nothing outlives the command.
  const registry = new RegistryCache(
    overrides.registry ?? new CratesRegistryClient({
      baseUrl: options.registryUrl,
      userAgent: options.userAgent,
      fetch: ctx.fetch
    })
  );

  const spinner = resolveOutput(ctx).spinner();
  spinner.start(`Resolving dependencies of ${options.packageName}`);

  let result: RemoteGraphResult;
  try {
    result = await buildRemoteGraph(options.packageName, rootDependencies, registry, {
      maxDepth: options.maxDepth,
      filter: options.filter,
      spinner
    });
  } catch (error) {
    spinner.stop();
    throw error;
  }

  spinner.stop(`Resolved ${result.graph.size} packages (${registry.requestCount} registry lookups)`);

  if (result.unknown.length > 0) {
    logger.info(`No registry data for: ${result.unknown.join(', ')}`);
  }

  return result.graph;
}
