/**
 * Builds a dependency graph from a root manifest and a registry.
 *
 * Breadth-first waves: the root carries the manifest dependencies (depth 0),
 * and every package first reached at a depth below maxDepth is expanded
 * through the registry. Packages at the depth limit, filtered packages and
 * packages the registry knows nothing about remain leaves. Requests are
 * made one at a time, in ascending name order within a wave.
 */

import { GraphStore } from '../dependency-graph/graph-store.js';
import { isFilteredOut } from '../dependency-graph/name-filter.js';
import type { RegistryClient } from '../registry/types.js';
import type { UnifiedSpinner } from '../ports/output.js';
import { logger } from '../../utils/logger.js';

const DEFAULT_MAX_NODES = 10_000;

export interface RemoteGraphOptions {
  maxDepth: number;
  filter?: string;
  /** Stop expanding once the graph holds this many nodes. */
  maxNodes?: number;
  spinner?: UnifiedSpinner;
}

export interface RemoteGraphResult {
  graph: GraphStore;
  /** Packages the registry could not describe; rendered as leaves. */
  unknown: string[];
  /** True when maxNodes cut the expansion short. */
  truncated: boolean;
}

export async function buildRemoteGraph(
  root: string,
  rootDependencies: readonly string[],
  registry: RegistryClient,
  options: RemoteGraphOptions
): Promise<RemoteGraphResult> {
  const { maxDepth, filter = '', maxNodes = DEFAULT_MAX_NODES, spinner } = options;

  const graph = new GraphStore();
  graph.addDependencies(root, rootDependencies);

  const expanded = new Set<string>([root]);
  const unknown: string[] = [];
  let truncated = false;
  let wave: string[] = [...rootDependencies];

  for (let depth = 1; depth < maxDepth && wave.length > 0 && !truncated; depth++) {
    const next: string[] = [];

    for (const name of Array.from(new Set(wave)).sort()) {
      if (expanded.has(name) || isFilteredOut(name, filter)) continue;

      if (graph.size >= maxNodes) {
        logger.warn(`Stopped expanding after ${graph.size} packages (limit ${maxNodes})`);
        truncated = true;
        break;
      }

      expanded.add(name);
      spinner?.message(`Resolving ${name} (depth ${depth})`);

      const dependencies = await registry.dependenciesOf(name);
      if (dependencies === null) {
        logger.debug(`No dependency information for '${name}', treating as leaf`);
        unknown.push(name);
        continue;
      }

      graph.addDependencies(name, dependencies);
      next.push(...dependencies);
    }

    logger.debug(`Wave ${depth} complete`, { nodes: graph.size, pending: next.length });
    wave = next;
  }

  return { graph, unknown: unknown.sort(), truncated };
}
