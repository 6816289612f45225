import type { GraphStore } from './graph-store.js';

/**
 * A node is filtered out when the filter is non-empty and occurs anywhere
 * in its name (case-sensitive).
 */
export function isFilteredOut(name: string, filter: string): boolean {
  return filter.length > 0 && name.includes(filter);
}

/**
 * Direct dependencies of `name` with filtered nodes removed, in ascending
 * code-unit order. Edges into a filtered node are treated as absent.
 */
export function visibleDependencies(graph: GraphStore, name: string, filter: string): string[] {
  return Array.from(graph.dependenciesOf(name))
    .filter(dep => !isFilteredOut(dep, filter))
    .sort();
}
