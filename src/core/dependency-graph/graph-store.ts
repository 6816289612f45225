/**
 * In-memory adjacency model of a dependency graph.
 *
 * Every name that appears as a dependency is also a key (with an empty set
 * when nothing else is known about it), so traversals never have to deal
 * with an unknown node.
 */
export class GraphStore {
  private readonly adjacency = new Map<string, Set<string>>();

  /**
   * Guarantee `name` is present, with at least an empty dependency set.
   */
  ensureNode(name: string): void {
    if (!this.adjacency.has(name)) {
      this.adjacency.set(name, new Set());
    }
  }

  /**
   * Record `to` as a direct dependency of `from`. Both become nodes.
   */
  addEdge(from: string, to: string): void {
    this.ensureNode(from);
    this.ensureNode(to);
    this.adjacency.get(from)?.add(to);
  }

  addDependencies(from: string, dependencies: Iterable<string>): void {
    this.ensureNode(from);
    for (const dependency of dependencies) {
      this.addEdge(from, dependency);
    }
  }

  /**
   * Direct dependencies of `name`; empty when the node is absent.
   * The returned set is a copy.
   */
  dependenciesOf(name: string): ReadonlySet<string> {
    return new Set(this.adjacency.get(name) ?? []);
  }

  hasNode(name: string): boolean {
    return this.adjacency.has(name);
  }

  /**
   * Node names in no particular order; callers sort when they need determinism.
   */
  nodes(): string[] {
    return Array.from(this.adjacency.keys());
  }

  get size(): number {
    return this.adjacency.size;
  }
}
