/**
 * Depth-first, cycle-annotated tree rendering over a GraphStore.
 *
 * Example for `A: B C`, `B: A` rendered from A:
 *
 *   A
 *   ├── B
 *   │   └── A (cyclic)
 *   └── C
 */

import type { GraphStore } from './graph-store.js';
import { visibleDependencies } from './name-filter.js';
import { TREE_CONNECTORS, CYCLIC_MARKER } from '../../constants/index.js';

export interface TreeRenderOptions {
  /** Nodes at this depth are emitted but never expanded. The root is depth 0. */
  maxDepth: number;
  /** Non-empty substring that removes matching nodes and their subtrees. */
  filter?: string;
}

interface RenderFrame {
  name: string;
  depth: number;
  /** Prefix inherited by this node's children. */
  childPrefix: string;
  children: string[];
  next: number;
}

/**
 * Lazily produce the display lines of the tree rooted at `root`.
 * The root itself is never filtered.
 *
 * Walks an explicit stack of expanded nodes, so chain length is not bounded
 * by the host call stack. The names on the stack form the ancestor path of
 * the node being emitted: a frame joins the path when pushed and leaves it
 * when popped, so sibling branches never see each other's members.
 */
export function* renderTree(graph: GraphStore, root: string, options: TreeRenderOptions): Generator<string> {
  const { maxDepth } = options;
  const filter = options.filter ?? '';
  const ancestors = new Set<string>();
  const stack: RenderFrame[] = [];

  // Returns the node's line and pushes a frame when it has children to show.
  const enter = (name: string, depth: number, linePrefix: string, childPrefix: string): string => {
    const line = `${linePrefix}${name}`;
    if (ancestors.has(name)) {
      return `${line}${CYCLIC_MARKER}`;
    }
    if (depth >= maxDepth) {
      return line;
    }

    const children = visibleDependencies(graph, name, filter);
    if (children.length > 0) {
      ancestors.add(name);
      stack.push({ name, depth, childPrefix, children, next: 0 });
    }
    return line;
  };

  yield enter(root, 0, '', '');

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next >= frame.children.length) {
      stack.pop();
      ancestors.delete(frame.name);
      continue;
    }

    const isLast = frame.next === frame.children.length - 1;
    const child = frame.children[frame.next];
    frame.next++;

    yield enter(
      child,
      frame.depth + 1,
      frame.childPrefix + (isLast ? TREE_CONNECTORS.LAST : TREE_CONNECTORS.BRANCH),
      frame.childPrefix + (isLast ? TREE_CONNECTORS.BLANK : TREE_CONNECTORS.PIPE)
    );
  }
}

export function renderTreeLines(graph: GraphStore, root: string, options: TreeRenderOptions): string[] {
  return Array.from(renderTree(graph, root, options));
}
