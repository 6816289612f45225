/**
 * Reverse-topological "loading order": every dependency before the packages
 * that depend on it.
 *
 * Depth-first post-order with an explicit work stack, so very deep chains
 * do not hit the host recursion limit. Children are visited in ascending
 * name order, which makes the result deterministic.
 *
 * Cycle reporting is partial: only the node at which a still-active
 * ancestor was met again is recorded, not every member of the cycle.
 */

import type { GraphStore } from './graph-store.js';
import { isFilteredOut, visibleDependencies } from './name-filter.js';
import { LOAD_ORDER_SEPARATOR, CYCLE_NOTE_PREFIX } from '../../constants/index.js';

export interface LoadOrderResult {
  order: string[];
  cycles: ReadonlySet<string>;
}

interface StackFrame {
  name: string;
  children: string[];
  next: number;
}

export function computeLoadOrder(graph: GraphStore, start: string, filter: string = ''): LoadOrderResult {
  const order: string[] = [];
  const visited = new Set<string>();
  const onStack = new Set<string>();
  const cycles = new Set<string>();
  const stack: StackFrame[] = [];

  const enter = (name: string): void => {
    if (isFilteredOut(name, filter)) return;
    if (onStack.has(name)) {
      cycles.add(name);
      return;
    }
    if (visited.has(name)) return;

    onStack.add(name);
    stack.push({ name, children: visibleDependencies(graph, name, filter), next: 0 });
  };

  enter(start);

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next < frame.children.length) {
      const child = frame.children[frame.next];
      frame.next++;
      enter(child);
      continue;
    }

    stack.pop();
    onStack.delete(frame.name);
    visited.add(frame.name);
    order.push(frame.name);
  }

  return { order, cycles };
}

/**
 * Output lines for a load order: the order itself and, when any detected
 * cycle point made it into the order, a note naming those packages.
 */
export function formatLoadOrder(result: LoadOrderResult): string[] {
  if (result.order.length === 0) {
    return [];
  }

  const lines = [result.order.join(LOAD_ORDER_SEPARATOR)];

  const ordered = new Set(result.order);
  const cyclic = Array.from(result.cycles).filter(name => ordered.has(name)).sort();
  if (cyclic.length > 0) {
    lines.push(`${CYCLE_NOTE_PREFIX}${cyclic.join(', ')}`);
  }

  return lines;
}
