/**
 * Dependency graph engine
 *
 * - graph-store.ts: adjacency model
 * - graph-loader.ts: edge-list text -> GraphStore
 * - name-filter.ts: substring filtering shared by both traversals
 * - tree-renderer.ts: cycle-annotated tree view
 * - load-order.ts: reverse-topological order with cycle detection
 */

export { GraphStore } from './graph-store.js';
export { parseEdgeList, parseEdgeListLine, loadEdgeListFile, type EdgeListRecord } from './graph-loader.js';
export { isFilteredOut, visibleDependencies } from './name-filter.js';
export { renderTree, renderTreeLines, type TreeRenderOptions } from './tree-renderer.js';
export { computeLoadOrder, formatLoadOrder, type LoadOrderResult } from './load-order.js';
