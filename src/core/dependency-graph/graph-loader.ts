/**
 * Edge-list loader.
 *
 * Format, one record per line:
 *
 *   name: dep1 dep2 dep3
 *
 * Blank lines, `#` comments and lines without a colon are skipped.
 * Names and tokens are taken verbatim.
 */

import { GraphStore } from './graph-store.js';
import { readTextFile } from '../../utils/fs.js';
import { GraphSourceError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const COMMENT_PREFIX = '#';

export interface EdgeListRecord {
  name: string;
  dependencies: string[];
}

/**
 * Parse one edge-list line; null for lines that carry no record.
 */
export function parseEdgeListLine(line: string): EdgeListRecord | null {
  const trimmed = line.trim();
  if (trimmed.length === 0 || trimmed.startsWith(COMMENT_PREFIX)) {
    return null;
  }

  const colonIndex = trimmed.indexOf(':');
  if (colonIndex === -1) {
    return null;
  }

  const name = trimmed.slice(0, colonIndex).trim();
  if (name.length === 0) {
    return null;
  }

  const dependencies = trimmed
    .slice(colonIndex + 1)
    .split(/\s+/)
    .filter(token => token.length > 0);

  return { name, dependencies };
}

/**
 * Build a graph from edge-list text. Every dependency token becomes a node,
 * even if it never appears on the left of a colon.
 */
export function parseEdgeList(text: string, graph: GraphStore = new GraphStore()): GraphStore {
  let skipped = 0;

  for (const line of text.split(/\r?\n/)) {
    const record = parseEdgeListLine(line);
    if (!record) {
      if (line.trim().length > 0) skipped++;
      continue;
    }
    graph.addDependencies(record.name, record.dependencies);
  }

  if (skipped > 0) {
    logger.debug(`Skipped ${skipped} non-record line(s) in edge list`);
  }

  return graph;
}

/**
 * Read and parse an edge-list file. A file that cannot be read is fatal
 * for the whole invocation.
 */
export async function loadEdgeListFile(filePath: string): Promise<GraphStore> {
  let text: string;
  try {
    text = await readTextFile(filePath);
  } catch (error) {
    throw new GraphSourceError(`cannot read edge list '${filePath}'`, { path: filePath, error });
  }

  const graph = parseEdgeList(text);
  logger.debug(`Loaded edge list from ${filePath}`, { nodes: graph.size });
  return graph;
}
