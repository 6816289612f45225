import type { CommandResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { ExploreOptions } from '../explore/explore-options.js';
import { loadGraph, type GraphSourceOverrides } from '../explore/graph-source.js';
import { checkRoot } from '../explore/root-check.js';
import { emitResultLines } from '../explore/result-writer.js';
import { renderTreeLines } from '../dependency-graph/index.js';
import { logger } from '../../utils/logger.js';

export interface TreePipelineResult {
  lines: string[];
  graphSize: number;
  outputPath?: string;
}

/**
 * Load the graph, render the tree under the root and emit it.
 */
export async function runTreePipeline(
  options: ExploreOptions,
  ctx: ExecutionContext,
  overrides: GraphSourceOverrides = {}
): Promise<CommandResult<TreePipelineResult>> {
  const graph = await loadGraph(options, ctx, overrides);

  const missing = checkRoot(graph, options.packageName, ctx);
  if (missing) {
    return missing;
  }

  const lines = renderTreeLines(graph, options.packageName, {
    maxDepth: options.maxDepth,
    filter: options.filter
  });
  logger.debug(`Rendered ${lines.length} tree lines`, { root: options.packageName, maxDepth: options.maxDepth });

  const outputPath = await emitResultLines(lines, options.outputFile, ctx);

  return {
    success: true,
    data: { lines, graphSize: graph.size, outputPath }
  };
}
