import type { CommandResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { ExploreOptions } from '../explore/explore-options.js';
import { loadGraph, type GraphSourceOverrides } from '../explore/graph-source.js';
import { checkRoot } from '../explore/root-check.js';
import { emitResultLines } from '../explore/result-writer.js';
import { computeLoadOrder, formatLoadOrder } from '../dependency-graph/index.js';
import { resolveOutput } from '../ports/resolve.js';
import { logger } from '../../utils/logger.js';

export interface OrderPipelineResult {
  order: string[];
  /** Detected cycle points, sorted. */
  cycles: string[];
  lines: string[];
  outputPath?: string;
}

/**
 * Load the graph, compute the loading order from the root and emit it.
 */
export async function runOrderPipeline(
  options: ExploreOptions,
  ctx: ExecutionContext,
  overrides: GraphSourceOverrides = {}
): Promise<CommandResult<OrderPipelineResult>> {
  const graph = await loadGraph(options, ctx, overrides);

  const missing = checkRoot(graph, options.packageName, ctx);
  if (missing) {
    return missing;
  }

  const result = computeLoadOrder(graph, options.packageName, options.filter);
  const cycles = Array.from(result.cycles).sort();
  const lines = formatLoadOrder(result);
  logger.debug('Computed loading order', { size: result.order.length, cycles });

  if (lines.length === 0) {
    // Only possible when the filter matches the root itself
    resolveOutput(ctx).warn(`'${options.packageName}' is excluded by filter '${options.filter}'`);
  }

  const outputPath = await emitResultLines(lines, options.outputFile, ctx);

  return {
    success: true,
    data: { order: result.order, cycles, lines, outputPath }
  };
}
