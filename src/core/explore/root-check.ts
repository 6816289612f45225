import type { CommandResult } from '../../types/index.js';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { GraphStore } from '../dependency-graph/graph-store.js';
import { RootNotFoundError } from '../../utils/errors.js';
import { resolveOutput } from '../ports/resolve.js';
import { logger } from '../../utils/logger.js';

/**
 * A missing root is reported, not thrown: the traversal is skipped and the
 * command finishes normally with an unsuccessful result.
 */
export function checkRoot(graph: GraphStore, root: string, ctx: ExecutionContext): CommandResult<never> | null {
  if (graph.hasNode(root)) {
    return null;
  }

  const error = new RootNotFoundError(root);
  logger.debug(error.message, { nodes: graph.size });
  resolveOutput(ctx).error(error.message);
  return { success: false, error: error.message };
}
