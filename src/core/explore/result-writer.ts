import { resolve } from 'path';
import type { ExecutionContext } from '../../types/execution-context.js';
import { resolveOutput } from '../ports/resolve.js';
import { writeTextFile } from '../../utils/fs.js';

/**
 * Send result lines to the --output file when one is given, otherwise to
 * the output port one line at a time. Returns the written path, if any.
 */
export async function emitResultLines(
  lines: readonly string[],
  outputFile: string | undefined,
  ctx: ExecutionContext
): Promise<string | undefined> {
  const out = resolveOutput(ctx);

  if (!outputFile) {
    for (const line of lines) {
      out.message(line);
    }
    return undefined;
  }

  const target = resolve(ctx.sourceCwd, outputFile);
  await writeTextFile(target, lines.length > 0 ? `${lines.join('\n')}\n` : '');
  out.success(`Wrote ${lines.length} line(s) to ${target}`);
  return target;
}
