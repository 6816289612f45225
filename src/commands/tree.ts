import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { runTreePipeline } from '../core/tree/tree-pipeline.js';
import type { ExploreCliOptions } from '../core/explore/explore-options.js';
import { addGraphSourceOptions, parsePositiveInt, prepareExploreCommand, reportResult, type GlobalOptions } from './shared-options.js';

export function setupTreeCommand(program: Command): void {
  const command = program
    .command('tree')
    .description('Show the dependency tree of a package, marking cycles');

  addGraphSourceOptions(command)
    .option('-d, --max-depth <n>', 'maximum depth to descend (default: 3)', parsePositiveInt)
    .action(withErrorHandling(async (cliOptions: ExploreCliOptions, cmd: Command) => {
      const { options, ctx } = await prepareExploreCommand(cliOptions, cmd.optsWithGlobals<GlobalOptions>());
      reportResult(await runTreePipeline(options, ctx));
    }));
}
