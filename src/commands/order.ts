import { Command } from 'commander';

import { withErrorHandling } from '../utils/errors.js';
import { runOrderPipeline } from '../core/order/order-pipeline.js';
import type { ExploreCliOptions } from '../core/explore/explore-options.js';
import { addGraphSourceOptions, parsePositiveInt, prepareExploreCommand, reportResult, type GlobalOptions } from './shared-options.js';

export function setupOrderCommand(program: Command): void {
  const command = program
    .command('order')
    .description('Print the loading order of a package (dependencies first)');

  addGraphSourceOptions(command)
    .option('-d, --max-depth <n>', 'depth to which remote dependencies are fetched (default: 3)', parsePositiveInt)
    .action(withErrorHandling(async (cliOptions: ExploreCliOptions, cmd: Command) => {
      const { options, ctx } = await prepareExploreCommand(cliOptions, cmd.optsWithGlobals<GlobalOptions>());
      reportResult(await runOrderPipeline(options, ctx));
    }));
}
