import type { Command } from 'commander';
import { CliContext, runCommand } from '../context';

interface TargetsOptions {
  readonly json?: boolean;
}

/**
 * Search a plugin for targets
 *
 * Usage:
 *   geotrail targets <plugin> <query> [--json]
 */
export function registerTargetsCommand(program: Command, context: CliContext): void {
  program
    .command('targets')
    .description('Search a plugin for targets matching a query')
    .argument('<plugin>', 'Plugin name')
    .argument('<query>', 'Search query')
    .option('--json', 'Output as JSON')
    .action(async (pluginName: string, query: string, options: TargetsOptions) => {
      await runCommand(context, async ({ aggregator }) => {
        const targets = await aggregator.searchTargets(pluginName, query);

        if (options.json) {
          context.print(JSON.stringify({ total: targets.length, targets }, null, 2));
          return;
        }
        if (targets.length === 0) {
          context.print('No targets found');
          return;
        }
        for (const target of targets) {
          context.print(`${target.externalId}\t${target.displayName}`);
        }
      });
    });
}
