import type { Command } from 'commander';
import { CliContext, runCommand } from '../context';

interface ClearOptions {
  readonly expired?: boolean;
}

/**
 * Cache maintenance
 *
 * Usage:
 *   geotrail cache stats
 *   geotrail cache clear [--expired]
 */
export function registerCacheCommands(program: Command, context: CliContext): void {
  const cache = program.command('cache').description('Inspect and clear the result cache');

  cache
    .command('stats')
    .description('Show cache statistics')
    .action(async () => {
      await runCommand(context, async (services) => {
        const stats = await services.cache.stats();
        context.print(`Entries:   ${stats.entries} (${stats.expired} expired)`);
        context.print(`Locations: ${stats.totalLocations}`);
        context.print(`Size:      ${stats.sizeBytes} bytes`);
      });
    });

  cache
    .command('clear')
    .description('Delete cache entries')
    .option('--expired', 'Only delete expired entries')
    .action(async (options: ClearOptions) => {
      await runCommand(context, async (services) => {
        const removed = await services.cache.clear(options.expired ?? false);
        context.print(`Removed ${removed} cache entr${removed === 1 ? 'y' : 'ies'}`);
      });
    });
}
