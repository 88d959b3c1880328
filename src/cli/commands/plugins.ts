import type { Command } from 'commander';
import { CliContext, runCommand } from '../context';

interface PluginsOptions {
  readonly json?: boolean;
  readonly failures?: boolean;
}

/**
 * List registered plugins with their configuration status
 *
 * Usage:
 *   geotrail plugins [--json] [--failures]
 */
export function registerPluginsCommand(program: Command, context: CliContext): void {
  program
    .command('plugins')
    .description('List registered plugins and whether they are configured')
    .option('--json', 'Output as JSON')
    .option('--failures', 'Also list plugins that failed to load')
    .action(async (options: PluginsOptions) => {
      await runCommand(context, async ({ registry }) => {
        const statuses = await registry.statuses();
        const failures = options.failures ? registry.failures() : [];

        if (options.json) {
          context.print(JSON.stringify({
            plugins: statuses.map(({ descriptor, configured, reason }) => ({ ...descriptor, configured, reason })),
            failures: failures.map(failure => ({ path: failure.path, reason: failure.reason })),
          }, null, 2));
          return;
        }

        if (statuses.length === 0) {
          context.print('No plugins registered');
        }
        for (const { descriptor, configured, reason } of statuses) {
          const state = configured ? 'ready' : `not configured (${reason})`;
          context.print(`${descriptor.name.padEnd(20)} ${descriptor.category.padEnd(18)} ${state}`);
        }
        for (const failure of failures) {
          context.print(`FAILED ${failure.path}: ${failure.reason}`);
        }
      });
    });
}
