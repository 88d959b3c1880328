import { Command } from 'commander';
import { CliContext } from './context';
import { registerCacheCommands } from './commands/cache';
import { registerCollectCommand } from './commands/collect';
import { registerPluginsCommand } from './commands/plugins';
import { registerProjectCommands } from './commands/project';
import { registerTargetsCommand } from './commands/targets';

export const CLI_VERSION = '0.1.0';

export function createProgram(context: CliContext): Command {
  const program = new Command();

  program
    .name('geotrail')
    .description('Collect, standardize and store geolocated records from pluggable sources')
    .version(CLI_VERSION);

  registerPluginsCommand(program, context);
  registerTargetsCommand(program, context);
  registerCollectCommand(program, context);
  registerProjectCommands(program, context);
  registerCacheCommands(program, context);

  return program;
}

export type { CliContext } from './context';
