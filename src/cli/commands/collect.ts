import { promises as fs } from 'fs';
import path from 'path';
import type { Command } from 'commander';
import { CliContext, parsePositiveInt, runCommand } from '../context';
import type { Services } from '../../services/container';
import type { FetchProgress } from '../../services/FetchOrchestrator';
import type { Project } from '../../types/Project';
import { isNotFound } from '../../utils/fileUtils';

interface CollectOptions {
  readonly project?: string;
  readonly maxItems?: string;
  readonly pageSize?: string;
  readonly cache: boolean;
  readonly geocode: boolean;
  readonly json?: boolean;
}

/**
 * Collect locations for one target, optionally appending them to a project
 *
 * Usage:
 *   geotrail collect <plugin> <targetId> [--project <path>] [--max-items <n>] [--page-size <n>] [--no-cache]
 */
export function registerCollectCommand(program: Command, context: CliContext): void {
  program
    .command('collect')
    .description('Collect locations for a target')
    .argument('<plugin>', 'Plugin name')
    .argument('<targetId>', 'Target identifier returned by the targets command')
    .option('--project <path>', 'Append the locations to this project, creating it when missing')
    .option('--max-items <n>', 'Stop after at least this many records')
    .option('--page-size <n>', 'Records per page request')
    .option('--no-cache', 'Bypass the result cache')
    .option('--no-geocode', 'Do not geocode records without coordinates')
    .option('--json', 'Print the collected locations as JSON')
    .action(async (pluginName: string, targetId: string, options: CollectOptions) => {
      await runCommand(context, async (services) => {
        const maxItems = parsePositiveInt(options.maxItems, '--max-items');
        const pageSize = parsePositiveInt(options.pageSize, '--page-size');
        const project = options.project ? await openProject(services, options.project) : undefined;

        const handle = await services.aggregator.start(
          pluginName,
          { pluginName, externalId: targetId, displayName: targetId },
          { maxItems, pageSize, useCache: options.cache, geocode: options.geocode, project }
        );

        if (!options.json) {
          handle.run?.on('progress', (progress: FetchProgress) => {
            context.printError(`[${String(progress.percent).padStart(3)}%] ${progress.message}`);
          });
        }

        const result = await handle.result;

        if (options.json) {
          context.print(JSON.stringify(result.locations, null, 2));
        } else {
          context.print(
            `${result.status}: ${result.locations.length} location(s) from ${result.pluginName} ` +
            `(${result.recordsFetched} record(s), ${result.pagesFetched} page(s), ${result.dropped} dropped)`
          );
          if (project?.path && result.addedToProject !== undefined) {
            context.print(`Added ${result.addedToProject} location(s) to ${project.path}`);
          }
        }

        if (result.error) {
          context.printError(`Error: ${result.error.message}`);
          process.exitCode = 1;
        }
      });
    });
}

async function openProject({ projects }: Services, filePath: string): Promise<Project> {
  try {
    await fs.access(filePath);
  } catch (error) {
    if (!isNotFound(error)) throw error;
    const project = projects.create(path.basename(filePath, path.extname(filePath)));
    project.path = filePath;
    return project;
  }
  return projects.load(filePath);
}
