import type { Command } from 'commander';
import { CliContext, runCommand } from '../context';
import { EXPORT_FORMATS, isExportFormat } from '../../services/ProjectExporter';
import { parseTimestamp } from '../../utils/dateUtils';

interface CreateOptions {
  readonly path?: string;
  readonly target?: string;
  readonly legacy?: boolean;
}

interface ListOptions {
  readonly json?: boolean;
}

interface FilterOptions {
  readonly from?: string;
  readonly to?: string;
  readonly near?: string;
  readonly radius: string;
  readonly clear?: boolean;
}

interface ClusterOptions {
  readonly distance: string;
  readonly json?: boolean;
}

/**
 * Project management commands
 *
 * Usage:
 *   geotrail project create <name> [--path <file>] [--target <text>] [--legacy]
 *   geotrail project show <path>
 *   geotrail project migrate <source> <destination>
 *   geotrail project export <path> <format> <output>
 *   geotrail project list [directory] [--json]
 *   geotrail project filter <path> [--from <date>] [--to <date>] [--near <lat,lon> --radius <km>] [--clear]
 *   geotrail project clusters <path> [--distance <meters>] [--json]
 */
export function registerProjectCommands(program: Command, context: CliContext): void {
  const project = program
    .command('project')
    .description('Create, inspect, migrate and export projects');

  registerCreateCommand(project, context);
  registerShowCommand(project, context);
  registerMigrateCommand(project, context);
  registerExportCommand(project, context);
  registerListCommand(project, context);
  registerFilterCommand(project, context);
  registerClustersCommand(project, context);
}

function parseDateOption(name: string, value: string | undefined): Date | undefined {
  if (value === undefined) return undefined;
  const parsed = parseTimestamp(value);
  if (!parsed) {
    throw new Error(`Invalid --${name} date '${value}'`);
  }
  return parsed;
}

function parsePositive(name: string, value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new Error(`--${name} must be a positive number, got '${value}'`);
  }
  return parsed;
}

function parsePoint(value: string): { latitude: number; longitude: number } {
  const parts = value.split(',').map(part => Number(part.trim()));
  const [latitude, longitude] = parts;
  if (parts.length !== 2 || !Number.isFinite(latitude) || !Number.isFinite(longitude) ||
      Math.abs(latitude) > 90 || Math.abs(longitude) > 180) {
    throw new Error(`--near expects <lat,lon>, got '${value}'`);
  }
  return { latitude, longitude };
}

function registerCreateCommand(parent: Command, context: CliContext): void {
  parent
    .command('create')
    .description('Create an empty project')
    .argument('<name>', 'Project name')
    .option('--path <file>', 'Where to save it (defaults to the projects directory)')
    .option('--target <text>', 'Free-text description of the investigation target')
    .option('--legacy', 'Use the legacy key-value store format')
    .action(async (name: string, options: CreateOptions) => {
      await runCommand(context, async ({ projects }) => {
        const created = projects.create(name, options.target);
        const destination = options.path ?? projects.defaultPath(created, options.legacy ? 'legacy' : 'modern');
        const saved = await projects.save(created, destination);
        context.print(`Created project '${created.name}' at ${saved}`);
      });
    });
}

function registerShowCommand(parent: Command, context: CliContext): void {
  parent
    .command('show')
    .description('Print a project summary')
    .argument('<path>', 'Project file')
    .action(async (filePath: string) => {
      await runCommand(context, async ({ projects }) => {
        const loaded = await projects.load(filePath);
        context.print(`Name:      ${loaded.name}`);
        context.print(`Format:    ${loaded.format ?? 'modern'}`);
        context.print(`Target:    ${loaded.target || '-'}`);
        context.print(`Locations: ${loaded.locations.length} (${projects.visibleLocations(loaded).length} visible)`);
        const range = projects.dateRange(loaded);
        context.print(`Dates:     ${range ? `${range.start} .. ${range.end}` : '-'}`);
        context.print(`Plugins:   ${loaded.activePlugins.join(', ') || '-'}`);
        context.print(`Tags:      ${loaded.tags.join(', ') || '-'}`);
        context.print(`Modified:  ${loaded.modifiedAt.toISOString()}`);
      });
    });
}

function registerMigrateCommand(parent: Command, context: CliContext): void {
  parent
    .command('migrate')
    .description('Convert a project between formats (chosen by file extension)')
    .argument('<source>', 'Existing project file')
    .argument('<destination>', 'New project file (.json or .db)')
    .action(async (source: string, destination: string) => {
      await runCommand(context, async ({ projects }) => {
        const migrated = await projects.migrate(source, destination);
        context.print(`Migrated ${migrated.locations.length} location(s) to ${destination} (${migrated.format ?? 'modern'})`);
      });
    });
}

function registerExportCommand(parent: Command, context: CliContext): void {
  parent
    .command('export')
    .description(`Export project locations (${EXPORT_FORMATS.join(', ')})`)
    .argument('<path>', 'Project file')
    .argument('<format>', 'Export format')
    .argument('<output>', 'Output file')
    .action(async (filePath: string, format: string, output: string) => {
      await runCommand(context, async ({ projects }) => {
        const normalized = format.toLowerCase();
        if (!isExportFormat(normalized)) {
          throw new Error(`Unsupported export format '${format}', expected one of ${EXPORT_FORMATS.join(', ')}`);
        }
        const loaded = await projects.load(filePath);
        const count = await projects.exportTo(loaded, normalized, output);
        context.print(`Exported ${count} location(s) to ${output}`);
      });
    });
}

function registerListCommand(parent: Command, context: CliContext): void {
  parent
    .command('list')
    .description('List projects in a directory (defaults to the projects directory)')
    .argument('[directory]', 'Directory to scan')
    .option('--json', 'Output as JSON')
    .action(async (directory: string | undefined, options: ListOptions) => {
      await runCommand(context, async ({ projects }) => {
        const summaries = await projects.list(directory);
        if (options.json) {
          context.print(JSON.stringify(summaries, null, 2));
          return;
        }
        if (summaries.length === 0) {
          context.print('No projects found');
          return;
        }
        for (const summary of summaries) {
          context.print(
            `${summary.name.padEnd(24)} ${String(summary.locationCount).padStart(6)}  ` +
            `${summary.modifiedAt.toISOString()}  ${summary.path}`
          );
        }
      });
    });
}

function registerFilterCommand(parent: Command, context: CliContext): void {
  parent
    .command('filter')
    .description('Hide locations outside a date range or away from a point, and save the project')
    .argument('<path>', 'Project file')
    .option('--from <date>', 'Earliest timestamp to show')
    .option('--to <date>', 'Latest timestamp to show')
    .option('--near <lat,lon>', 'Show only locations around this point')
    .option('--radius <km>', 'Radius for --near, in kilometers', '1')
    .option('--clear', 'Show every location again')
    .action(async (filePath: string, options: FilterOptions) => {
      await runCommand(context, async ({ projects }) => {
        if (options.near && (options.from || options.to)) {
          throw new Error('Filter by a date range or by a point, not both');
        }
        const loaded = await projects.load(filePath);

        let visible: number;
        if (options.clear) {
          visible = projects.clearFilters(loaded);
        } else if (options.near) {
          const { latitude, longitude } = parsePoint(options.near);
          visible = projects.filterByPoint(loaded, latitude, longitude, parsePositive('radius', options.radius));
        } else {
          visible = projects.filterByDate(loaded, parseDateOption('from', options.from), parseDateOption('to', options.to));
        }

        await projects.save(loaded);
        context.print(`Showing ${visible} of ${loaded.locations.length} location(s)`);
      });
    });
}

function registerClustersCommand(parent: Command, context: CliContext): void {
  parent
    .command('clusters')
    .description('Group visible locations that lie close together')
    .argument('<path>', 'Project file')
    .option('--distance <meters>', 'Largest distance from a cluster seed', '100')
    .option('--json', 'Output as JSON')
    .action(async (filePath: string, options: ClusterOptions) => {
      await runCommand(context, async ({ projects }) => {
        const loaded = await projects.load(filePath);
        const clusters = projects.cluster(loaded, parsePositive('distance', options.distance));

        if (options.json) {
          const summaries = clusters.map(({ locations, ...cluster }) => ({
            ...cluster,
            locationIds: locations.map(location => location.id),
          }));
          context.print(JSON.stringify(summaries, null, 2));
          return;
        }
        if (clusters.length === 0) {
          context.print('No visible locations');
          return;
        }
        for (const cluster of clusters) {
          const { latitude, longitude } = cluster.center;
          context.print(
            `${String(cluster.count).padStart(4)}  ${latitude.toFixed(5)},${longitude.toFixed(5)}  ` +
            `r=${Math.round(cluster.radius)}m  ${cluster.startTime ?? '-'} .. ${cluster.endTime ?? '-'}`
          );
        }
      });
    });
}
