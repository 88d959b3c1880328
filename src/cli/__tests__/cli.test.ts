import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { createProgram, CliContext } from '../index';
import { loadConfig } from '../../config';
import { Services } from '../../services/container';
import { CacheManager } from '../../services/CacheManager';
import { FetchOrchestrator } from '../../services/FetchOrchestrator';
import { LocationAggregator } from '../../services/LocationAggregator';
import { PluginRegistry } from '../../services/PluginRegistry';
import { ProjectStore } from '../../services/ProjectStore';
import { FakePlugin, makeLocation, UNLIMITED } from '../../__tests__/fakes';

describe('CLI', () => {
  let dir: string;
  let services: Services;
  let output: string[];
  let errors: string[];
  let context: CliContext;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'geotrail-cli-'));
    const config = loadConfig({}, dir);

    const plugin = new FakePlugin('Fake', () => ({
      records: [{ id: 'nyc', lat: 40.7128, lon: -74.006, title: 'New York Event', date: '2025-01-01T12:00:00Z' }],
      nextCursor: null,
    }));
    plugin.targets = [{ pluginName: 'Fake', externalId: 'u1', displayName: 'alice' }];
    const offline = new FakePlugin('Offline');
    offline.status = { configured: false, reason: 'Missing token' };

    const registry = new PluginRegistry({
      configDir: config.pluginConfigDir,
      builtins: [
        { name: 'Fake', create: () => plugin },
        { name: 'Offline', create: () => offline },
      ],
    });
    await registry.discover();

    const orchestrator = new FetchOrchestrator({ defaultRateLimit: UNLIMITED });
    const cache = new CacheManager(config.cacheDir);
    const projects = new ProjectStore(config.projectsDir);
    const aggregator = new LocationAggregator({ registry, orchestrator, cache, projects });
    services = { config, registry, orchestrator, cache, projects, aggregator };

    output = [];
    errors = [];
    context = {
      services: async () => services,
      print: (text) => output.push(text),
      printError: (text) => errors.push(text),
    };
  });

  afterEach(async () => {
    process.exitCode = undefined;
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function run(...args: string[]): Promise<void> {
    const program = createProgram(context).exitOverride();
    await program.parseAsync(args, { from: 'user' });
  }

  describe('plugins', () => {
    it('should list plugins with their status', async () => {
      await run('plugins');

      expect(output).toEqual([
        `${'Fake'.padEnd(20)} ${'testing'.padEnd(18)} ready`,
        `${'Offline'.padEnd(20)} ${'testing'.padEnd(18)} not configured (Missing token)`,
      ]);
    });

    it('should print JSON', async () => {
      await run('plugins', '--json', '--failures');

      const parsed = JSON.parse(output.join('\n'));
      expect(parsed.plugins.map((entry: { name: string }) => entry.name)).toEqual(['Fake', 'Offline']);
      expect(parsed.failures).toEqual([]);
    });
  });

  describe('targets', () => {
    it('should print matching targets', async () => {
      await run('targets', 'Fake', 'ali');

      expect(output).toEqual(['u1\talice']);
    });

    it('should say when nothing matches', async () => {
      await run('targets', 'Fake', 'zed');

      expect(output).toEqual(['No targets found']);
    });

    it('should report an unknown plugin', async () => {
      await run('targets', 'Nope', 'x');

      expect(errors).toEqual(["Error: Unknown plugin 'Nope'"]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('collect', () => {
    it('should collect into a new project and report the summary', async () => {
      const projectPath = path.join(dir, 'case.json');

      await run('collect', 'Fake', 'u1', '--project', projectPath);

      expect(output).toEqual([
        'completed: 1 location(s) from Fake (1 record(s), 1 page(s), 0 dropped)',
        `Added 1 location(s) to ${projectPath}`,
      ]);
      expect(errors[errors.length - 1]).toBe('[100%] Completed with 1 records');

      output = [];
      await run('project', 'show', projectPath);

      expect(output).toContain('Name:      case');
      expect(output).toContain('Locations: 1 (1 visible)');
      expect(output).toContain('Dates:     2025-01-01T12:00:00Z .. 2025-01-01T12:00:00Z');
      expect(output).toContain('Plugins:   Fake');
    });

    it('should serve the second collection from the cache', async () => {
      await run('collect', 'Fake', 'u1');
      output = [];

      await run('collect', 'Fake', 'u1');

      expect(output).toEqual(['cached: 1 location(s) from Fake (0 record(s), 0 page(s), 0 dropped)']);
    });

    it('should reject a malformed --max-items', async () => {
      await run('collect', 'Fake', 'u1', '--max-items', 'abc');

      expect(errors).toEqual(["Error: --max-items must be a positive integer, got 'abc'"]);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('project', () => {
    it('should create and list projects', async () => {
      await run('project', 'create', 'Harbour', '--target', 'dock workers');

      expect(output).toEqual([
        `Created project 'Harbour' at ${path.join(services.config.projectsDir, 'Harbour.json')}`,
      ]);

      output = [];
      await run('project', 'list', '--json');

      const listed = JSON.parse(output.join('\n'));
      expect(listed).toHaveLength(1);
      expect(listed[0]).toMatchObject({ name: 'Harbour', locationCount: 0, format: 'modern' });
    });

    async function savedSurvey(): Promise<string> {
      const project = services.projects.create('Survey');
      services.projects.addLocations(project, [
        makeLocation('a'),
        makeLocation('b', { latitude: 40.713, timestampUTC: '2024-01-10T00:00:00Z' }),
        makeLocation('c', { latitude: 51.5074, longitude: -0.1278, timestampUTC: '2024-01-05T00:00:00Z' }),
      ]);
      return services.projects.save(project, path.join(dir, 'survey.json'));
    }

    it('should filter a project and keep the result', async () => {
      const projectPath = await savedSurvey();

      await run('project', 'filter', projectPath, '--to', '2024-01-06');
      expect(output).toEqual(['Showing 2 of 3 location(s)']);

      output = [];
      await run('project', 'filter', projectPath, '--near', '51.5074,-0.1278', '--radius', '10');
      expect(output).toEqual(['Showing 1 of 3 location(s)']);

      const reloaded = await services.projects.load(projectPath);
      expect(services.projects.visibleLocations(reloaded).map(location => location.id)).toEqual(['c']);

      output = [];
      await run('project', 'filter', projectPath, '--clear');
      expect(output).toEqual(['Showing 3 of 3 location(s)']);
    });

    it('should reject a malformed point', async () => {
      const projectPath = await savedSurvey();

      await run('project', 'filter', projectPath, '--near', 'north');

      expect(errors).toEqual(["Error: --near expects <lat,lon>, got 'north'"]);
      expect(process.exitCode).toBe(1);
    });

    it('should print clusters of nearby locations', async () => {
      const projectPath = await savedSurvey();

      await run('project', 'clusters', projectPath, '--json');

      const clusters = JSON.parse(output.join('\n'));
      expect(clusters.map((cluster: { locationIds: string[] }) => cluster.locationIds)).toEqual([['a', 'b'], ['c']]);

      output = [];
      await run('project', 'clusters', projectPath);
      expect(output[1]).toBe('   1  51.50740,-0.12780  r=0m  2024-01-05T00:00:00Z .. 2024-01-05T00:00:00Z');
    });

    it('should reject an unknown export format', async () => {
      await run('project', 'export', path.join(dir, 'case.json'), 'pdf', path.join(dir, 'out.pdf'));

      expect(errors).toEqual(["Error: Unsupported export format 'pdf', expected one of geojson, csv, kml, gpx"]);
    });
  });

  describe('cache', () => {
    it('should show statistics and clear entries', async () => {
      await run('collect', 'Fake', 'u1', '--json');
      output = [];

      await run('cache', 'stats');
      expect(output[0]).toBe('Entries:   1 (0 expired)');
      expect(output[1]).toBe('Locations: 1');

      output = [];
      await run('cache', 'clear');
      expect(output).toEqual(['Removed 1 cache entry']);
    });
  });
});
