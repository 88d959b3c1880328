import { promises as fs } from 'fs';
import path from 'path';
import { pathToFileURL } from 'url';
import { z } from 'zod';
import {
  ConfigSection,
  ConfigurationStatus,
  DEFAULT_CATEGORY,
  isPlugin,
  Plugin,
  PluginConfiguration,
  PluginContext,
  PluginDescriptor,
} from '../types/Plugin';
import { describeError, DiscoveryError, UnknownPluginError } from '../types/errors';
import { ConfigStore } from './ConfigStore';
import { createLogger } from '../utils/logger';
import { isNotFound, readJsonFile } from '../utils/fileUtils';

/**
 * PluginRegistry - Discover, load and expose plugins
 *
 * Plugin directory convention:
 *   <root>/<name>.plugin.{ts,mts,js,mjs,cjs}      single-file plugin
 *   <root>/<name>/index.{ts,mts,js,mjs,cjs}       plugin in its own directory,
 *   <root>/<name>/plugin.json                     optional metadata
 *   <root>/<name>/labels.json                     optional option labels
 *   <root>/<name>/config.json                     optional configuration file
 *
 * A module provides its plugin through `default` or `createPlugin`: a plugin
 * object, a class constructed with the PluginContext, or a (possibly async)
 * factory called with it.
 */

const PLUGIN_EXTENSIONS = ['ts', 'mts', 'js', 'mjs', 'cjs'];
const SINGLE_FILE_PATTERN = new RegExp(`^(.+)\\.plugin\\.(${PLUGIN_EXTENSIONS.join('|')})$`);

const configOptionSchema = z.object({
  name: z.string(),
  type: z.enum(['string', 'boolean']),
  section: z.enum(['string_options', 'boolean_options']).optional(),
  label: z.string().optional(),
  description: z.string().optional(),
  default: z.union([z.string(), z.boolean()]).optional(),
  required: z.boolean().optional(),
});

const metadataSchema = z.object({
  name: z.string().min(1).optional(),
  category: z.string().min(1).optional(),
  version: z.string().optional(),
  author: z.string().optional(),
  description: z.string().optional(),
  configSchema: z.array(configOptionSchema).optional(),
});

const labelsSchema = z.record(z.string());

type PluginMetadata = z.infer<typeof metadataSchema>;

export type PluginFactory = (context: PluginContext) => Plugin | Promise<Plugin>;

export interface BuiltinPlugin {
  /** Name used for the configuration file before the plugin exists */
  name: string;
  create: PluginFactory;
}

export interface PluginRegistryOptions {
  /** Directory holding <pluginName>.json configuration files */
  configDir: string;
  builtins?: BuiltinPlugin[];
}

export interface PluginStatus extends ConfigurationStatus {
  descriptor: PluginDescriptor;
}

interface RegisteredPlugin {
  plugin: Plugin;
  descriptor: PluginDescriptor;
  config: ConfigStore;
}

interface Candidate {
  entryPath: string;
  stem: string;
  directory?: string;
}

interface LoadSource {
  origin: string;
  provisionalName: string;
  directory?: string;
  metadata: PluginMetadata;
  labels: Record<string, string>;
  configPath: string;
  resolveExport: () => Promise<unknown>;
}

export class PluginRegistry {
  private readonly configDir: string;
  private readonly builtins: BuiltinPlugin[];
  private readonly logger = createLogger({ component: 'PluginRegistry' });
  // Replaced wholesale on every discovery; readers never see a partial set
  private entries: ReadonlyMap<string, RegisteredPlugin> = new Map();
  private failureList: readonly DiscoveryError[] = [];
  private discovery: Promise<unknown> = Promise.resolve();

  constructor(options: PluginRegistryOptions) {
    this.configDir = options.configDir;
    this.builtins = options.builtins ?? [];
  }

  /**
   * Load built-ins and every plugin found under the given directories.
   * Returns the number of plugins now registered.
   */
  discover(paths: string[] = []): Promise<number> {
    const run = this.discovery.then(() => this.runDiscovery(paths));
    this.discovery = run.catch(() => undefined);
    return run;
  }

  private async runDiscovery(paths: string[]): Promise<number> {
    const next = new Map<string, RegisteredPlugin>();
    const failures: DiscoveryError[] = [];

    const sources: LoadSource[] = this.builtins.map(builtin => ({
      origin: 'builtin',
      provisionalName: builtin.name,
      metadata: {},
      labels: {},
      configPath: path.join(this.configDir, `${builtin.name}.json`),
      resolveExport: async () => builtin.create,
    }));

    for (const root of paths) {
      for (const candidate of await this.scanDirectory(root)) {
        sources.push(await this.describeCandidate(candidate, failures));
      }
    }

    for (const source of sources) {
      try {
        const entry = await this.load(source);
        const existing = next.get(entry.descriptor.name);
        if (existing) {
          throw new Error(`duplicate plugin name '${entry.descriptor.name}', already provided by ${existing.descriptor.source}`);
        }
        next.set(entry.descriptor.name, entry);
        this.logger.info(
          { plugin: entry.descriptor.name, version: entry.descriptor.version, category: entry.descriptor.category },
          'Loaded plugin'
        );
      } catch (error) {
        const failure = new DiscoveryError(source.origin, describeError(error));
        failures.push(failure);
        this.logger.error({ path: source.origin, error: failure.reason }, 'Plugin failed to load');
      }
    }

    const previous = this.entries;
    this.entries = next;
    this.failureList = failures;

    const current = new Set(Array.from(next.values(), entry => entry.plugin));
    for (const entry of previous.values()) {
      if (!current.has(entry.plugin)) {
        await this.deactivate(entry);
      }
    }

    this.logger.info({ loaded: next.size, failed: failures.length }, 'Plugin discovery complete');
    return next.size;
  }

  /**
   * Non-recursive scan of one root, plus one level into plugin directories
   */
  private async scanDirectory(root: string): Promise<Candidate[]> {
    let dirents;
    try {
      dirents = await fs.readdir(root, { withFileTypes: true });
    } catch (error) {
      this.logger.warn({ root, error: describeError(error) }, 'Plugin directory not readable, skipping');
      return [];
    }

    const candidates: Candidate[] = [];
    for (const dirent of dirents.sort((a, b) => a.name.localeCompare(b.name))) {
      const fullPath = path.join(root, dirent.name);

      if (dirent.isFile()) {
        const match = SINGLE_FILE_PATTERN.exec(dirent.name);
        if (match && !dirent.name.endsWith('.d.ts')) {
          candidates.push({ entryPath: fullPath, stem: match[1] });
        }
        continue;
      }

      if (dirent.isDirectory() && !dirent.name.startsWith('.') && dirent.name !== 'node_modules') {
        const entryPath = await this.findEntry(fullPath);
        if (entryPath) {
          candidates.push({ entryPath, stem: dirent.name, directory: fullPath });
        }
      }
    }
    return candidates;
  }

  private async findEntry(directory: string): Promise<string | undefined> {
    for (const extension of PLUGIN_EXTENSIONS) {
      const entryPath = path.join(directory, `index.${extension}`);
      try {
        const stat = await fs.stat(entryPath);
        if (stat.isFile()) return entryPath;
      } catch (error) {
        if (!isNotFound(error)) throw error;
      }
    }
    return undefined;
  }

  private async describeCandidate(candidate: Candidate, failures: DiscoveryError[]): Promise<LoadSource> {
    let metadata: PluginMetadata = {};
    let labels: Record<string, string> = {};
    let configPath = path.join(this.configDir, `${candidate.stem}.json`);

    if (candidate.directory) {
      metadata = await this.readOptionalJson(path.join(candidate.directory, 'plugin.json'), metadataSchema, {}, failures);
      labels = await this.readOptionalJson(path.join(candidate.directory, 'labels.json'), labelsSchema, {}, failures);
      const localConfig = path.join(candidate.directory, 'config.json');
      if (await this.exists(localConfig)) {
        configPath = localConfig;
      } else {
        configPath = path.join(this.configDir, `${metadata.name ?? candidate.stem}.json`);
      }
    }

    return {
      origin: candidate.entryPath,
      provisionalName: metadata.name ?? candidate.stem,
      directory: candidate.directory,
      metadata,
      labels,
      configPath,
      resolveExport: async () => {
        const module: Record<string, unknown> = await import(pathToFileURL(candidate.entryPath).href);
        return module.default ?? module.createPlugin;
      },
    };
  }

  private async load(source: LoadSource): Promise<RegisteredPlugin> {
    const defaults = this.defaultsFromSchema(source.metadata);
    const config = new ConfigStore(source.configPath, { labels: source.labels, defaults });
    const context: PluginContext = {
      config,
      directory: source.directory,
      metadata: source.metadata,
    };

    const exported = await source.resolveExport();
    if (exported === undefined) {
      throw new Error('module has no default or createPlugin export');
    }

    const instance = await instantiate(exported, context);
    if (!isPlugin(instance)) {
      throw new Error('export does not implement isConfigured, searchForTargets and returnLocations');
    }

    if (instance.activate) {
      await instance.activate();
    }

    const { metadata } = source;
    return {
      plugin: instance,
      config,
      descriptor: {
        name: instance.name,
        category: instance.category ?? metadata.category ?? DEFAULT_CATEGORY,
        version: instance.version ?? metadata.version ?? '0.0',
        author: instance.author ?? metadata.author ?? 'Unknown',
        description: instance.description ?? metadata.description ?? '',
        configSchema: instance.configSchema ?? metadata.configSchema ?? [],
        source: source.origin,
      },
    };
  }

  private defaultsFromSchema(metadata: PluginMetadata): Partial<PluginConfiguration> {
    const stringDefaults: Record<string, string> = {};
    const booleanDefaults: Record<string, boolean> = {};
    for (const option of metadata.configSchema ?? []) {
      if (option.default === undefined) continue;
      if (option.type === 'boolean') {
        booleanDefaults[option.name] = option.default === true || option.default === 'true';
      } else {
        stringDefaults[option.name] = String(option.default);
      }
    }
    return { string_options: stringDefaults, boolean_options: booleanDefaults };
  }

  private async readOptionalJson<T>(
    filePath: string,
    schema: z.ZodType<T>,
    fallback: T,
    failures: DiscoveryError[]
  ): Promise<T> {
    try {
      const raw = await readJsonFile(filePath);
      if (raw === undefined) return fallback;
      const parsed = schema.safeParse(raw);
      if (parsed.success) return parsed.data;
      failures.push(new DiscoveryError(filePath, 'invalid metadata file, ignored'));
    } catch (error) {
      failures.push(new DiscoveryError(filePath, `unreadable metadata file, ignored: ${describeError(error)}`));
    }
    this.logger.warn({ path: filePath }, 'Ignoring invalid plugin metadata file');
    return fallback;
  }

  private async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error) {
      if (isNotFound(error)) return false;
      throw error;
    }
  }

  private async deactivate(entry: RegisteredPlugin): Promise<void> {
    if (!entry.plugin.deactivate) return;
    try {
      await entry.plugin.deactivate();
    } catch (error) {
      this.logger.warn({ plugin: entry.descriptor.name, error: describeError(error) }, 'Plugin deactivate failed');
    }
  }

  // ---------------------------------------------------------------------------
  // Lookup
  // ---------------------------------------------------------------------------

  get(name: string): Plugin | undefined {
    return this.entry(name)?.plugin;
  }

  all(): Plugin[] {
    return Array.from(this.entries.values(), entry => entry.plugin);
  }

  byCategory(category: string): Plugin[] {
    return Array.from(this.entries.values())
      .filter(entry => entry.descriptor.category === category)
      .map(entry => entry.plugin);
  }

  categories(): Set<string> {
    return new Set(Array.from(this.entries.values(), entry => entry.descriptor.category));
  }

  descriptor(name: string): PluginDescriptor | undefined {
    return this.entry(name)?.descriptor;
  }

  descriptors(): PluginDescriptor[] {
    return Array.from(this.entries.values(), entry => entry.descriptor);
  }

  failures(): DiscoveryError[] {
    return [...this.failureList];
  }

  configStore(name: string): ConfigStore | undefined {
    return this.entry(name)?.config;
  }

  /**
   * Descriptor and configuration status of every plugin.
   * A throwing isConfigured counts as not configured.
   */
  async statuses(): Promise<PluginStatus[]> {
    const entries = Array.from(this.entries.values());
    return Promise.all(entries.map(async (entry) => {
      try {
        const status = await entry.plugin.isConfigured();
        return { descriptor: entry.descriptor, ...status };
      } catch (error) {
        return { descriptor: entry.descriptor, configured: false, reason: describeError(error) };
      }
    }));
  }

  /**
   * Write a configuration section and let the plugin pick it up
   */
  async updateConfiguration(name: string, section: string, values: ConfigSection): Promise<boolean> {
    const entry = this.entry(name);
    if (!entry) {
      throw new UnknownPluginError(name);
    }

    const saved = await entry.config.write(section, values);
    if (saved && entry.plugin.configure) {
      await entry.plugin.configure(await entry.config.readAll());
    }
    return saved;
  }

  /**
   * Deactivate every plugin and empty the registry
   */
  async shutdown(): Promise<void> {
    const previous = this.entries;
    this.entries = new Map();
    for (const entry of previous.values()) {
      await this.deactivate(entry);
    }
  }

  private entry(name: string): RegisteredPlugin | undefined {
    const exact = this.entries.get(name);
    if (exact) return exact;
    const lowered = name.toLowerCase();
    for (const [key, entry] of this.entries) {
      if (key.toLowerCase() === lowered) return entry;
    }
    return undefined;
  }
}

/**
 * Turn a module export into a plugin instance
 */
async function instantiate(exported: unknown, context: PluginContext): Promise<unknown> {
  if (typeof exported !== 'function') {
    return exported;
  }
  if (/^class[\s{]/.test(Function.prototype.toString.call(exported))) {
    return Reflect.construct(exported, [context]);
  }
  return await Reflect.apply(exported, undefined, [context]);
}
