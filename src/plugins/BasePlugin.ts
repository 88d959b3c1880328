import {
  ConfigOption,
  ConfigSection,
  ConfigurationStatus,
  LocationPage,
  PageRequest,
  Plugin,
  PluginConfiguration,
  PluginContext,
  RateLimitSettings,
  ReturnLocationsParams,
} from '../types/Plugin';
import { RawRecord, Target } from '../types/Location';
import { createLogger, Logger } from '../utils/logger';

export interface BasePluginOptions {
  name: string;
  category?: string;
  version?: string;
  author?: string;
  description?: string;
  configSchema?: ConfigOption[];
  rateLimit?: RateLimitSettings;
  /** Page size used when returnLocations drains fetchPage */
  defaultPageSize?: number;
}

/**
 * Optional base class for plugins
 *
 * Supplies configuration access through the plugin's ConfigStore, a child
 * logger, an isConfigured check driven by the config schema, and
 * returnLocations built on top of fetchPage. The registry accepts any object
 * satisfying the Plugin interface; extending this class is a convenience.
 */
export abstract class BasePlugin implements Plugin {
  readonly name: string;
  readonly category?: string;
  readonly version?: string;
  readonly author?: string;
  readonly description?: string;
  readonly configSchema: ConfigOption[];
  readonly rateLimit?: RateLimitSettings;
  protected readonly context: PluginContext;
  protected readonly logger: Logger;
  private readonly defaultPageSize: number;

  constructor(options: BasePluginOptions, context: PluginContext) {
    this.name = options.name;
    this.category = options.category;
    this.version = options.version;
    this.author = options.author;
    this.description = options.description;
    this.configSchema = options.configSchema ?? [];
    this.rateLimit = options.rateLimit;
    this.defaultPageSize = options.defaultPageSize ?? 50;
    this.context = context;
    this.logger = createLogger({ component: 'Plugin', plugin: options.name });
  }

  abstract searchForTargets(query: string): Promise<Target[]>;

  abstract fetchPage(target: Target, request: PageRequest): Promise<LocationPage>;

  /**
   * Fetch every page for a target (up to params.maxItems when given)
   */
  async returnLocations(target: Target, params: ReturnLocationsParams = {}): Promise<RawRecord[]> {
    const pageSize = params.pageSize ?? this.defaultPageSize;
    const records: RawRecord[] = [];
    let cursor: string | number | undefined;

    for (;;) {
      const page = await this.fetchPage(target, { cursor, pageSize, offset: records.length });
      if (page.records.length === 0) break;
      records.push(...page.records);

      if (page.nextCursor === undefined || page.nextCursor === null || page.nextCursor === cursor) break;
      if (params.maxItems !== undefined && records.length >= params.maxItems) break;
      cursor = page.nextCursor;
    }

    return records;
  }

  /**
   * Configured when every required schema option has a non-empty value
   */
  async isConfigured(): Promise<ConfigurationStatus> {
    const configuration = await this.getConfiguration();
    const missing = this.configSchema
      .filter(option => option.required)
      .filter(option => {
        const value = option.type === 'boolean'
          ? configuration.boolean_options[option.name]
          : configuration.string_options[option.name];
        return value === undefined || value === '';
      })
      .map(option => this.context.config.labelFor(option.name));

    if (missing.length > 0) {
      return { configured: false, reason: `Missing required option(s): ${missing.join(', ')}` };
    }
    return { configured: true, reason: `${this.name} is configured` };
  }

  /**
   * Stored configuration with schema defaults filled in
   */
  async getConfiguration(): Promise<PluginConfiguration> {
    const stored = await this.context.config.readAll();
    const configuration: PluginConfiguration = {
      ...stored,
      string_options: { ...stored.string_options },
      boolean_options: { ...stored.boolean_options },
    };

    for (const option of this.configSchema) {
      if (option.default === undefined) continue;
      if (option.type === 'boolean') {
        configuration.boolean_options[option.name] ??= option.default === true || option.default === 'true';
      } else {
        configuration.string_options[option.name] ??= String(option.default);
      }
    }
    return configuration;
  }

  async saveConfiguration(section: string, values: ConfigSection): Promise<boolean> {
    return this.context.config.write(section, values);
  }

  protected async getStringOption(name: string): Promise<string | undefined> {
    const configuration = await this.getConfiguration();
    const value = configuration.string_options[name];
    return value === undefined || value === '' ? undefined : value;
  }

  protected async getBooleanOption(name: string): Promise<boolean> {
    const configuration = await this.getConfiguration();
    return configuration.boolean_options[name] ?? false;
  }

  protected makeTarget(externalId: string, displayName: string, avatarRef?: string): Target {
    return { pluginName: this.name, externalId, displayName, avatarRef };
  }
}
