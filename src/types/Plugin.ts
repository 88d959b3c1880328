import type { RawRecord, Target } from './Location';

/**
 * Plugin capability contract
 * Any object providing the required methods is a plugin; the optional ones
 * are detected at call time.
 */

export type ConfigValue = string | boolean;

export type ConfigSection = Record<string, ConfigValue>;

/**
 * Whole configuration of one plugin, partitioned into named sections.
 * string_options and boolean_options always exist; other sections pass through.
 */
export interface PluginConfiguration {
  string_options: Record<string, string>;
  boolean_options: Record<string, boolean>;
  [section: string]: ConfigSection;
}

export interface ConfigOption {
  name: string;
  type: 'string' | 'boolean';
  section?: 'string_options' | 'boolean_options';
  label?: string;
  description?: string;
  default?: ConfigValue;
  required?: boolean;
}

export interface ConfigurationStatus {
  configured: boolean;
  reason: string;
}

export interface RateLimitSettings {
  maxCalls: number;
  windowSeconds: number;
}

export interface PageRequest {
  /** Opaque cursor returned by the previous page, absent on the first call */
  cursor?: string | number;
  pageSize: number;
  /** Number of records accumulated so far */
  offset: number;
}

export interface LocationPage {
  records: RawRecord[];
  /** Absent or null when there is nothing more to fetch */
  nextCursor?: string | number | null;
  /** Total number of records, when the provider reports it */
  total?: number;
}

export interface ReturnLocationsParams {
  maxItems?: number;
  pageSize?: number;
  [key: string]: unknown;
}

export interface Plugin {
  readonly name: string;
  readonly category?: string;
  readonly version?: string;
  readonly author?: string;
  readonly description?: string;
  readonly configSchema?: ConfigOption[];
  /** Provider-wide quota; runs of this plugin share one limiter when set */
  readonly rateLimit?: RateLimitSettings;

  isConfigured(): ConfigurationStatus | Promise<ConfigurationStatus>;
  searchForTargets(query: string): Promise<Target[]>;
  returnLocations(target: Target, params?: ReturnLocationsParams): Promise<RawRecord[]>;

  /** Paginated retrieval; plugins without it are fetched as a single page */
  fetchPage?(target: Target, request: PageRequest): Promise<LocationPage>;
  activate?(): void | Promise<void>;
  deactivate?(): void | Promise<void>;
  /** Called after the plugin's configuration has been written */
  configure?(configuration: PluginConfiguration): void | Promise<void>;
}

export interface PluginDescriptor {
  name: string;
  category: string;
  version: string;
  author: string;
  description: string;
  configSchema: ConfigOption[];
  /** 'builtin' or the file the plugin was loaded from */
  source: string;
}

export const DEFAULT_CATEGORY = 'uncategorized';

/**
 * Configuration access handed to a plugin; implemented by ConfigStore
 */
export interface PluginConfigAccess {
  read(section: string): Promise<{ ok: boolean; values: ConfigSection }>;
  readAll(): Promise<PluginConfiguration>;
  write(section: string, values: ConfigSection): Promise<boolean>;
  labelFor(key: string): string;
}

/**
 * What the registry passes to a plugin constructor or factory
 */
export interface PluginContext {
  config: PluginConfigAccess;
  /** Directory the plugin was loaded from, absent for built-ins */
  directory?: string;
  /** Metadata from an accompanying plugin.json */
  metadata: Partial<Omit<PluginDescriptor, 'source'>>;
}

/**
 * Narrow an unknown value to the plugin contract
 */
export function isPlugin(value: unknown): value is Plugin {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  return (
    'name' in value &&
    typeof value.name === 'string' &&
    value.name.length > 0 &&
    'isConfigured' in value &&
    typeof value.isConfigured === 'function' &&
    'searchForTargets' in value &&
    typeof value.searchForTargets === 'function' &&
    'returnLocations' in value &&
    typeof value.returnLocations === 'function'
  );
}
