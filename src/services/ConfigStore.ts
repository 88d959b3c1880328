import { z } from 'zod';
import { ConfigSection, ConfigValue, PluginConfiguration } from '../types/Plugin';
import { createLogger, Logger } from '../utils/logger';
import { readJsonFile, writeFileAtomic } from '../utils/fileUtils';

/**
 * Per-plugin key/value configuration backed by one JSON file
 *
 * {
 *   "string_options": { "instance_url": "https://mastodon.social" },
 *   "boolean_options": { "include_reblogs": false }
 * }
 *
 * Sections other than string_options/boolean_options pass through untouched,
 * and so do top-level keys that are not sections and nested values inside a
 * section: reads skip them, writes keep them.
 */

const fileSchema = z.record(z.unknown());
const sectionSchema = z.record(z.unknown());
const valueSchema = z.union([z.string(), z.boolean(), z.number()]);

interface LoadedFile {
  /** Everything in the file, as parsed */
  raw: Record<string, unknown>;
  /** Object-valued top-level keys, reduced to their scalar entries */
  sections: Record<string, ConfigSection>;
}

export interface ConfigReadResult {
  ok: boolean;
  values: ConfigSection;
}

export interface ConfigStoreOptions {
  /** Display labels for option keys, usually from the plugin's labels.json */
  labels?: Record<string, string>;
  /** Defaults applied on read when the file lacks a key */
  defaults?: Partial<PluginConfiguration>;
}

const TRUTHY = new Set(['true', '1', 'yes', 'on']);

export class ConfigStore {
  private readonly filePath: string;
  private readonly labels: Record<string, string>;
  private readonly defaults: Partial<PluginConfiguration>;
  private readonly logger: Logger;
  // Serializes read-merge-write sequences on this file
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(filePath: string, options: ConfigStoreOptions = {}) {
    this.filePath = filePath;
    this.labels = options.labels ?? {};
    this.defaults = options.defaults ?? {};
    this.logger = createLogger({ component: 'ConfigStore', file: filePath });
  }

  getFilePath(): string {
    return this.filePath;
  }

  /**
   * Read one section. A missing file, missing section or unreadable file
   * yields ok=false and an empty map.
   */
  async read(section: string): Promise<ConfigReadResult> {
    const stored = await this.loadFile();
    const values = stored?.sections[section];
    if (!values) {
      return { ok: false, values: {} };
    }

    return {
      ok: true,
      values: this.normalizeSection(section, { ...(this.defaults[section] ?? {}), ...values }),
    };
  }

  /**
   * Read the whole configuration, always including the two standard sections
   */
  async readAll(): Promise<PluginConfiguration> {
    const stored = (await this.loadFile())?.sections ?? {};
    const sectionNames = new Set([
      'string_options',
      'boolean_options',
      ...Object.keys(this.defaults),
      ...Object.keys(stored),
    ]);

    const configuration: PluginConfiguration = { string_options: {}, boolean_options: {} };
    for (const name of sectionNames) {
      const merged = this.normalizeSection(name, {
        ...(this.defaults[name] ?? {}),
        ...(stored[name] ?? {}),
      });
      if (name === 'string_options') {
        configuration.string_options = toStringSection(merged);
      } else if (name === 'boolean_options') {
        configuration.boolean_options = toBooleanSection(merged);
      } else {
        configuration[name] = merged;
      }
    }
    return configuration;
  }

  /**
   * Merge values into a section. Keys not mentioned keep their stored value.
   */
  async write(section: string, values: ConfigSection): Promise<boolean> {
    const task = this.writeQueue.then(async () => {
      const raw = (await this.loadFile())?.raw ?? {};
      const current = sectionSchema.safeParse(raw[section]);
      const next: Record<string, unknown> = {
        ...raw,
        [section]: { ...(current.success ? current.data : {}), ...values },
      };
      await writeFileAtomic(this.filePath, `${JSON.stringify(next, null, 2)}\n`);
    });
    this.writeQueue = task.catch(() => undefined);

    try {
      await task;
      this.logger.debug({ section, keys: Object.keys(values) }, 'Configuration saved');
      return true;
    } catch (error) {
      this.logger.error({ section, error }, 'Failed to save configuration');
      return false;
    }
  }

  /**
   * Human-readable label for a configuration key
   */
  labelFor(key: string): string {
    const label = this.labels[key];
    if (label) {
      return label;
    }
    const spaced = key.replace(/_/g, ' ');
    return spaced.charAt(0).toUpperCase() + spaced.slice(1).toLowerCase();
  }

  private async loadFile(): Promise<LoadedFile | undefined> {
    let contents: unknown;
    try {
      contents = await readJsonFile(this.filePath);
    } catch (error) {
      this.logger.warn({ error }, 'Configuration file unreadable, treating as empty');
      return undefined;
    }
    if (contents === undefined) {
      return undefined;
    }

    const parsed = fileSchema.safeParse(contents);
    if (!parsed.success) {
      this.logger.warn({ issues: parsed.error.issues.length }, 'Configuration file is not an object, treating as empty');
      return undefined;
    }

    const sections: Record<string, ConfigSection> = {};
    for (const [name, value] of Object.entries(parsed.data)) {
      const section = sectionSchema.safeParse(value);
      if (!section.success) {
        continue;
      }
      const entries: [string, ConfigValue][] = [];
      for (const [key, entry] of Object.entries(section.data)) {
        const scalar = valueSchema.safeParse(entry);
        if (scalar.success) {
          entries.push([key, typeof scalar.data === 'number' ? String(scalar.data) : scalar.data]);
        }
      }
      sections[name] = Object.fromEntries(entries);
    }
    return { raw: parsed.data, sections };
  }

  private normalizeSection(section: string, values: ConfigSection): ConfigSection {
    if (section === 'boolean_options') {
      return toBooleanSection(values);
    }
    return values;
  }
}

function toBooleanValue(value: ConfigValue): boolean {
  if (typeof value === 'boolean') {
    return value;
  }
  return TRUTHY.has(value.trim().toLowerCase());
}

function toBooleanSection(values: ConfigSection): Record<string, boolean> {
  return Object.fromEntries(Object.entries(values).map(([key, value]): [string, boolean] => [key, toBooleanValue(value)]));
}

function toStringSection(values: ConfigSection): Record<string, string> {
  return Object.fromEntries(Object.entries(values).map(([key, value]): [string, string] => [key, String(value)]));
}
