import type { RawRecord } from './Location';
import type { ProjectFormat } from './Project';

/**
 * Error taxonomy
 * Recoverable conditions (a bad plugin, a missing cache entry, a failed page
 * after partial success) are handled where they happen. Only persistence
 * failures and failed/cancelled fetches reach external callers.
 */

/**
 * Missing or invalid plugin configuration
 */
export class ConfigurationError extends Error {
  readonly pluginName: string;

  constructor(pluginName: string, reason: string) {
    super(`Plugin '${pluginName}' is not configured: ${reason}`);
    this.name = 'ConfigurationError';
    this.pluginName = pluginName;
  }
}

/**
 * One plugin failed to load; recorded by the registry, never thrown out of it
 */
export class DiscoveryError extends Error {
  readonly path: string;
  readonly reason: string;

  constructor(path: string, reason: string) {
    super(`Failed to load plugin from ${path}: ${reason}`);
    this.name = 'DiscoveryError';
    this.path = path;
    this.reason = reason;
  }
}

/**
 * A page request failed mid-loop. Records fetched before the failure are kept.
 */
export class FetchError extends Error {
  readonly pluginName: string;
  readonly targetId: string;
  readonly partialRecords: RawRecord[];
  readonly pagesFetched: number;

  constructor(
    pluginName: string,
    targetId: string,
    partialRecords: RawRecord[],
    pagesFetched: number,
    cause: unknown
  ) {
    super(`Fetch from '${pluginName}' for target '${targetId}' failed after ${pagesFetched} page(s): ${describeError(cause)}`, { cause });
    this.name = 'FetchError';
    this.pluginName = pluginName;
    this.targetId = targetId;
    this.partialRecords = partialRecords;
    this.pagesFetched = pagesFetched;
  }
}

/**
 * Project load/save failure, identifies the path and the assumed format
 */
export class PersistenceError extends Error {
  readonly path: string;
  readonly format: ProjectFormat;

  constructor(path: string, format: ProjectFormat, message: string, cause?: unknown) {
    super(`${message} (${format} project at ${path})${cause === undefined ? '' : `: ${describeError(cause)}`}`, { cause });
    this.name = 'PersistenceError';
    this.path = path;
    this.format = format;
  }
}

export class UnknownPluginError extends Error {
  readonly pluginName: string;

  constructor(pluginName: string) {
    super(`Unknown plugin '${pluginName}'`);
    this.name = 'UnknownPluginError';
    this.pluginName = pluginName;
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
