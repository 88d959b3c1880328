import type { BuiltinPlugin } from '../services/PluginRegistry';
import { GeoIPPlugin } from './GeoIPPlugin';
import { LocationHistoryPlugin } from './LocationHistoryPlugin';
import { MastodonPlugin } from './MastodonPlugin';

export { BasePlugin } from './BasePlugin';
export type { BasePluginOptions } from './BasePlugin';

/**
 * Plugins shipped with the application, registered before directory discovery
 */
export const builtinPlugins: BuiltinPlugin[] = [
  { name: 'GeoIP', create: (context) => new GeoIPPlugin(context) },
  { name: 'Mastodon', create: (context) => new MastodonPlugin(context) },
  { name: 'LocationHistory', create: (context) => new LocationHistoryPlugin(context) },
];
