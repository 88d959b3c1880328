/**
 * Core location types
 * Plugins produce untyped records; everything downstream of the standardizer
 * works with StandardizedLocation only.
 */

/**
 * Untyped key/value output of a plugin call.
 * Field names and value types are not guaranteed.
 */
export type RawRecord = Record<string, unknown>;

/**
 * Opaque handle a plugin hands back to itself on a later fetch.
 * Has no meaning outside the plugin that produced it.
 */
export interface Target {
  pluginName: string;
  externalId: string;
  displayName: string;
  avatarRef?: string;
  /** Fields a stored project kept beside the target that nothing here reads */
  metadata?: Record<string, unknown>;
}

export interface StandardizedLocation {
  id: string;
  latitude: number;
  longitude: number;
  timestampUTC: string; // RFC 3339, second precision, always "Z"
  source: string;
  context: string;
  infowindowHTML: string;
  shortName: string;
  address?: string;
  metadata: Record<string, unknown>; // Unmapped input fields, passed through as-is
  /** Hidden by a filter when false; absent means shown */
  visible?: boolean;
}
