import type { StandardizedLocation, Target } from './Location';

/**
 * On-disk encodings of a project
 * modern: single JSON document (*.json)
 * legacy: key-addressed store (*.db or no extension)
 */
export type ProjectFormat = 'modern' | 'legacy';

export type ExportFormat = 'geojson' | 'csv' | 'kml' | 'gpx';

export interface Project {
  id: string;
  name: string;
  target: string;
  notes: string;
  createdAt: Date;
  modifiedAt: Date;
  locations: StandardizedLocation[];
  tags: string[];
  settings: Record<string, unknown>;
  activePlugins: string[];
  selectedTargets: Target[];
  metadata: Record<string, unknown>;
  pluginData: Record<string, unknown>;
  analysis: unknown;
  path?: string;
  format?: ProjectFormat;
}

export interface ProjectSummary {
  name: string;
  path: string;
  format: ProjectFormat;
  modifiedAt: Date;
  locationCount: number;
}
