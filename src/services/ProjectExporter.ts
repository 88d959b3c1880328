import type { Feature, FeatureCollection, Point } from 'geojson';
import { StandardizedLocation } from '../types/Location';
import { ExportFormat, Project } from '../types/Project';
import { PersistenceError } from '../types/errors';
import { writeFileAtomic } from '../utils/fileUtils';
import { hasInvalidCoordinates } from '../utils/geoUtils';

/**
 * Export a project's locations to interchange formats
 * Locations without valid coordinates are skipped, never fatal.
 */

export const EXPORT_FORMATS: readonly ExportFormat[] = ['geojson', 'csv', 'kml', 'gpx'];

export const CSV_COLUMNS = ['id', 'latitude', 'longitude', 'timestamp', 'source', 'context', 'address'] as const;

export interface RenderedExport {
  content: string;
  count: number;
}

export function isExportFormat(value: string): value is ExportFormat {
  return EXPORT_FORMATS.some(format => format === value);
}

function hasValidCoordinates(location: StandardizedLocation): boolean {
  const { latitude, longitude } = location;
  return (
    !hasInvalidCoordinates(location) &&
    typeof latitude === 'number' &&
    typeof longitude === 'number' &&
    Number.isFinite(latitude) &&
    Number.isFinite(longitude) &&
    latitude >= -90 &&
    latitude <= 90 &&
    longitude >= -180 &&
    longitude <= 180
  );
}

function escapeXml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

function csvField(value: string | number): string {
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

function renderGeoJson(project: Project, locations: StandardizedLocation[]): string {
  const features: Feature<Point>[] = locations.map(location => ({
    type: 'Feature',
    geometry: {
      type: 'Point',
      coordinates: [location.longitude, location.latitude],
    },
    properties: {
      id: location.id,
      name: location.shortName,
      timestamp: location.timestampUTC,
      source: location.source,
      context: location.context,
      address: location.address ?? null,
    },
  }));

  const collection: FeatureCollection<Point> & { name: string } = {
    type: 'FeatureCollection',
    name: project.name,
    features,
  };
  return JSON.stringify(collection, null, 2);
}

function renderCsv(locations: StandardizedLocation[]): string {
  const rows = locations.map(location => [
    location.id,
    location.latitude,
    location.longitude,
    location.timestampUTC,
    location.source,
    location.context,
    location.address ?? '',
  ].map(csvField).join(','));
  return [CSV_COLUMNS.join(','), ...rows].join('\n') + '\n';
}

function renderKml(project: Project, locations: StandardizedLocation[]): string {
  const placemarks = locations.map(location => [
    '    <Placemark>',
    `      <name>${escapeXml(location.shortName)}</name>`,
    `      <description>${escapeXml(location.context)}</description>`,
    `      <TimeStamp><when>${location.timestampUTC}</when></TimeStamp>`,
    `      <Point><coordinates>${location.longitude},${location.latitude},0</coordinates></Point>`,
    '    </Placemark>',
  ].join('\n'));

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<kml xmlns="http://www.opengis.net/kml/2.2">',
    '  <Document>',
    `    <name>${escapeXml(project.name)}</name>`,
    ...placemarks,
    '  </Document>',
    '</kml>',
    '',
  ].join('\n');
}

function renderGpx(project: Project, locations: StandardizedLocation[]): string {
  const waypoints = locations.map(location => [
    `  <wpt lat="${location.latitude}" lon="${location.longitude}">`,
    `    <time>${location.timestampUTC}</time>`,
    `    <name>${escapeXml(location.shortName)}</name>`,
    `    <desc>${escapeXml(location.context)}</desc>`,
    `    <src>${escapeXml(location.source)}</src>`,
    '  </wpt>',
  ].join('\n'));

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<gpx version="1.1" creator="geotrail" xmlns="http://www.topografix.com/GPX/1/1">',
    `  <metadata><name>${escapeXml(project.name)}</name></metadata>`,
    ...waypoints,
    '</gpx>',
    '',
  ].join('\n');
}

/**
 * Render without touching the file system
 */
export function renderExport(project: Project, format: ExportFormat): RenderedExport {
  const locations = project.locations.filter(hasValidCoordinates);

  switch (format) {
    case 'geojson':
      return { content: renderGeoJson(project, locations), count: locations.length };
    case 'csv':
      return { content: renderCsv(locations), count: locations.length };
    case 'kml':
      return { content: renderKml(project, locations), count: locations.length };
    case 'gpx':
      return { content: renderGpx(project, locations), count: locations.length };
  }
}

/**
 * Write the export to filePath; returns the number of exported locations
 */
export async function exportProject(project: Project, format: ExportFormat, filePath: string): Promise<number> {
  const { content, count } = renderExport(project, format);
  try {
    await writeFileAtomic(filePath, content);
  } catch (error) {
    throw new PersistenceError(filePath, project.format ?? 'modern', `Failed to write ${format} export`, error);
  }
  return count;
}
