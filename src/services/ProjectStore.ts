import { promises as fs } from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { StandardizedLocation, Target } from '../types/Location';
import { ExportFormat, Project, ProjectFormat, ProjectSummary } from '../types/Project';
import { describeError, PersistenceError } from '../types/errors';
import { looksLikeLegacyStore, readLegacy, writeLegacy } from './LegacyProjectFormat';
import { readModern, writeModern } from './ModernProjectFormat';
import { exportProject } from './ProjectExporter';
import { isNotFound } from '../utils/fileUtils';
import { clusterLocations, hasInvalidCoordinates, haversineDistance, LocationCluster } from '../utils/geoUtils';
import { createLogger } from '../utils/logger';

/**
 * ProjectStore - Create, load, save and mutate projects
 *
 * The in-memory Project knows nothing about its encoding; the format is chosen
 * from the path in one place (formatFor) for both load and save.
 * Every mutation goes through this class and bumps modifiedAt.
 *
 * Filters never remove locations: they set visible=false on the ones they
 * hide and drop the flag from the ones they show.
 */

export interface DateRange {
  start: string;
  end: string;
}

function cloneLocation(location: StandardizedLocation): StandardizedLocation {
  return structuredClone(location);
}

export class ProjectStore {
  private readonly projectsDir?: string;
  private readonly logger = createLogger({ component: 'ProjectStore' });

  constructor(projectsDir?: string) {
    this.projectsDir = projectsDir;
  }

  create(name: string, target = ''): Project {
    const now = new Date();
    return {
      id: uuidv4(),
      name,
      target,
      notes: '',
      createdAt: now,
      modifiedAt: now,
      locations: [],
      tags: [],
      settings: {},
      activePlugins: [],
      selectedTargets: [],
      metadata: {},
      pluginData: {},
      analysis: null,
    };
  }

  /**
   * Default location of a project in the projects directory
   */
  defaultPath(project: Project, format: ProjectFormat = 'modern'): string {
    if (!this.projectsDir) {
      throw new PersistenceError(project.name, format, 'No path given and no projects directory configured');
    }
    const safeName = project.name.replace(/[^A-Za-z0-9._-]+/g, '_') || project.id;
    return path.join(this.projectsDir, format === 'modern' ? `${safeName}.json` : `${safeName}.db`);
  }

  /**
   * Format implied by the file name; unknown extensions are sniffed
   */
  async formatFor(filePath: string, sniff = false): Promise<ProjectFormat> {
    const extension = path.extname(filePath).toLowerCase();
    if (extension === '.json') return 'modern';
    if (extension === '.db' || extension === '') return 'legacy';
    if (sniff) {
      try {
        return (await looksLikeLegacyStore(filePath)) ? 'legacy' : 'modern';
      } catch (error) {
        throw new PersistenceError(filePath, 'modern', 'Failed to read project file', error);
      }
    }
    return 'modern';
  }

  async load(filePath: string): Promise<Project> {
    const format = await this.formatFor(filePath, true);
    const project = format === 'modern' ? await readModern(filePath) : await readLegacy(filePath);
    this.logger.info({ path: filePath, format, locations: project.locations.length }, 'Project loaded');
    return project;
  }

  /**
   * Save to filePath, or to the project's own path, or to the default path.
   * The format follows the destination's extension.
   */
  async save(project: Project, filePath?: string): Promise<string> {
    const destination = filePath ?? project.path ?? this.defaultPath(project);
    const format = await this.formatFor(destination);

    if (format === 'modern') {
      await writeModern(project, destination);
    } else {
      await writeLegacy(project, destination);
    }

    project.path = destination;
    project.format = format;
    this.logger.info({ path: destination, format, locations: project.locations.length }, 'Project saved');
    return destination;
  }

  /**
   * Append copies of locations whose id is not yet in the project.
   * Returns the number added.
   */
  addLocations(project: Project, locations: StandardizedLocation[]): number {
    const known = new Set(project.locations.map(location => location.id));
    let added = 0;
    for (const location of locations) {
      if (known.has(location.id)) continue;
      known.add(location.id);
      project.locations.push(cloneLocation(location));
      added += 1;
    }
    if (added > 0) {
      this.touch(project);
    }
    return added;
  }

  removeLocations(project: Project, ids: string[]): number {
    const remove = new Set(ids);
    const before = project.locations.length;
    project.locations = project.locations.filter(location => !remove.has(location.id));
    const removed = before - project.locations.length;
    if (removed > 0) {
      this.touch(project);
    }
    return removed;
  }

  rename(project: Project, name: string): void {
    project.name = name;
    this.touch(project);
  }

  setNotes(project: Project, notes: string): void {
    project.notes = notes;
    this.touch(project);
  }

  addTag(project: Project, tag: string): void {
    if (!project.tags.includes(tag)) {
      project.tags.push(tag);
      this.touch(project);
    }
  }

  removeTag(project: Project, tag: string): void {
    const index = project.tags.indexOf(tag);
    if (index !== -1) {
      project.tags.splice(index, 1);
      this.touch(project);
    }
  }

  setSettings(project: Project, settings: Record<string, unknown>): void {
    project.settings = { ...project.settings, ...structuredClone(settings) };
    this.touch(project);
  }

  addActivePlugin(project: Project, pluginName: string): void {
    if (!project.activePlugins.includes(pluginName)) {
      project.activePlugins.push(pluginName);
      this.touch(project);
    }
  }

  removeActivePlugin(project: Project, pluginName: string): void {
    const before = project.activePlugins.length;
    project.activePlugins = project.activePlugins.filter(name => name !== pluginName);
    if (project.activePlugins.length !== before) {
      this.touch(project);
    }
  }

  addSelectedTarget(project: Project, target: Target): void {
    const exists = project.selectedTargets.some(
      selected => selected.pluginName === target.pluginName && selected.externalId === target.externalId
    );
    if (!exists) {
      project.selectedTargets.push({ ...target });
      this.touch(project);
    }
  }

  visibleLocations(project: Project): StandardizedLocation[] {
    return project.locations.filter(location => location.visible !== false);
  }

  /**
   * Show locations timestamped within [from, to]; an open bound matches everything
   * on that side. Returns the number of visible locations.
   */
  filterByDate(project: Project, from?: Date, to?: Date): number {
    return this.applyFilter(project, location => {
      const time = Date.parse(location.timestampUTC);
      return (!from || time >= from.getTime()) && (!to || time <= to.getTime());
    });
  }

  /**
   * Show locations within radiusKm of a point. Locations without a real
   * position are hidden.
   */
  filterByPoint(project: Project, latitude: number, longitude: number, radiusKm: number): number {
    return this.applyFilter(
      project,
      location =>
        !hasInvalidCoordinates(location) &&
        haversineDistance(latitude, longitude, location.latitude, location.longitude) / 1000 <= radiusKm
    );
  }

  clearFilters(project: Project): number {
    return this.applyFilter(project, () => true);
  }

  /**
   * Earliest and latest location timestamps, or null for an empty project
   */
  dateRange(project: Project): DateRange | null {
    if (project.locations.length === 0) return null;
    const times = project.locations.map(location => location.timestampUTC).sort();
    return { start: times[0], end: times[times.length - 1] };
  }

  /**
   * Cluster the visible locations that have a real position
   */
  cluster(project: Project, thresholdMeters?: number): LocationCluster[] {
    const placed = this.visibleLocations(project).filter(location => !hasInvalidCoordinates(location));
    return clusterLocations(placed, thresholdMeters);
  }

  exportTo(project: Project, format: ExportFormat, filePath: string): Promise<number> {
    return exportProject(project, format, filePath);
  }

  /**
   * Load a project in one format and write it in the format of destination
   */
  async migrate(sourcePath: string, destinationPath: string): Promise<Project> {
    const project = await this.load(sourcePath);
    await this.save(project, destinationPath);
    this.logger.info({ from: sourcePath, to: destinationPath, format: project.format }, 'Project migrated');
    return project;
  }

  /**
   * Summaries of the projects in a directory, most recently modified first.
   * Files that fail to load are logged and left out.
   */
  async list(directory: string | undefined = this.projectsDir): Promise<ProjectSummary[]> {
    if (!directory) return [];

    let names: string[];
    try {
      names = await fs.readdir(directory);
    } catch (error) {
      if (isNotFound(error)) return [];
      throw new PersistenceError(directory, 'modern', 'Failed to list projects', error);
    }

    const summaries: ProjectSummary[] = [];
    for (const name of names) {
      if (name.startsWith('.')) continue;
      const extension = path.extname(name).toLowerCase();
      if (extension !== '.json' && extension !== '.db') continue;

      const filePath = path.join(directory, name);
      try {
        const project = await this.load(filePath);
        summaries.push({
          name: project.name,
          path: filePath,
          format: project.format ?? (await this.formatFor(filePath)),
          modifiedAt: project.modifiedAt,
          locationCount: project.locations.length,
        });
      } catch (error) {
        this.logger.warn({ path: filePath, error: describeError(error) }, 'Skipping unreadable project');
      }
    }

    return summaries.sort((a, b) => b.modifiedAt.getTime() - a.modifiedAt.getTime());
  }

  async delete(project: Project): Promise<boolean> {
    if (!project.path) return false;
    try {
      await fs.unlink(project.path);
    } catch (error) {
      if (isNotFound(error)) return false;
      throw new PersistenceError(project.path, project.format ?? 'modern', 'Failed to delete project', error);
    }
    this.logger.info({ path: project.path }, 'Project deleted');
    project.path = undefined;
    return true;
  }

  private applyFilter(project: Project, show: (location: StandardizedLocation) => boolean): number {
    let changed = false;
    let visible = 0;
    for (const location of project.locations) {
      const shown = show(location);
      if (shown !== (location.visible !== false)) {
        changed = true;
      }
      if (shown) {
        delete location.visible;
        visible += 1;
      } else {
        location.visible = false;
      }
    }
    if (changed) {
      this.touch(project);
    }
    return visible;
  }

  private touch(project: Project): void {
    const now = new Date();
    // Keep modifiedAt strictly increasing for rapid successive edits
    project.modifiedAt = now.getTime() > project.modifiedAt.getTime()
      ? now
      : new Date(project.modifiedAt.getTime() + 1);
  }
}
