import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import initSqlJs from 'sql.js';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { ProjectStore } from '../ProjectStore';
import { PersistenceError } from '../../types/errors';
import { Project } from '../../types/Project';
import { makeLocation } from '../../__tests__/fakes';

async function writeLegacyFixture(filePath: string, values: Record<string, unknown>): Promise<void> {
  const SQL = await initSqlJs();
  const db = new SQL.Database();
  db.run('CREATE TABLE shelf (key TEXT PRIMARY KEY, value TEXT NOT NULL)');
  for (const [key, value] of Object.entries(values)) {
    db.run('INSERT INTO shelf (key, value) VALUES (?, ?)', [key, JSON.stringify(value)]);
  }
  await fs.writeFile(filePath, db.export());
  db.close();
}

async function readShelf(filePath: string): Promise<Record<string, unknown>> {
  const SQL = await initSqlJs();
  const db = new SQL.Database(await fs.readFile(filePath));
  try {
    const [table] = db.exec('SELECT key, value FROM shelf');
    return Object.fromEntries(table.values.map(([key, value]): [string, unknown] => [String(key), JSON.parse(String(value))]));
  } finally {
    db.close();
  }
}

describe('ProjectStore', () => {
  let dir: string;
  let store: ProjectStore;

  function populated(): Project {
    const project = store.create('Harbour survey', 'Port activity');
    store.addLocations(project, [
      makeLocation('a', { address: '1 Quay Rd', metadata: { likes: 2 } }),
      makeLocation('b', { latitude: 51.5074, longitude: -0.1278, shortName: 'London' }),
    ]);
    store.addTag(project, 'maritime');
    store.setNotes(project, 'Check the night traffic');
    store.setSettings(project, { zoom: 4 });
    store.addActivePlugin(project, 'GeoIP');
    store.addSelectedTarget(project, { pluginName: 'GeoIP', externalId: '8.8.8.8', displayName: '8.8.8.8' });
    project.metadata = { owner: 'analyst' };
    project.pluginData = { GeoIP: { lastRun: '2024-01-02' } };
    project.analysis = { clusters: 1 };
    return project;
  }

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'geotrail-projects-'));
    store = new ProjectStore(dir);
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  describe('create', () => {
    it('should start empty', () => {
      const project = store.create('Empty');

      expect(project).toMatchObject({
        name: 'Empty',
        target: '',
        notes: '',
        locations: [],
        tags: [],
        activePlugins: [],
        selectedTargets: [],
        analysis: null,
      });
      expect(project.id).toMatch(/^[0-9a-f-]{36}$/);
      expect(project.modifiedAt.getTime()).toBe(project.createdAt.getTime());
    });
  });

  describe('modern format', () => {
    it('should load exactly what was saved', async () => {
      const project = populated();
      const filePath = path.join(dir, 'harbour.json');

      expect(await store.save(project, filePath)).toBe(filePath);
      const loaded = await store.load(filePath);

      expect(loaded).toEqual(project);
      expect(loaded.format).toBe('modern');
    });

    it('should write the documented field names', async () => {
      const project = populated();
      const filePath = path.join(dir, 'harbour.json');
      await store.save(project, filePath);

      const document: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
      expect(document).toMatchObject({
        name: 'Harbour survey',
        target: 'Port activity',
        project_id: project.id,
        created_at: project.createdAt.toISOString(),
        modified_at: project.modifiedAt.toISOString(),
        enabled_plugins: ['GeoIP'],
        plugin_data: { GeoIP: { lastRun: '2024-01-02' } },
        tags: ['maritime'],
      });
    });

    it('should save to the projects directory by default', async () => {
      const project = store.create('My project!');

      const saved = await store.save(project);

      expect(saved).toBe(path.join(dir, 'My_project_.json'));
      expect(project.path).toBe(saved);
    });

    it('should fail with a persistence error for a missing file', async () => {
      const filePath = path.join(dir, 'missing.json');

      await expect(store.load(filePath)).rejects.toThrow(
        new PersistenceError(filePath, 'modern', 'Project file not found')
      );
    });

    it('should name the offending field of an invalid document', async () => {
      const filePath = path.join(dir, 'bad.json');
      await fs.writeFile(filePath, JSON.stringify({ name: 'Bad', project_id: 'x', created_at: 'now' }));

      await expect(store.load(filePath)).rejects.toThrow(
        `Invalid project document at modified_at: Required (modern project at ${filePath})`
      );
    });
  });

  describe('legacy format', () => {
    it('should round-trip through the key-value store', async () => {
      const project = populated();
      const filePath = path.join(dir, 'harbour.db');

      await store.save(project, filePath);
      const loaded = await store.load(filePath);

      expect(loaded).toEqual(project);
      expect(loaded.format).toBe('legacy');
    });

    it('should read historical stores and migrate them to the modern format', async () => {
      const legacyPath = path.join(dir, 'old-case');
      await writeLegacyFixture(legacyPath, {
        projectName: 'Old case',
        projectKeywords: 'alpha, beta',
        projectDescription: 'Imported',
        dateCreated: '2019-05-01T10:00:00',
        dateEdited: '2019-05-02T11:30:00',
        enabledPlugins: ['Twitter'],
        selectedTargets: [{ pluginName: 'Twitter', targetId: '42', targetName: 'someone' }],
        locations: [
          {
            shortName: 'Cafe',
            latitude: '37.9838',
            longitude: '23.7275',
            datetime: '2019-04-30 09:15:00',
            context: 'Morning post',
            plugin: 'Twitter',
            infowindow: '<p>Cafe</p>',
            visible: true,
          },
          { shortName: 'Broken', latitude: 'n/a', longitude: 0 },
          { id: 'kept', latitude: -33.8688, longitude: 151.2093, plugin: 'Twitter' },
        ],
      });

      const legacy = await store.load(legacyPath);
      expect(legacy.name).toBe('Old case');
      expect(legacy.tags).toEqual(['alpha', 'beta']);
      expect(legacy.createdAt.toISOString()).toBe('2019-05-01T10:00:00.000Z');
      expect(legacy.selectedTargets).toEqual([{ pluginName: 'Twitter', externalId: '42', displayName: 'someone' }]);
      expect(legacy.locations).toHaveLength(3);
      expect(legacy.locations[0]).toMatchObject({
        latitude: 37.9838,
        longitude: 23.7275,
        timestampUTC: '2019-04-30T09:15:00Z',
        shortName: 'Cafe',
        source: 'Twitter',
      });
      expect(legacy.locations[0].visible).toBeUndefined();
      expect(legacy.locations[1]).toMatchObject({
        shortName: 'Broken',
        latitude: 0,
        longitude: 0,
        metadata: { invalidCoordinates: { latitude: 'n/a', longitude: 0 } },
      });
      expect(legacy.locations[2]).toMatchObject({
        id: 'kept',
        shortName: 'Unnamed Location',
        timestampUTC: '2019-05-01T10:00:00Z',
      });

      const modernPath = path.join(dir, 'old-case.json');
      const migrated = await store.migrate(legacyPath, modernPath);
      expect(migrated.format).toBe('modern');

      const reloaded = await store.load(modernPath);
      expect(reloaded.locations.map(location => [location.latitude, location.longitude])).toEqual(
        legacy.locations.map(location => [location.latitude, location.longitude])
      );
      expect(reloaded.id).toBe(legacy.id);
    });

    it('should keep plugin options, unknown fields and visibility across a save', async () => {
      const legacyPath = path.join(dir, 'wizard-case');
      await writeLegacyFixture(legacyPath, {
        projectName: 'Wizard case',
        dateCreated: '2020-01-01T00:00:00Z',
        enabledPlugins: [
          { pluginName: 'Flickr', searchOptions: { radius: 5, tags: 'harbour' } },
          { pluginName: 'GeoIP', searchOptions: {} },
          'Mastodon',
        ],
        selectedTargets: [{ pluginName: 'Flickr', targetId: 'u1', targetName: 'photog', selected: false }],
        locations: [
          {
            id: 'p1',
            shortName: 'Pier',
            latitude: 40.7,
            longitude: -74.0,
            datetime: '2020-01-02T08:00:00Z',
            plugin: 'Flickr',
            visible: false,
            accuracy: 12,
            altitude: 3.5,
            confidence: 0.9,
            target_id: 'u1',
            attributes: { camera: 'X100' },
            metadata: { views: 7 },
          },
        ],
      });

      const loaded = await store.load(legacyPath);
      expect(loaded.activePlugins).toEqual(['Flickr', 'GeoIP', 'Mastodon']);
      expect(loaded.pluginData).toEqual({ Flickr: { searchOptions: { radius: 5, tags: 'harbour' } } });
      expect(loaded.selectedTargets).toEqual([
        { pluginName: 'Flickr', externalId: 'u1', displayName: 'photog', metadata: { selected: false } },
      ]);
      expect(loaded.locations[0].visible).toBe(false);
      expect(loaded.locations[0].metadata).toEqual({
        accuracy: 12,
        altitude: 3.5,
        confidence: 0.9,
        target_id: 'u1',
        attributes: { camera: 'X100' },
        views: 7,
      });

      const copyPath = path.join(dir, 'wizard-copy.db');
      await store.save(loaded, copyPath);

      const shelf = await readShelf(copyPath);
      expect(shelf.enabledPlugins).toEqual([
        { pluginName: 'Flickr', searchOptions: { radius: 5, tags: 'harbour' } },
        { pluginName: 'GeoIP', searchOptions: {} },
        { pluginName: 'Mastodon', searchOptions: {} },
      ]);
      expect(shelf.selectedTargets).toEqual([
        { selected: false, pluginName: 'Flickr', targetId: 'u1', targetName: 'photog' },
      ]);
      expect(shelf.locations).toEqual([expect.objectContaining({ id: 'p1', visible: false })]);

      // save() points the project at its new file
      expect(loaded.path).toBe(copyPath);
      expect(await store.load(copyPath)).toEqual(loaded);
    });

    it('should write every location as visible unless a filter hid it', async () => {
      const project = store.create('Visibility');
      store.addLocations(project, [makeLocation('a'), makeLocation('b', { visible: false })]);
      const filePath = path.join(dir, 'visibility.db');

      await store.save(project, filePath);

      const shelf = await readShelf(filePath);
      expect(shelf.locations).toEqual([
        expect.objectContaining({ id: 'a', visible: true }),
        expect.objectContaining({ id: 'b', visible: false }),
      ]);
      expect(await store.load(filePath)).toEqual(project);
    });

    it('should fall back to the file name when the store has no name', async () => {
      const filePath = path.join(dir, 'nameless.db');
      await writeLegacyFixture(filePath, { locations: [] });

      expect((await store.load(filePath)).name).toBe('nameless');
    });

    it('should sniff stores saved under an unknown extension', async () => {
      const project = populated();
      await store.save(project, path.join(dir, 'copy.db'));
      await fs.copyFile(path.join(dir, 'copy.db'), path.join(dir, 'copy.dat'));

      const loaded = await store.load(path.join(dir, 'copy.dat'));
      expect(loaded.format).toBe('legacy');
      expect(loaded.locations).toHaveLength(2);
    });

    it('should report a missing store as a persistence error', async () => {
      await expect(store.load(path.join(dir, 'missing.db'))).rejects.toBeInstanceOf(PersistenceError);
    });
  });

  describe('mutations', () => {
    it('should add only unseen locations, as copies', () => {
      const project = store.create('P');
      const original = makeLocation('a', { metadata: { note: 'x' } });

      expect(store.addLocations(project, [original, makeLocation('b')])).toBe(2);
      expect(store.addLocations(project, [makeLocation('a'), makeLocation('c')])).toBe(1);
      original.metadata.note = 'changed';

      expect(project.locations.map(location => location.id)).toEqual(['a', 'b', 'c']);
      expect(project.locations[0].metadata).toEqual({ note: 'x' });
    });

    it('should remove locations by id', () => {
      const project = store.create('P');
      store.addLocations(project, [makeLocation('a'), makeLocation('b')]);

      expect(store.removeLocations(project, ['a', 'zzz'])).toBe(1);
      expect(project.locations.map(location => location.id)).toEqual(['b']);
    });

    it('should keep modifiedAt strictly increasing', () => {
      const project = store.create('P');
      const stamps: number[] = [project.modifiedAt.getTime()];
      for (const name of ['A', 'B', 'C']) {
        store.rename(project, name);
        stamps.push(project.modifiedAt.getTime());
      }

      for (let index = 1; index < stamps.length; index += 1) {
        expect(stamps[index]).toBeGreaterThan(stamps[index - 1]);
      }
    });

    it('should ignore duplicate tags, plugins and targets', () => {
      const project = store.create('P');
      const target = { pluginName: 'GeoIP', externalId: '1.1.1.1', displayName: '1.1.1.1' };

      store.addTag(project, 'x');
      store.addTag(project, 'x');
      store.addActivePlugin(project, 'GeoIP');
      store.addActivePlugin(project, 'GeoIP');
      store.addSelectedTarget(project, target);
      store.addSelectedTarget(project, { ...target, displayName: 'renamed' });

      expect(project.tags).toEqual(['x']);
      expect(project.activePlugins).toEqual(['GeoIP']);
      expect(project.selectedTargets).toEqual([target]);

      store.removeTag(project, 'x');
      store.removeActivePlugin(project, 'GeoIP');
      expect(project.tags).toEqual([]);
      expect(project.activePlugins).toEqual([]);
    });
  });

  describe('filters', () => {
    function tracked(): Project {
      const project = store.create('Tracked');
      store.addLocations(project, [
        makeLocation('a'),
        makeLocation('b', { latitude: 51.5074, longitude: -0.1278, timestampUTC: '2024-01-05T00:00:00Z' }),
        makeLocation('c', { latitude: 40.713, timestampUTC: '2024-01-10T00:00:00Z' }),
        makeLocation('d', {
          latitude: 0,
          longitude: 0,
          timestampUTC: '2024-01-03T00:00:00Z',
          metadata: { invalidCoordinates: { latitude: null, longitude: null } },
        }),
      ]);
      return project;
    }

    const visibleIds = (project: Project) => store.visibleLocations(project).map(location => location.id);

    it('should show only locations inside the date range', () => {
      const project = tracked();

      expect(store.filterByDate(project, new Date('2024-01-03T00:00:00Z'), new Date('2024-01-06T00:00:00Z'))).toBe(2);
      expect(visibleIds(project)).toEqual(['b', 'd']);
      expect(project.locations.map(location => location.visible)).toEqual([false, undefined, false, undefined]);

      expect(store.filterByDate(project, undefined, new Date('2024-01-04T00:00:00Z'))).toBe(2);
      expect(visibleIds(project)).toEqual(['a', 'd']);
    });

    it('should show only placed locations within the radius', () => {
      const project = tracked();

      expect(store.filterByPoint(project, 40.7128, -74.006, 1)).toBe(2);
      expect(visibleIds(project)).toEqual(['a', 'c']);

      expect(store.filterByPoint(project, 40.7128, -74.006, 6000)).toBe(3);
      expect(visibleIds(project)).toEqual(['a', 'b', 'c']);
    });

    it('should clear every filter', () => {
      const project = tracked();
      store.filterByPoint(project, 0, 0, 1);

      expect(store.clearFilters(project)).toBe(4);
      expect(project.locations.every(location => location.visible === undefined)).toBe(true);
    });

    it('should bump modifiedAt only when visibility changes', () => {
      const project = tracked();
      const before = project.modifiedAt.getTime();

      store.clearFilters(project);
      expect(project.modifiedAt.getTime()).toBe(before);

      store.filterByDate(project, new Date('2024-01-04T00:00:00Z'));
      expect(project.modifiedAt.getTime()).toBeGreaterThan(before);
    });

    it('should report the date range of all locations', () => {
      expect(store.dateRange(tracked())).toEqual({ start: '2024-01-02T00:00:00Z', end: '2024-01-10T00:00:00Z' });
      expect(store.dateRange(store.create('Empty'))).toBeNull();
    });

    it('should cluster the visible placed locations', () => {
      const project = tracked();

      expect(store.cluster(project).map(cluster => cluster.locations.map(location => location.id))).toEqual([
        ['a', 'c'],
        ['b'],
      ]);

      store.filterByDate(project, new Date('2024-01-09T00:00:00Z'));
      expect(store.cluster(project).map(cluster => cluster.count)).toEqual([1]);
    });

    it('should keep hidden locations hidden across a save', async () => {
      const project = tracked();
      store.filterByPoint(project, 51.5074, -0.1278, 10);
      const filePath = path.join(dir, 'tracked.json');

      await store.save(project, filePath);

      expect(visibleIds(await store.load(filePath))).toEqual(['b']);
    });
  });

  describe('list and delete', () => {
    it('should list readable projects, most recent first', async () => {
      const older = store.create('Older');
      await store.save(older, path.join(dir, 'older.json'));
      const newer = store.create('Newer');
      store.addLocations(newer, [makeLocation('a')]);
      await store.save(newer, path.join(dir, 'newer.db'));
      await fs.writeFile(path.join(dir, 'corrupt.json'), '{');
      await fs.writeFile(path.join(dir, 'notes.txt'), 'ignored');

      const summaries = await store.list();

      expect(summaries.map(summary => [summary.name, summary.format, summary.locationCount])).toEqual([
        ['Newer', 'legacy', 1],
        ['Older', 'modern', 0],
      ]);
    });

    it('should return nothing for a missing directory', async () => {
      expect(await store.list(path.join(dir, 'nope'))).toEqual([]);
    });

    it('should delete the project file', async () => {
      const project = store.create('Doomed');
      await store.save(project, path.join(dir, 'doomed.json'));

      expect(await store.delete(project)).toBe(true);
      expect(project.path).toBeUndefined();
      expect(await fs.readdir(dir)).toEqual([]);
    });
  });

  describe('export', () => {
    it('should write the export beside the project', async () => {
      const project = populated();
      const output = path.join(dir, 'out.csv');

      expect(await store.exportTo(project, 'csv', output)).toBe(2);
      expect((await fs.readFile(output, 'utf-8')).split('\n')[0]).toBe('id,latitude,longitude,timestamp,source,context,address');
    });
  });
});
