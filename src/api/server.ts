import express, { Request, Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import { CacheManager } from '../services/CacheManager';
import { CollectionResult, LocationAggregator } from '../services/LocationAggregator';
import { FetchProgress } from '../services/FetchOrchestrator';
import { PluginRegistry } from '../services/PluginRegistry';
import { ProjectStore } from '../services/ProjectStore';
import { Project } from '../types/Project';
import { parseTimestamp } from '../utils/dateUtils';
import {
  ConfigurationError,
  describeError,
  PersistenceError,
  UnknownPluginError,
} from '../types/errors';
import { logger } from '../utils/logger';

export interface ServerDeps {
  registry: PluginRegistry;
  aggregator: LocationAggregator;
  cache: CacheManager;
  projects: ProjectStore;
}

const collectionRequestSchema = z.object({
  plugin: z.string().min(1),
  target: z.union([
    z.string().min(1),
    z.object({
      externalId: z.string().min(1),
      displayName: z.string().optional(),
      avatarRef: z.string().optional(),
    }),
  ]),
  maxItems: z.number().int().positive().optional(),
  pageSize: z.number().int().positive().optional(),
  useCache: z.boolean().optional(),
  projectPath: z.string().min(1).optional(),
});

const configSectionSchema = z.record(z.union([z.string(), z.boolean()]));

const timestampSchema = z.string().transform((value, ctx) => {
  const parsed = parseTimestamp(value);
  if (!parsed) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp '${value}'` });
    return z.NEVER;
  }
  return parsed;
});

const filterRequestSchema = z
  .object({
    projectPath: z.string().min(1),
    from: timestampSchema.optional(),
    to: timestampSchema.optional(),
    near: z
      .object({
        latitude: z.number().min(-90).max(90),
        longitude: z.number().min(-180).max(180),
        radiusKm: z.number().positive(),
      })
      .optional(),
    clear: z.boolean().optional(),
  })
  .refine(body => !(body.near && (body.from || body.to)), {
    message: 'Filter by a date range or by a point, not both',
  });

const clusterRequestSchema = z.object({
  projectPath: z.string().min(1),
  distance: z.number().positive().optional(),
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map(issue => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
}

/**
 * Map known errors onto HTTP status codes
 */
function sendError(res: Response, error: unknown, fallback: string): void {
  if (error instanceof UnknownPluginError) {
    res.status(404).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof ConfigurationError) {
    res.status(409).json({ success: false, error: error.message });
    return;
  }
  if (error instanceof PersistenceError) {
    logger.error({ path: error.path, format: error.format, error: error.message }, fallback);
    res.status(500).json({ success: false, error: error.message });
    return;
  }
  logger.error({ error: describeError(error) }, fallback);
  res.status(500).json({ success: false, error: fallback });
}

function serializeResult(result: CollectionResult) {
  return {
    ...result,
    error: result.error ? result.error.message : undefined,
  };
}

function writeEvent(res: Response, data: Record<string, unknown>): void {
  res.write(`data: ${JSON.stringify(data)}\n\n`);
}

export function createServer(deps: ServerDeps) {
  const { registry, aggregator, cache, projects } = deps;
  const app = express();

  // Middleware
  app.use(cors());
  app.use(express.json());

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      plugins: registry.all().length,
      timestamp: new Date().toISOString(),
    });
  });

  // ---------------------------------------------------------------------------
  // Plugins
  // ---------------------------------------------------------------------------

  app.get('/api/plugins', async (_req: Request, res: Response) => {
    try {
      const statuses = await registry.statuses();
      res.json({
        success: true,
        count: statuses.length,
        plugins: statuses.map(({ descriptor, configured, reason }) => ({ ...descriptor, configured, reason })),
      });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve plugins');
    }
  });

  app.get('/api/plugins/categories', (_req: Request, res: Response) => {
    const categories = Array.from(registry.categories()).sort();
    res.json({
      success: true,
      categories: categories.map(category => ({
        name: category,
        plugins: registry.byCategory(category).map(plugin => plugin.name),
      })),
    });
  });

  app.get('/api/plugins/failures', (_req: Request, res: Response) => {
    res.json({
      success: true,
      failures: registry.failures().map(failure => ({ path: failure.path, reason: failure.reason })),
    });
  });

  app.get('/api/plugins/:name/config', async (req: Request, res: Response) => {
    try {
      const store = registry.configStore(req.params.name);
      const descriptor = registry.descriptor(req.params.name);
      if (!store || !descriptor) {
        throw new UnknownPluginError(req.params.name);
      }
      const configuration = await store.readAll();
      const labels = Object.fromEntries(
        descriptor.configSchema.map((option): [string, string] => [option.name, option.label ?? store.labelFor(option.name)])
      );
      res.json({
        success: true,
        plugin: descriptor.name,
        schema: descriptor.configSchema,
        labels,
        configuration,
      });
    } catch (error) {
      sendError(res, error, 'Failed to read plugin configuration');
    }
  });

  app.put('/api/plugins/:name/config/:section', async (req: Request, res: Response) => {
    const parsed = configSectionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: 'Body must be an object of string or boolean values',
      });
      return;
    }

    try {
      const saved = await registry.updateConfiguration(req.params.name, req.params.section, parsed.data);
      if (!saved) {
        res.status(500).json({ success: false, error: 'Failed to save configuration' });
        return;
      }
      const plugin = registry.get(req.params.name);
      const status = plugin ? await plugin.isConfigured() : undefined;
      res.json({ success: true, ...status });
    } catch (error) {
      sendError(res, error, 'Failed to update plugin configuration');
    }
  });

  app.get('/api/plugins/:name/targets', async (req: Request, res: Response) => {
    const query = typeof req.query.q === 'string' ? req.query.q : '';
    try {
      const targets = await aggregator.searchTargets(req.params.name, query);
      res.json({ success: true, count: targets.length, targets });
    } catch (error) {
      sendError(res, error, 'Failed to search targets');
    }
  });

  // ---------------------------------------------------------------------------
  // Collections
  // ---------------------------------------------------------------------------

  app.post('/api/collections', async (req: Request, res: Response) => {
    const parsed = collectionRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: describeIssues(parsed.error) });
      return;
    }

    const body = parsed.data;
    const target = typeof body.target === 'string'
      ? { pluginName: body.plugin, externalId: body.target, displayName: body.target }
      : {
          pluginName: body.plugin,
          externalId: body.target.externalId,
          displayName: body.target.displayName ?? body.target.externalId,
          avatarRef: body.target.avatarRef,
        };

    try {
      let project: Project | undefined;
      if (body.projectPath) {
        project = await projects.load(body.projectPath);
      }

      const handle = await aggregator.start(body.plugin, target, {
        maxItems: body.maxItems,
        pageSize: body.pageSize,
        useCache: body.useCache,
        project,
      });

      res.status(202).json({
        success: true,
        collectionId: handle.id,
        cached: handle.run === undefined,
      });
    } catch (error) {
      sendError(res, error, 'Failed to start collection');
    }
  });

  app.get('/api/collections/:id', (req: Request, res: Response) => {
    const state = aggregator.getCollection(req.params.id);
    if (!state) {
      res.status(404).json({ success: false, error: `Unknown collection '${req.params.id}'` });
      return;
    }
    res.json({
      success: true,
      ...state,
      result: state.result ? serializeResult(state.result) : undefined,
    });
  });

  app.post('/api/collections/:id/stop', (req: Request, res: Response) => {
    const stopped = aggregator.stopCollection(req.params.id);
    if (!stopped) {
      res.status(404).json({ success: false, error: 'No running collection with that id' });
      return;
    }
    res.json({ success: true, message: 'Stop requested' });
  });

  // Server-Sent Events: progress of one collection, closed when it ends
  app.get('/api/collections/:id/stream', (req: Request, res: Response) => {
    const handle = aggregator.getHandle(req.params.id);
    if (!handle) {
      res.status(404).json({ success: false, error: `Unknown collection '${req.params.id}'` });
      return;
    }

    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no');

    writeEvent(res, {
      type: 'connected',
      collectionId: handle.id,
      progress: handle.run?.progress ?? null,
      timestamp: new Date().toISOString(),
    });

    const onProgress = (progress: FetchProgress) => {
      writeEvent(res, { type: 'progress', ...progress });
    };
    handle.run?.on('progress', onProgress);

    const heartbeat = setInterval(() => {
      writeEvent(res, { type: 'heartbeat', timestamp: new Date().toISOString() });
    }, 30000);

    const cleanup = () => {
      clearInterval(heartbeat);
      handle.run?.off('progress', onProgress);
    };

    void handle.result.then(
      (result) => {
        writeEvent(res, { type: 'done', ...serializeResult(result) });
        cleanup();
        res.end();
      },
      (error: unknown) => {
        writeEvent(res, { type: 'error', error: describeError(error) });
        cleanup();
        res.end();
      }
    );

    req.on('close', cleanup);
  });

  // ---------------------------------------------------------------------------
  // Projects
  // ---------------------------------------------------------------------------

  // Applies one filter (or clears them) and saves the project in place
  app.post('/api/projects/filter', async (req: Request, res: Response) => {
    const parsed = filterRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: describeIssues(parsed.error) });
      return;
    }

    const body = parsed.data;
    try {
      const project = await projects.load(body.projectPath);
      let visible: number;
      if (body.clear) {
        visible = projects.clearFilters(project);
      } else if (body.near) {
        visible = projects.filterByPoint(project, body.near.latitude, body.near.longitude, body.near.radiusKm);
      } else {
        visible = projects.filterByDate(project, body.from, body.to);
      }
      await projects.save(project);

      res.json({
        success: true,
        visible,
        total: project.locations.length,
        dateRange: projects.dateRange(project),
      });
    } catch (error) {
      sendError(res, error, 'Failed to filter project');
    }
  });

  app.post('/api/projects/clusters', async (req: Request, res: Response) => {
    const parsed = clusterRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ success: false, error: describeIssues(parsed.error) });
      return;
    }

    try {
      const project = await projects.load(parsed.data.projectPath);
      const clusters = projects.cluster(project, parsed.data.distance);
      res.json({
        success: true,
        count: clusters.length,
        clusters: clusters.map(({ locations, ...cluster }) => ({
          ...cluster,
          locationIds: locations.map(location => location.id),
        })),
      });
    } catch (error) {
      sendError(res, error, 'Failed to cluster project locations');
    }
  });

  // ---------------------------------------------------------------------------
  // Cache
  // ---------------------------------------------------------------------------

  app.get('/api/cache/stats', async (_req: Request, res: Response) => {
    try {
      const stats = await cache.stats();
      res.json({ success: true, ...stats });
    } catch (error) {
      sendError(res, error, 'Failed to retrieve cache statistics');
    }
  });

  app.post('/api/cache/clear', async (req: Request, res: Response) => {
    const expiredOnly = req.query.expired === 'true';
    try {
      const removed = await cache.clear(expiredOnly);
      res.json({ success: true, removed, message: 'Cache cleared successfully' });
    } catch (error) {
      sendError(res, error, 'Failed to clear cache');
    }
  });

  return app;
}
