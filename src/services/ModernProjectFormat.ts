import { z } from 'zod';
import { Project } from '../types/Project';
import { PersistenceError } from '../types/errors';
import { parseTimestamp } from '../utils/dateUtils';
import { readJsonFile, writeFileAtomic } from '../utils/fileUtils';
import { locationSchema, targetSchema } from '../utils/schemas';

/**
 * Modern project format: one JSON document per project (*.json)
 */

const modernDocumentSchema = z.object({
  name: z.string(),
  target: z.string().default(''),
  project_id: z.string().min(1),
  created_at: z.string(),
  modified_at: z.string(),
  locations: z.array(locationSchema).default([]),
  metadata: z.record(z.unknown()).default({}),
  notes: z.string().default(''),
  tags: z.array(z.string()).default([]),
  settings: z.record(z.unknown()).default({}),
  plugin_data: z.record(z.unknown()).default({}),
  selectedTargets: z.array(targetSchema).default([]),
  analysis: z.unknown(),
  enabled_plugins: z.array(z.string()).default([]),
});

export type ModernProjectDocument = z.input<typeof modernDocumentSchema>;

export function encodeModern(project: Project): ModernProjectDocument {
  return {
    name: project.name,
    target: project.target,
    project_id: project.id,
    created_at: project.createdAt.toISOString(),
    modified_at: project.modifiedAt.toISOString(),
    locations: project.locations,
    metadata: project.metadata,
    notes: project.notes,
    tags: project.tags,
    settings: project.settings,
    plugin_data: project.pluginData,
    selectedTargets: project.selectedTargets,
    analysis: project.analysis ?? null,
    enabled_plugins: project.activePlugins,
  };
}

export function decodeModern(raw: unknown, filePath: string): Project {
  const parsed = modernDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : 'document';
    throw new PersistenceError(filePath, 'modern', `Invalid project document at ${where}: ${issue.message}`);
  }

  const document = parsed.data;
  const createdAt = parseTimestamp(document.created_at);
  const modifiedAt = parseTimestamp(document.modified_at);
  if (!createdAt || !modifiedAt) {
    throw new PersistenceError(filePath, 'modern', 'Invalid project dates');
  }

  return {
    id: document.project_id,
    name: document.name,
    target: document.target,
    notes: document.notes,
    createdAt,
    modifiedAt,
    locations: document.locations,
    tags: document.tags,
    settings: document.settings,
    activePlugins: document.enabled_plugins,
    selectedTargets: document.selectedTargets,
    metadata: document.metadata,
    pluginData: document.plugin_data,
    analysis: document.analysis ?? null,
    path: filePath,
    format: 'modern',
  };
}

export async function readModern(filePath: string): Promise<Project> {
  let raw: unknown;
  try {
    raw = await readJsonFile(filePath);
  } catch (error) {
    throw new PersistenceError(filePath, 'modern', 'Failed to read project file', error);
  }
  if (raw === undefined) {
    throw new PersistenceError(filePath, 'modern', 'Project file not found');
  }
  return decodeModern(raw, filePath);
}

export async function writeModern(project: Project, filePath: string): Promise<void> {
  try {
    await writeFileAtomic(filePath, JSON.stringify(encodeModern(project), null, 2));
  } catch (error) {
    throw new PersistenceError(filePath, 'modern', 'Failed to write project file', error);
  }
}
