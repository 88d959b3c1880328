import { z } from 'zod';

/**
 * Shared zod schemas for persisted documents
 */

export const locationSchema = z.object({
  id: z.string(),
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  timestampUTC: z.string(),
  source: z.string(),
  context: z.string(),
  infowindowHTML: z.string(),
  shortName: z.string(),
  address: z.string().optional(),
  metadata: z.record(z.unknown()).default({}),
  visible: z.boolean().optional(),
});

export const targetSchema = z.object({
  pluginName: z.string(),
  externalId: z.string(),
  displayName: z.string(),
  avatarRef: z.string().optional(),
  metadata: z.record(z.unknown()).optional(),
});
