import crypto from 'crypto';

/**
 * Stable, filesystem-safe key for a (plugin, target) pair.
 * JSON encoding keeps ("a", "bc") and ("ab", "c") apart.
 */
export function generateCacheKey(pluginName: string, targetKey: string): string {
  const hashContent = JSON.stringify([pluginName, targetKey]);
  return crypto.createHash('sha256').update(hashContent).digest('hex');
}

/**
 * Key identifying a (plugin, target) pair in memory, for run bookkeeping
 */
export function runKey(pluginName: string, targetId: string): string {
  return `${pluginName}\u0000${targetId}`;
}
