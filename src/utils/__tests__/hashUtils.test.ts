import { describe, it, expect } from 'vitest';
import { generateCacheKey, runKey } from '../hashUtils';

describe('hashUtils', () => {
  describe('generateCacheKey', () => {
    it('should generate consistent key for the same pair', () => {
      const key1 = generateCacheKey('Mastodon', '109999');
      const key2 = generateCacheKey('Mastodon', '109999');

      expect(key1).toBe(key2);
      expect(key1).toMatch(/^[0-9a-f]{64}$/); // SHA-256 produces 64 hex characters
    });

    it('should generate different keys for different targets', () => {
      expect(generateCacheKey('Mastodon', 'a')).not.toBe(generateCacheKey('Mastodon', 'b'));
    });

    it('should generate different keys for different plugins', () => {
      expect(generateCacheKey('GeoIP', 'a')).not.toBe(generateCacheKey('Mastodon', 'a'));
    });

    it('should keep shifted boundaries apart', () => {
      expect(generateCacheKey('ab', 'c')).not.toBe(generateCacheKey('a', 'bc'));
    });
  });

  describe('runKey', () => {
    it('should join plugin and target with a separator that cannot collide', () => {
      expect(runKey('ab', 'c')).not.toBe(runKey('a', 'bc'));
      expect(runKey('GeoIP', '8.8.8.8')).toBe('GeoIP\u00008.8.8.8');
    });
  });
});
