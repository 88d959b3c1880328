import { describe, it, expect, vi, beforeEach } from 'vitest';
import NodeGeocoder from 'node-geocoder';
import { GeoParser } from '../GeoParser';

const { mockGeocode, mockPlaces, mockTopics } = vi.hoisted(() => ({
  mockGeocode: vi.fn(),
  mockPlaces: vi.fn(),
  mockTopics: vi.fn(),
}));

// Mock node-geocoder
vi.mock('node-geocoder', () => ({
  default: vi.fn(() => ({ geocode: mockGeocode })),
}));

// Mock compromise (NLP)
vi.mock('compromise', () => ({
  default: vi.fn(() => ({
    places: () => ({ out: mockPlaces }),
    topics: () => ({ out: mockTopics }),
  })),
}));

const PARIS = {
  latitude: 48.8566,
  longitude: 2.3522,
  city: 'Paris',
  country: 'France',
  formattedAddress: 'Paris, France',
};

describe('GeoParser', () => {
  let parser: GeoParser;

  beforeEach(() => {
    vi.clearAllMocks();
    mockPlaces.mockReturnValue([]);
    mockTopics.mockReturnValue([]);
    mockGeocode.mockResolvedValue([]);

    parser = new GeoParser({ rateLimitDelay: 0 }); // Disable rate limiting for tests
  });

  describe('constructor', () => {
    it('should default to OpenStreetMap', () => {
      expect(vi.mocked(NodeGeocoder)).toHaveBeenCalledWith({ provider: 'openstreetmap' });
    });

    it('should use a keyed provider when an API key is given', () => {
      new GeoParser({ provider: 'mapbox', apiKey: 'test-key', rateLimitDelay: 0 });

      expect(vi.mocked(NodeGeocoder)).toHaveBeenLastCalledWith({ provider: 'mapbox', apiKey: 'test-key' });
    });

    it('should fall back to OpenStreetMap when a keyed provider has no key', () => {
      new GeoParser({ provider: 'google', rateLimitDelay: 0 });

      expect(vi.mocked(NodeGeocoder)).toHaveBeenLastCalledWith({ provider: 'openstreetmap' });
    });
  });

  describe('parseLocations', () => {
    it('should return empty array for empty text', async () => {
      expect(await parser.parseLocations('   ')).toEqual([]);
      expect(mockGeocode).not.toHaveBeenCalled();
    });

    it('should geocode extracted places', async () => {
      mockPlaces.mockReturnValue(['Paris']);
      mockGeocode.mockResolvedValue([PARIS]);

      const result = await parser.parseLocations('Arrived in Paris this morning');

      expect(result).toHaveLength(1);
      expect(result[0]).toMatchObject({
        text: 'Paris',
        latitude: 48.8566,
        longitude: 2.3522,
        formattedAddress: 'Paris, France',
        city: 'Paris',
        country: 'France',
      });
      expect(result[0].confidence).toBeCloseTo(0.85);
    });

    it('should filter common words, hashtags, mentions and numbers', async () => {
      mockPlaces.mockReturnValue(['the', '#travel', '@someone', '2024', 'Berlin']);

      await parser.parseLocations('text');

      expect(mockGeocode).toHaveBeenCalledTimes(1);
      expect(mockGeocode).toHaveBeenCalledWith('Berlin');
    });

    it('should merge places and topics without duplicates', async () => {
      mockPlaces.mockReturnValue(['Rome']);
      mockTopics.mockReturnValue(['Rome', 'Milan']);

      await parser.parseLocations('text');

      expect(mockGeocode.mock.calls).toEqual([['Rome'], ['Milan']]);
    });

    it('should geocode at most maxLocations places', async () => {
      const limited = new GeoParser({ rateLimitDelay: 0, maxLocations: 2 });
      mockPlaces.mockReturnValue(['Oslo', 'Lima', 'Kyiv']);

      await limited.parseLocations('text');

      expect(mockGeocode).toHaveBeenCalledTimes(2);
    });

    it('should skip places the geocoder cannot resolve', async () => {
      mockPlaces.mockReturnValue(['Atlantis', 'Paris']);
      mockGeocode.mockImplementation(async (query: string) => (query === 'Paris' ? [PARIS] : []));

      const best = await parser.parseBestLocation('text');

      expect(best?.text).toBe('Paris');
    });
  });

  describe('geocodePlace', () => {
    it('should cache results case-insensitively', async () => {
      mockGeocode.mockResolvedValue([PARIS]);

      await parser.geocodePlace('Paris');
      await parser.geocodePlace('paris');

      expect(mockGeocode).toHaveBeenCalledTimes(1);
      expect(parser.getCacheStats()).toEqual({ size: 1 });
    });

    it('should share one request between concurrent callers', async () => {
      mockGeocode.mockResolvedValue([PARIS]);

      const [first, second] = await Promise.all([parser.geocodePlace('Paris'), parser.geocodePlace('Paris')]);

      expect(mockGeocode).toHaveBeenCalledTimes(1);
      expect(second).toEqual(first);
    });

    it('should cache misses but not failures', async () => {
      mockGeocode.mockRejectedValueOnce(new Error('timeout')).mockResolvedValueOnce([]);

      expect(await parser.geocodePlace('Nowhere')).toBeNull();
      expect(await parser.geocodePlace('Nowhere')).toBeNull();
      expect(await parser.geocodePlace('Nowhere')).toBeNull();

      expect(mockGeocode).toHaveBeenCalledTimes(2);
    });

    it('should evict the oldest place once the cache is full', async () => {
      const small = new GeoParser({ rateLimitDelay: 0, maxCacheSize: 2 });
      mockGeocode.mockResolvedValue([PARIS]);

      await small.geocodePlace('Paris');
      await small.geocodePlace('Lyon');
      await small.geocodePlace('Nice');
      expect(small.getCacheStats()).toEqual({ size: 2 });
      expect(mockGeocode).toHaveBeenCalledTimes(3);

      await small.geocodePlace('Nice');
      await small.geocodePlace('Lyon');
      expect(mockGeocode).toHaveBeenCalledTimes(3);

      await small.geocodePlace('Paris');
      expect(mockGeocode).toHaveBeenCalledTimes(4);
      expect(small.getCacheStats()).toEqual({ size: 2 });
    });

    it('should forget everything on clearCache', async () => {
      mockGeocode.mockResolvedValue([PARIS]);
      await parser.geocodePlace('Paris');

      parser.clearCache();
      await parser.geocodePlace('Paris');

      expect(mockGeocode).toHaveBeenCalledTimes(2);
    });
  });

  describe('resolveRecord', () => {
    it('should leave records with coordinates untouched', async () => {
      const record = { lat: 1, lon: 2, address: 'Paris' };

      expect(await parser.resolveRecord(record)).toBe(record);
      expect(mockGeocode).not.toHaveBeenCalled();
    });

    it('should geocode address fields directly', async () => {
      mockGeocode.mockResolvedValue([{ latitude: 51.5034, longitude: -0.1276, streetName: 'Downing Street' }]);

      const resolved = await parser.resolveRecord({ id: 'x', address: ' 10 Downing Street ' });

      expect(mockGeocode).toHaveBeenCalledWith('10 Downing Street');
      expect(resolved).toEqual({
        id: 'x',
        address: ' 10 Downing Street ',
        lat: 51.5034,
        lon: -0.1276,
        geocodedFrom: '10 Downing Street',
        geocodeConfidence: expect.closeTo(0.65),
      });
    });

    it('should fall back to places mentioned in free text', async () => {
      mockPlaces.mockReturnValue(['Paris']);
      mockGeocode.mockResolvedValue([PARIS]);

      const resolved = await parser.resolveRecord({ content: 'Landed in Paris' });

      expect(resolved).toMatchObject({
        content: 'Landed in Paris',
        lat: 48.8566,
        lon: 2.3522,
        geocodedFrom: 'Paris',
        address: 'Paris, France',
      });
    });

    it('should count resolved records in enrich', async () => {
      mockGeocode.mockImplementation(async (query: string) => (query === 'Paris' ? [PARIS] : []));

      const { records, resolved } = await parser.enrich([
        { lat: 0, lon: 0 },
        { place: 'Paris' },
        { place: 'Atlantis' },
      ]);

      expect(resolved).toBe(1);
      expect(records[1]).toMatchObject({ lat: 48.8566, lon: 2.3522 });
      expect(records[2]).toEqual({ place: 'Atlantis' });
    });

    it('should pass the remaining records through once told to stop', async () => {
      let stop = false;
      mockGeocode.mockImplementation(async () => {
        stop = true;
        return [PARIS];
      });

      const { records, resolved } = await parser.enrich([{ place: 'Paris' }, { place: 'Lyon' }], () => stop);

      expect(resolved).toBe(1);
      expect(records[1]).toEqual({ place: 'Lyon' });
      expect(mockGeocode).toHaveBeenCalledTimes(1);
    });
  });
});
