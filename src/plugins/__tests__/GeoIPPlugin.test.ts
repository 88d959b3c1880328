import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios, { AxiosHeaders, AxiosResponse } from 'axios';
import { GeoIPPlugin } from '../GeoIPPlugin';
import { makeTarget, pluginContext } from '../../__tests__/fakes';

vi.mock('axios');
const mockedAxios = vi.mocked(axios, true);

function response<T>(data: T): AxiosResponse<T> {
  return { data, status: 200, statusText: 'OK', headers: {}, config: { headers: new AxiosHeaders() } };
}

const FIELDS = 'status,message,query,country,regionName,city,lat,lon,timezone,isp,org';

describe('GeoIPPlugin', () => {
  let plugin: GeoIPPlugin;

  beforeEach(() => {
    vi.clearAllMocks();
    plugin = new GeoIPPlugin(pluginContext());
  });

  describe('searchForTargets', () => {
    it('should accept IP addresses', async () => {
      expect(await plugin.searchForTargets(' 192.0.2.10 ')).toEqual([
        { pluginName: 'GeoIP', externalId: '192.0.2.10', displayName: '192.0.2.10' },
      ]);
      expect(await plugin.searchForTargets('2001:db8::1')).toHaveLength(1);
    });

    it('should accept hostnames', async () => {
      expect(await plugin.searchForTargets('example.com')).toEqual([
        { pluginName: 'GeoIP', externalId: 'example.com', displayName: 'example.com' },
      ]);
    });

    it('should reject anything else', async () => {
      expect(await plugin.searchForTargets('not a host')).toEqual([]);
      expect(await plugin.searchForTargets('')).toEqual([]);
      expect(mockedAxios.get).not.toHaveBeenCalled();
    });
  });

  describe('fetchPage', () => {
    it('should turn a lookup into a single record', async () => {
      mockedAxios.get.mockResolvedValue(response({
        status: 'success',
        query: '192.0.2.10',
        country: 'United States',
        regionName: 'Virginia',
        city: 'Ashburn',
        lat: 39.03,
        lon: -77.5,
        timezone: 'America/New_York',
        isp: 'Example ISP',
        org: 'Example Org',
      }));

      const page = await plugin.fetchPage(makeTarget('192.0.2.10', 'GeoIP'), { pageSize: 50, offset: 0 });

      expect(mockedAxios.get).toHaveBeenCalledWith('http://ip-api.com/json/192.0.2.10', {
        params: { fields: FIELDS },
        timeout: 10000,
      });
      expect(page).toEqual({
        records: [{
          id: 'geoip-192.0.2.10',
          lat: 39.03,
          lon: -77.5,
          name: 'Ashburn, Virginia, United States',
          context: 'ISP: Example ISP, Organization: Example Org',
          source: 'GeoIP',
          ip: '192.0.2.10',
          timezone: 'America/New_York',
        }],
        nextCursor: null,
        total: 1,
      });
    });

    it('should fall back to the query when no place is known', async () => {
      mockedAxios.get.mockResolvedValue(response({ status: 'success', query: '192.0.2.11', lat: 1, lon: 2 }));

      const page = await plugin.fetchPage(makeTarget('192.0.2.11', 'GeoIP'), { pageSize: 50, offset: 0 });

      expect(page.records[0].name).toBe('192.0.2.11');
      expect(page.records[0].context).toBe('');
    });

    it('should use a configured API URL', async () => {
      const custom = new GeoIPPlugin(pluginContext({ string_options: { api_url: 'http://geo.internal/json/' } }));
      mockedAxios.get.mockResolvedValue(response({ status: 'success', query: 'example.com', lat: 1, lon: 2 }));

      await custom.fetchPage(makeTarget('example.com', 'GeoIP'), { pageSize: 50, offset: 0 });

      expect(mockedAxios.get).toHaveBeenCalledWith('http://geo.internal/json/example.com', expect.any(Object));
    });

    it('should throw when the lookup fails', async () => {
      mockedAxios.get.mockResolvedValue(response({ status: 'fail', message: 'private range', query: '10.0.0.1' }));

      await expect(plugin.fetchPage(makeTarget('10.0.0.1', 'GeoIP'), { pageSize: 50, offset: 0 }))
        .rejects.toThrow('Lookup of 10.0.0.1 failed: private range');
    });
  });

  it('should return the lookup through returnLocations', async () => {
    mockedAxios.get.mockResolvedValue(response({ status: 'success', query: '192.0.2.10', lat: 1, lon: 2 }));

    const records = await plugin.returnLocations(makeTarget('192.0.2.10', 'GeoIP'));

    expect(records.map(record => record.id)).toEqual(['geoip-192.0.2.10']);
    expect(mockedAxios.get).toHaveBeenCalledTimes(1);
  });
});
