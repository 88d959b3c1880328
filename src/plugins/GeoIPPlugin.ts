import axios from 'axios';
import { isIP } from 'net';
import { BasePlugin } from './BasePlugin';
import { Target } from '../types/Location';
import { LocationPage, PageRequest, PluginContext } from '../types/Plugin';

/**
 * GeoIP plugin
 * Geolocates an IP address or hostname through the ip-api JSON endpoint.
 * One lookup yields one record, so there is a single page.
 */

interface IpApiResponse {
  status: 'success' | 'fail';
  message?: string;
  query: string;
  country?: string;
  regionName?: string;
  city?: string;
  lat?: number;
  lon?: number;
  timezone?: string;
  isp?: string;
  org?: string;
}

const HOSTNAME_PATTERN = /^(?=.{1,253}$)([a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)(\.[a-z0-9]([a-z0-9-]{0,61}[a-z0-9])?)+$/i;

const FIELDS = 'status,message,query,country,regionName,city,lat,lon,timezone,isp,org';

export class GeoIPPlugin extends BasePlugin {
  constructor(context: PluginContext) {
    super({
      name: 'GeoIP',
      category: 'location_services',
      version: '1.0',
      description: 'IP address and hostname geolocation',
      configSchema: [
        { name: 'api_url', type: 'string', label: 'API URL', default: 'http://ip-api.com/json', required: true },
      ],
      // Free tier: 45 requests per minute
      rateLimit: { maxCalls: 45, windowSeconds: 60 },
    }, context);
  }

  /**
   * The query itself is the target when it is an IP address or hostname
   */
  async searchForTargets(query: string): Promise<Target[]> {
    const candidate = query.trim();
    if (isIP(candidate) === 0 && !HOSTNAME_PATTERN.test(candidate)) {
      return [];
    }
    return [this.makeTarget(candidate, candidate)];
  }

  async fetchPage(target: Target, _request: PageRequest): Promise<LocationPage> {
    const apiUrl = ((await this.getStringOption('api_url')) ?? 'http://ip-api.com/json').replace(/\/+$/, '');

    const response = await axios.get<IpApiResponse>(`${apiUrl}/${encodeURIComponent(target.externalId)}`, {
      params: { fields: FIELDS },
      timeout: 10000,
    });

    const data = response.data;
    if (data.status !== 'success') {
      throw new Error(`Lookup of ${target.externalId} failed: ${data.message ?? 'unknown error'}`);
    }

    const place = [data.city, data.regionName, data.country].filter(Boolean).join(', ');
    this.logger.debug({ query: data.query, place }, 'Address located');

    return {
      records: [{
        id: `geoip-${data.query}`,
        lat: data.lat,
        lon: data.lon,
        name: place || data.query,
        context: [data.isp && `ISP: ${data.isp}`, data.org && `Organization: ${data.org}`].filter(Boolean).join(', '),
        source: this.name,
        ip: data.query,
        timezone: data.timezone,
      }],
      nextCursor: null,
      total: 1,
    };
  }
}
