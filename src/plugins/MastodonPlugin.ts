import axios from 'axios';
import { BasePlugin } from './BasePlugin';
import { RawRecord, Target } from '../types/Location';
import { LocationPage, PageRequest, PluginContext } from '../types/Plugin';

/**
 * Mastodon plugin
 * Finds accounts on an instance and pages through their public statuses.
 * Statuses carry no coordinates; their text is left for geocoding.
 */

// =============================================================================
// Types
// =============================================================================

interface MastodonAccount {
  id: string;
  username: string;
  acct: string;
  display_name: string;
  url: string;
  avatar: string;
}

interface MastodonStatus {
  id: string;
  created_at: string;
  content: string;
  url: string | null;
  account: MastodonAccount;
  language: string | null;
  sensitive: boolean;
  reblogs_count: number;
  favourites_count: number;
  tags: Array<{ name: string }>;
}

/** Mastodon caps statuses per request at 40 */
const MAX_PAGE_SIZE = 40;

export class MastodonPlugin extends BasePlugin {
  constructor(context: PluginContext) {
    super({
      name: 'Mastodon',
      category: 'social_media',
      version: '1.0',
      description: 'Public statuses of Mastodon accounts',
      configSchema: [
        { name: 'instance_url', type: 'string', label: 'Instance URL', default: 'https://mastodon.social', required: true },
        { name: 'access_token', type: 'string', label: 'Access token' },
        { name: 'include_reblogs', type: 'boolean', label: 'Include boosts', default: false },
        { name: 'include_sensitive', type: 'boolean', label: 'Include sensitive posts', default: false },
      ],
      // Default API quota: 300 requests per 5 minutes
      rateLimit: { maxCalls: 300, windowSeconds: 300 },
      defaultPageSize: MAX_PAGE_SIZE,
    }, context);
  }

  async searchForTargets(query: string): Promise<Target[]> {
    const trimmed = query.trim();
    if (trimmed.length === 0) {
      return [];
    }

    const response = await axios.get<MastodonAccount[]>(
      `${await this.instanceUrl()}/api/v1/accounts/search`,
      {
        params: { q: trimmed, limit: 10 },
        timeout: 10000,
        headers: await this.headers(),
      }
    );

    if (!Array.isArray(response.data)) {
      return [];
    }
    this.logger.debug({ query: trimmed, count: response.data.length }, 'Accounts found');

    return response.data.map(account =>
      this.makeTarget(account.id, account.display_name || `@${account.acct}`, account.avatar || undefined)
    );
  }

  async fetchPage(target: Target, request: PageRequest): Promise<LocationPage> {
    const limit = Math.min(Math.max(request.pageSize, 1), MAX_PAGE_SIZE);
    const includeReblogs = await this.getBooleanOption('include_reblogs');
    const includeSensitive = await this.getBooleanOption('include_sensitive');
    const url = `${await this.instanceUrl()}/api/v1/accounts/${encodeURIComponent(target.externalId)}/statuses`;

    // A page whose statuses are all filtered out is skipped, so an empty
    // result only ever means the timeline has ended
    let cursor = request.cursor;
    for (;;) {
      const response = await axios.get<MastodonStatus[]>(url, {
        params: {
          limit,
          exclude_reblogs: !includeReblogs,
          ...(cursor !== undefined ? { max_id: cursor } : {}),
        },
        timeout: 10000,
        headers: await this.headers(),
      });

      const statuses = Array.isArray(response.data) ? response.data : [];
      const records = statuses
        .filter(status => includeSensitive || !status.sensitive)
        .map(status => this.transformStatus(status));

      // A short page is the last one
      const last = statuses[statuses.length - 1];
      const nextCursor = statuses.length >= limit && last ? last.id : null;
      if (records.length > 0 || nextCursor === null) {
        return { records, nextCursor };
      }
      this.logger.debug({ target: target.externalId, skipped: statuses.length }, 'Every status on the page was filtered out');
      cursor = nextCursor;
    }
  }

  private transformStatus(status: MastodonStatus): RawRecord {
    const text = stripHtml(status.content);
    return {
      id: `mastodon-${status.id}`,
      title: `@${status.account.acct}`,
      date: status.created_at,
      content: text,
      source: this.name,
      url: status.url,
      author: status.account.display_name || status.account.username,
      language: status.language,
      hashtags: status.tags.map(tag => tag.name),
      reblogs: status.reblogs_count,
      favourites: status.favourites_count,
    };
  }

  private async instanceUrl(): Promise<string> {
    const url = (await this.getStringOption('instance_url')) ?? 'https://mastodon.social';
    return url.replace(/\/+$/, '');
  }

  private async headers(): Promise<Record<string, string>> {
    const token = await this.getStringOption('access_token');
    return token
      ? { Accept: 'application/json', Authorization: `Bearer ${token}` }
      : { Accept: 'application/json' };
  }
}

export function stripHtml(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, ' ')
    .replace(/<\/?p>/gi, ' ')
    .replace(/<[^>]*>/g, '')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/\s+/g, ' ')
    .trim();
}
