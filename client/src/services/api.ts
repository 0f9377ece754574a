import type { ChangelogEntry } from '@adloop/shared';
import type { ClientConfig } from '../config';
import { FormatError, TransportError, errorMessage } from '../errors';
import { logger } from '../logger';
import { ChangelogResponseSchema } from '../schemas';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export const MEDIA_PLAYLIST_FIELDS = [
  'id',
  'title',
  'active',
  'order',
  'beginTime',
  'endTime',
  'portrait',
  'device.device_id',
  'device.device_name',
  'assets.order',
  'assets.media_assets_id.id',
  'assets.media_assets_id.title',
  'assets.media_assets_id.fileUrl',
  'assets.media_assets_id.startTime',
  'assets.media_assets_id.duration',
  'assets.media_assets_id.file.id',
  'assets.media_assets_id.file.filename_disk',
].join(',');

/** Read-only view of the content server: the manifest and the changelog signal. */
export interface ContentSource {
  fetchManifest(): Promise<unknown>;
  fetchLatestChangelog(): Promise<ChangelogEntry | null>;
}

export class ContentApi implements ContentSource {
  constructor(
    private readonly config: Pick<ClientConfig, 'serverUrl' | 'requestTimeout'>,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  public async fetchManifest(): Promise<unknown> {
    return this.request('GET', `/items/media_playlist?fields=${encodeURIComponent(MEDIA_PLAYLIST_FIELDS)}`);
  }

  /** Newest changelog entry, or null when the server has none yet. */
  public async fetchLatestChangelog(): Promise<ChangelogEntry | null> {
    const body = await this.request('GET', '/items/changelog?limit=1&sort=-date_created');
    const parsed = ChangelogResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new FormatError(`Unexpected changelog response: ${parsed.error.issues[0]?.message}`);
    }

    const newest = parsed.data.data[0];
    if (!newest) {
      logger.warn('Changelog is empty');
      return null;
    }

    return {
      id: newest.id,
      dateCreated: newest.date_created,
      dateUpdated: newest.date_updated ?? null,
      log: newest.log ?? '',
    };
  }

  private async request(method: 'GET', path: string): Promise<unknown> {
    const url = `${this.config.serverUrl}${path}`;
    logger.debug(`${method} ${url}`);

    let res: Response;
    let text: string;
    try {
      res = await this.fetchFn(url, {
        method,
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.config.requestTimeout),
      });
      text = await res.text();
    } catch (error: unknown) {
      throw new TransportError(`${method} ${url} failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    if (!res.ok) {
      throw new TransportError(`HTTP ${res.status} ${res.statusText}: ${text.slice(0, 200)}`, res.status);
    }

    try {
      return JSON.parse(text);
    } catch (error: unknown) {
      throw new FormatError(`Response from ${url} is not JSON`, { cause: error });
    }
  }
}
