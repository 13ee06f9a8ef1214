import axios, { type AxiosInstance, type AxiosRequestConfig } from 'axios';
import { z } from 'zod';
import type { Logger } from '../../utils/logger.js';
import { CatalogRequestError } from '../../utils/errors.js';
import { toCatalogError } from './errors.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../../utils/retry.js';
import {
  coerceAlbum,
  coerceArtist,
  coercePlaylist,
  coerceTrack,
  type RawAlbum,
  type RawArtist,
  type RawPlaylist,
  type RawTrack,
} from './schema.js';
import type { CatalogClient } from './types.js';

export interface HttpCatalogOptions {
  baseUrl: string;
  token?: string;
  timeoutMs: number;
  retry?: RetryPolicy;
  log?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const pageSchema = z.object({
  items: z.array(z.unknown()),
  next: z.string().nullish(),
});

const createdPlaylistSchema = z.object({
  id: z.string().min(1),
});

// Guards against a server that keeps returning the same cursor.
const MAX_PAGES = 1000;

/**
 * REST adapter for the remote catalog.
 *
 * Lists are cursor-paginated (`{ items, next }`); writes are plain POSTs.
 * Transient failures (network, timeout, 429, 5xx) are retried under a bounded
 * policy, honouring Retry-After.
 */
export class HttpCatalogClient implements CatalogClient {
  private client: AxiosInstance;
  private retry: RetryPolicy;
  private log?: Logger;
  private sleep?: (ms: number) => Promise<void>;

  constructor(options: HttpCatalogOptions, client?: AxiosInstance) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY;
    this.log = options.log;
    this.sleep = options.sleep;

    this.client = client ?? axios.create();
    this.client.defaults.baseURL = options.baseUrl;
    this.client.defaults.timeout = options.timeoutMs;
    if (options.token) {
      this.client.defaults.headers.common.Authorization = `Bearer ${options.token}`;
    }
  }

  async fetchPlaylists(): Promise<RawPlaylist[]> {
    const items = await this.paginate('fetchPlaylists', '/playlists');
    return items.map(coercePlaylist);
  }

  async fetchPlaylistTracks(playlistId: string): Promise<RawTrack[]> {
    const items = await this.paginate('fetchPlaylistTracks', `/playlists/${encodeURIComponent(playlistId)}/tracks`);
    return items.map(coerceTrack);
  }

  async fetchAlbums(): Promise<RawAlbum[]> {
    const items = await this.paginate('fetchAlbums', '/library/albums');
    return items.map(coerceAlbum);
  }

  async fetchArtists(): Promise<RawArtist[]> {
    const items = await this.paginate('fetchArtists', '/library/artists');
    return items.map(coerceArtist);
  }

  async createPlaylist(title: string): Promise<string> {
    const data = await this.request('createPlaylist', {
      method: 'POST',
      url: '/playlists',
      data: { title },
    });
    const parsed = createdPlaylistSchema.safeParse(data);
    if (!parsed.success) {
      throw toCatalogError('createPlaylist', parsed.error);
    }
    return parsed.data.id;
  }

  async addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
    if (trackIds.length === 0) {
      return;
    }
    await this.request('addTracksToPlaylist', {
      method: 'POST',
      url: `/playlists/${encodeURIComponent(playlistId)}/tracks`,
      data: { trackIds },
    });
  }

  private async paginate(operation: string, url: string): Promise<unknown[]> {
    const items: unknown[] = [];
    let cursor: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const data = await this.request(operation, {
        method: 'GET',
        url,
        params: cursor ? { cursor } : undefined,
      });

      const parsed = pageSchema.safeParse(data);
      if (!parsed.success) {
        throw toCatalogError(operation, parsed.error);
      }

      items.push(...parsed.data.items);
      if (!parsed.data.next) {
        return items;
      }
      cursor = parsed.data.next;
    }

    throw new CatalogRequestError(operation, `more than ${MAX_PAGES} pages`, { transient: false });
  }

  private async request(operation: string, config: AxiosRequestConfig): Promise<unknown> {
    return withRetry(
      async () => {
        try {
          const response = await this.client.request<unknown>(config);
          return response.data;
        } catch (error) {
          throw toCatalogError(operation, error);
        }
      },
      {
        policy: this.retry,
        sleep: this.sleep,
        isRetryable: (error) => error instanceof CatalogRequestError && error.transient,
        retryAfterMs: (error) => (error instanceof CatalogRequestError ? error.retryAfterMs : undefined),
        onRetry: (error, attempt, delayMs) => {
          this.log?.warn({ operation, attempt, delayMs, err: error }, 'Retrying catalog request');
        },
      }
    );
  }
}
