import type { Logger } from '../../utils/logger.js';
import { CatalogRequestError, SyncCancelledError } from '../../utils/errors.js';
import { chunk } from '../../utils/index.js';
import { toCatalogError } from '../catalog/errors.js';
import type { CatalogClient } from '../catalog/types.js';
import { MIRROR_PLAYLIST_TITLE, type EntityStore } from '../store/index.js';
import type { MirrorReport } from './types.js';

export interface MirrorOptions {
  batchSize: number;
}

export interface EnsureMirrorOptions {
  signal?: AbortSignal;
}

interface RemoteMirror {
  id: string;
  created: boolean;
  /** Taken from the local row rather than looked up or created remotely. */
  stored: boolean;
}

function isMissingPlaylist(error: unknown): boolean {
  return error instanceof CatalogRequestError && error.status === 404;
}

/**
 * Keeps the aggregate playlist in step with every track in the store.
 *
 * The remote copy is only ever appended to. Each batch is pushed first and
 * linked locally afterwards, so a failed push leaves the batch to be retried
 * by the next run and a second call with an unchanged store writes nothing.
 * When the stored remote playlist no longer exists, the mirror is adopted or
 * created again and every track is pushed to it.
 */
export class MirrorPlaylistBuilder {
  constructor(
    private readonly store: EntityStore,
    private readonly catalog: CatalogClient,
    private readonly log: Logger,
    private readonly options: MirrorOptions
  ) {}

  async ensureMirror(options: EnsureMirrorOptions = {}): Promise<MirrorReport> {
    const { signal } = options;
    const remote = await this.resolveRemote(signal, true);

    try {
      return await this.push(remote, false, signal);
    } catch (error) {
      if (!remote.stored || !isMissingPlaylist(error)) {
        throw error;
      }
      this.log.warn({ remotePlaylistId: remote.id }, 'Remote mirror playlist is gone, resolving it again');
      return this.push(await this.resolveRemote(signal, false), true, signal);
    }
  }

  private async push(remote: RemoteMirror, replaced: boolean, signal?: AbortSignal): Promise<MirrorReport> {
    const playlistId = await this.store.unit('mirror playlist', async (trx) => {
      const result = await this.store.getOrCreate(
        trx,
        'playlist',
        { title: MIRROR_PLAYLIST_TITLE },
        { title: MIRROR_PLAYLIST_TITLE, externalId: remote.id }
      );
      if (!result.created && result.row.external_id !== remote.id) {
        await this.store.update(trx, 'playlist', result.row.id, { externalId: remote.id });
      }
      if (replaced) {
        // Local links described the old remote playlist
        await this.store.unlinkPlaylistTracksExcept(trx, result.row.id, new Set());
      }
      return result.row.id;
    });

    const alreadyPresent = await this.store.countLinks(this.store.db, playlistId);
    const missing = await this.store.listTracksMissingFrom(this.store.db, playlistId);
    this.log.debug({ alreadyPresent, missing: missing.length }, 'Mirror difference computed');

    let added = 0;
    for (const batch of chunk(missing, this.options.batchSize)) {
      throwIfCancelled(signal);

      const externalIds = batch.map((track) => track.external_id);
      try {
        await this.catalog.addTracksToPlaylist(remote.id, externalIds);
      } catch (error) {
        throw toCatalogError('addTracksToPlaylist', error);
      }

      added += await this.store.unit('mirror batch', async (trx) => {
        let position = (await this.store.maxPosition(trx, playlistId)) + 1;
        let linked = 0;
        for (const track of batch) {
          if (await this.store.link(trx, 'playlist_track', playlistId, track.id, { position })) {
            linked++;
            position++;
          }
        }
        return linked;
      });
      this.log.debug({ batch: batch.length, added }, 'Mirror batch pushed');
    }

    const report: MirrorReport = {
      added,
      alreadyPresent,
      remotePlaylistId: remote.id,
      createdRemote: remote.created,
    };
    this.log.info(report, 'Mirror playlist up to date');
    return report;
  }

  private async resolveRemote(signal: AbortSignal | undefined, useStored: boolean): Promise<RemoteMirror> {
    throwIfCancelled(signal);

    if (useStored) {
      const local = await this.store.findMirrorPlaylist(this.store.db);
      if (local?.external_id) {
        return { id: local.external_id, created: false, stored: true };
      }
    }

    try {
      const existing = (await this.catalog.fetchPlaylists()).find(
        (playlist) => playlist.title === MIRROR_PLAYLIST_TITLE && playlist.id
      );
      if (existing?.id) {
        this.log.info({ remotePlaylistId: existing.id }, 'Adopting existing remote mirror playlist');
        return { id: existing.id, created: false, stored: false };
      }

      throwIfCancelled(signal);
      const id = await this.catalog.createPlaylist(MIRROR_PLAYLIST_TITLE);
      this.log.info({ remotePlaylistId: id }, 'Created remote mirror playlist');
      return { id, created: true, stored: false };
    } catch (error) {
      throw error instanceof SyncCancelledError ? error : toCatalogError('resolveMirror', error);
    }
  }
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SyncCancelledError();
  }
}
