import type { Logger } from '../../utils/logger.js';
import { MalformedRecordError, SyncCancelledError, type RecordKind } from '../../utils/errors.js';
import { errorMessage } from '../../utils/index.js';
import {
  parseAlbum,
  parseArtist,
  parsePlaylist,
  parseTrack,
  type EntityRef,
  type TrackRecord,
} from '../catalog/schema.js';
import type { PlaylistSnapshot, RemoteSnapshot } from '../catalog/types.js';
import { MIRROR_PLAYLIST_TITLE, type EntityStore, type Executor, type NamedKey } from '../store/index.js';
import { emptyReport, type SyncReport } from './types.js';

/** Album a track is filed under when the remote gives none. */
export const UNKNOWN_ALBUM = 'Unknown Album';

export interface ReconcileOptions {
  signal?: AbortSignal;
}

interface Delta {
  created: number;
  updated: number;
  removed: number;
}

function zero(): Delta {
  return { created: 0, updated: 0, removed: 0 };
}

function namedKey(ref: EntityRef): NamedKey {
  return ref.id ? { externalId: ref.id } : { name: ref.name };
}

function refKey(ref: EntityRef): string {
  return ref.id ? `id:${ref.id}` : `name:${ref.name}`;
}

function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SyncCancelledError();
  }
}

/**
 * Converges the store to a remote snapshot.
 *
 * Saved artists and albums are applied first, then every playlist with its
 * tracks, one transaction per track. Memberships missing from the snapshot are
 * unlinked and a final sweep deletes whatever nothing references any more.
 */
export class Reconciler {
  constructor(
    private readonly store: EntityStore,
    private readonly log: Logger
  ) {}

  async reconcile(snapshot: RemoteSnapshot, options: ReconcileOptions = {}): Promise<SyncReport> {
    const { signal } = options;
    const report = emptyReport();

    await this.reconcileArtists(snapshot, report, signal);
    const keepTrackIds = await this.reconcileAlbums(snapshot, report, signal);

    const keepPlaylistIds = new Set<string>();
    for (const entry of snapshot.playlists) {
      throwIfCancelled(signal);
      await this.reconcilePlaylist(entry, report, keepPlaylistIds, signal);
    }

    throwIfCancelled(signal);
    for (const playlist of await this.store.listPlaylists(this.store.db)) {
      if (keepPlaylistIds.has(playlist.id) || playlist.title === MIRROR_PLAYLIST_TITLE) {
        continue;
      }
      const removed = await this.store.unit(`playlist ${playlist.id} removal`, (trx) =>
        this.store.unlinkPlaylistTracksExcept(trx, playlist.id, new Set())
      );
      this.log.debug({ playlistId: playlist.id, title: playlist.title, removed }, 'Playlist no longer on remote');
      report.removed += removed;
    }

    throwIfCancelled(signal);
    const swept = await this.store.unit('orphan sweep', (trx) =>
      this.store.deleteUnreferenced(trx, { keepPlaylistIds, keepTrackIds })
    );
    report.removed += swept.tracks + swept.artists + swept.albums + swept.playlists + swept.links;
    this.log.info({ swept }, 'Orphan sweep complete');

    this.log.info(
      {
        created: report.created,
        updated: report.updated,
        removed: report.removed,
        errors: report.errors.length,
      },
      'Reconciliation complete'
    );
    return report;
  }

  private async reconcileArtists(snapshot: RemoteSnapshot, report: SyncReport, signal?: AbortSignal): Promise<void> {
    const savedIds = new Set<string>();

    for (const raw of snapshot.artists) {
      throwIfCancelled(signal);
      await this.isolate(report, 'artist', async () => {
        const artist = parseArtist(raw);
        const { id, delta } = await this.store.unit(`artist ${refKey(artist)}`, async (trx) => {
          const delta = zero();
          const result = await this.store.getOrCreate(trx, 'artist', namedKey(artist), {
            name: artist.name,
            userSaved: true,
          });
          if (result.created) {
            delta.created++;
          } else if (await this.store.update(trx, 'artist', result.row.id, { name: artist.name, userSaved: true })) {
            delta.updated++;
          }
          return { id: result.row.id, delta };
        });
        savedIds.add(id);
        this.apply(report, delta);
      });
    }

    throwIfCancelled(signal);
    report.updated += await this.store.unit('unsave artists', (trx) => this.store.unsaveExcept(trx, 'artist', savedIds));
  }

  /** Returns the tracks the saved albums list, which the sweep keeps. */
  private async reconcileAlbums(
    snapshot: RemoteSnapshot,
    report: SyncReport,
    signal?: AbortSignal
  ): Promise<Set<string>> {
    const savedIds = new Set<string>();
    const listedTrackIds = new Set<string>();
    const unreadable: string[] = [];

    for (const raw of snapshot.albums) {
      throwIfCancelled(signal);
      const savedAlbum = await this.isolate(report, 'album', async () => {
        const parsed = parseAlbum(raw);
        const { id, delta } = await this.store.unit(`album ${refKey(parsed)}`, async (trx) => {
          const delta = zero();
          const result = await this.store.getOrCreate(trx, 'album', namedKey(parsed), {
            name: parsed.name,
            userSaved: true,
          });
          if (result.created) {
            delta.created++;
          } else if (await this.store.update(trx, 'album', result.row.id, { name: parsed.name, userSaved: true })) {
            delta.updated++;
          }
          return { id: result.row.id, delta };
        });
        savedIds.add(id);
        this.apply(report, delta);
        return parsed;
      });

      if (!savedAlbum) {
        continue;
      }
      for (const rawTrack of raw.tracks ?? []) {
        throwIfCancelled(signal);
        await this.isolate(
          report,
          'track',
          async () => {
            const track = parseTrack(rawTrack);
            const { trackId, delta } = await this.store.unit(`track ${track.id}`, (trx) =>
              this.applyTrack(trx, track, savedAlbum)
            );
            listedTrackIds.add(trackId);
            this.apply(report, delta);
          },
          () => {
            if (rawTrack.id) {
              unreadable.push(rawTrack.id);
            }
          }
        );
      }
    }

    if (unreadable.length > 0) {
      for (const id of await this.store.findTrackIdsByExternalIds(this.store.db, unreadable)) {
        listedTrackIds.add(id);
      }
    }

    throwIfCancelled(signal);
    report.updated += await this.store.unit('unsave albums', (trx) => this.store.unsaveExcept(trx, 'album', savedIds));
    return listedTrackIds;
  }

  private async reconcilePlaylist(
    entry: PlaylistSnapshot,
    report: SyncReport,
    keepPlaylistIds: Set<string>,
    signal?: AbortSignal
  ): Promise<void> {
    if (entry.playlist.title === MIRROR_PLAYLIST_TITLE) {
      // The remote copy of the mirror is owned by the mirror builder
      return;
    }

    const storedId = await this.isolate(report, 'playlist', async () => {
      const playlist = parsePlaylist(entry.playlist);
      const { id, delta } = await this.store.unit(`playlist ${playlist.id}`, async (trx) => {
        const delta = zero();
        const result = await this.store.getOrCreate(
          trx,
          'playlist',
          { externalId: playlist.id },
          { title: playlist.title }
        );
        if (result.created) {
          delta.created++;
        } else if (await this.store.update(trx, 'playlist', result.row.id, { title: playlist.title })) {
          delta.updated++;
        }
        return { id: result.row.id, delta };
      });
      this.apply(report, delta);
      return id;
    });

    if (!storedId) {
      // Keep whatever we already hold for a playlist we could not read
      const remoteId = entry.playlist.id;
      const stored = remoteId ? await this.store.findPlaylistByExternalId(this.store.db, remoteId) : undefined;
      if (stored) {
        keepPlaylistIds.add(stored.id);
      }
      return;
    }
    keepPlaylistIds.add(storedId);

    const members = new Set<string>();
    const seen = new Set<string>();
    const unreadable: string[] = [];

    for (const [position, rawTrack] of entry.tracks.entries()) {
      throwIfCancelled(signal);
      await this.isolate(
        report,
        'track',
        async () => {
          const track = parseTrack(rawTrack);
          if (seen.has(track.id)) {
            // Repeated entry: the first position wins
            return;
          }
          seen.add(track.id);

          const { trackId, delta } = await this.store.unit(`track ${track.id}`, async (trx) => {
            const applied = await this.applyTrack(trx, track, null);
            if (await this.store.link(trx, 'playlist_track', storedId, applied.trackId, { position })) {
              applied.delta.created++;
            } else if (await this.store.setPosition(trx, storedId, applied.trackId, position)) {
              applied.delta.updated++;
            }
            return applied;
          });
          members.add(trackId);
          this.apply(report, delta);
        },
        () => {
          if (rawTrack.id) {
            unreadable.push(rawTrack.id);
          }
        }
      );
    }

    if (unreadable.length > 0) {
      for (const id of await this.store.findTrackIdsByExternalIds(this.store.db, unreadable)) {
        members.add(id);
      }
    }

    throwIfCancelled(signal);
    report.removed += await this.store.unit(`playlist ${storedId} membership`, (trx) =>
      this.store.unlinkPlaylistTracksExcept(trx, storedId, members)
    );
  }

  /**
   * One track with its album, artists and artist links. Names carried on
   * album and artist references inside a track are not applied as renames;
   * only the saved-library lists are authoritative for those.
   *
   * The album comes from the track's own reference, else from the saved album
   * listing it. A playlist entry with neither leaves a known track's album
   * alone and files a new one under the placeholder.
   */
  private async applyTrack(
    trx: Executor,
    track: TrackRecord,
    savedAlbum: EntityRef | null
  ): Promise<{ trackId: string; delta: Delta }> {
    const delta = zero();

    const albumRef = track.album ?? savedAlbum;
    const known = albumRef ? undefined : await this.store.findTrackByExternalId(trx, track.id);

    let albumId: string;
    if (known) {
      albumId = known.album_id;
    } else {
      const ref = albumRef ?? { id: null, name: UNKNOWN_ALBUM };
      const album = await this.store.getOrCreate(trx, 'album', namedKey(ref), { name: ref.name });
      if (album.created) {
        delta.created++;
      }
      albumId = album.row.id;
    }

    const stored = await this.store.getOrCreate(trx, 'track', { externalId: track.id }, { name: track.title, albumId });
    if (stored.created) {
      delta.created++;
    } else if (await this.store.update(trx, 'track', stored.row.id, { name: track.title, albumId })) {
      delta.updated++;
    }

    const artistIds: string[] = [];
    const seen = new Set<string>();
    for (const ref of track.artists) {
      const key = refKey(ref);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);

      const artist = await this.store.getOrCreate(trx, 'artist', namedKey(ref), { name: ref.name });
      if (artist.created) {
        delta.created++;
      }
      artistIds.push(artist.row.id);
      if (await this.store.link(trx, 'artist_track', artist.row.id, stored.row.id, {})) {
        delta.created++;
      }
    }
    delta.removed += await this.store.unlinkArtistsExcept(trx, stored.row.id, artistIds);

    return { trackId: stored.row.id, delta };
  }

  /**
   * Run one item. A malformed record is reported and skipped; anything else
   * (persistence failures, cancellation) aborts the pass.
   */
  private async isolate<T>(
    report: SyncReport,
    kind: RecordKind,
    fn: () => Promise<T>,
    onMalformed?: () => void
  ): Promise<T | undefined> {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof MalformedRecordError)) {
        throw error;
      }
      onMalformed?.();
      report.errors.push({ kind: error.kind, ref: error.ref, error: errorMessage(error) });
      this.log.warn({ kind, ref: error.ref, issues: error.issues }, 'Skipping malformed record');
      return undefined;
    }
  }

  private apply(report: SyncReport, delta: Delta): void {
    report.created += delta.created;
    report.updated += delta.updated;
    report.removed += delta.removed;
  }
}
