import type { Kysely, Selectable, Transaction } from 'kysely';
import type {
  AlbumTable,
  ArtistTable,
  Database,
  Flag,
  PlaylistTable,
  TrackTable,
} from '../../db/schema.js';
import type { Logger } from '../../utils/logger.js';
import { PersistenceError, SyncError, isUniqueViolation } from '../../utils/errors.js';
import { chunk, generateId, timestamp } from '../../utils/index.js';

/** Reserved title of the aggregate playlist pushed back to the remote catalog. */
export const MIRROR_PLAYLIST_TITLE = 'ytmb-all';

/** Anything that can run queries: the root handle or an open transaction. */
export type Executor = Kysely<Database>;
export type Trx = Transaction<Database>;

export type ArtistRow = Selectable<ArtistTable>;
export type AlbumRow = Selectable<AlbumTable>;
export type TrackRow = Selectable<TrackTable>;
export type PlaylistRow = Selectable<PlaylistTable>;

export interface EntityRows {
  artist: ArtistRow;
  album: AlbumRow;
  track: TrackRow;
  playlist: PlaylistRow;
}

export type EntityKind = keyof EntityRows;

/** Artists and albums are keyed by remote id when there is one, else by name. */
export type NamedKey = { externalId: string } | { name: string };

export interface NaturalKeys {
  artist: NamedKey;
  album: NamedKey;
  track: { externalId: string };
  playlist: { externalId: string } | { title: string };
}

export interface EntityAttributes {
  artist: { name: string; userSaved?: boolean };
  album: { name: string; userSaved?: boolean };
  track: { name: string; albumId: string };
  playlist: { title: string; externalId?: string | null };
}

export interface EntityChanges {
  artist: { name?: string; userSaved?: boolean };
  album: { name?: string; userSaved?: boolean };
  track: { name?: string; albumId?: string };
  playlist: { title?: string; externalId?: string };
}

export interface GetOrCreateResult<R> {
  row: R;
  created: boolean;
}

export interface LinkAttributes {
  artist_track: Record<string, never>;
  playlist_track: { position: number };
}

export type LinkKind = keyof LinkAttributes;

export interface RemovalCounts {
  tracks: number;
  artists: number;
  albums: number;
  playlists: number;
  links: number;
}

export interface SweepOptions {
  keepPlaylistIds?: ReadonlySet<string>;
  keepTrackIds?: ReadonlySet<string>;
}

export interface StoreCounts {
  artists: number;
  albums: number;
  tracks: number;
  playlists: number;
  artistTracks: number;
  playlistTracks: number;
}

type GetOrCreateHandlers = {
  [K in EntityKind]: (
    trx: Executor,
    key: NaturalKeys[K],
    attributes: EntityAttributes[K]
  ) => Promise<GetOrCreateResult<EntityRows[K]>>;
};

type UpdateHandlers = {
  [K in EntityKind]: (trx: Executor, id: string, changes: EntityChanges[K]) => Promise<boolean>;
};

type LinkHandlers = {
  [K in LinkKind]: (trx: Executor, a: string, b: string, attributes: LinkAttributes[K]) => Promise<boolean>;
};

// Row ids per statement when deleting or filtering by id lists; well below
// the bind-parameter limits of both PostgreSQL and SQLite.
const ID_BATCH = 500;

// A unit that hit a uniqueness conflict is replayed this many times; the
// replay's lookups find the row the conflicting writer committed.
const CONFLICT_REPLAYS = 1;

function toFlag(value: boolean | undefined): Flag {
  return value ? 1 : 0;
}

function affected(count: bigint | undefined): number {
  return Number(count ?? 0n);
}

/**
 * Repository over the persisted library schema.
 *
 * Every write takes the executor it runs on; callers group writes for one
 * logical unit with `unit()`. Uniqueness of remote ids and association pairs
 * is enforced by the schema, and inserts that lose a race fall back to a
 * lookup instead of failing.
 */
export class EntityStore {
  private readonly getOrCreateHandlers: GetOrCreateHandlers = {
    artist: (trx, key, attributes) => this.getOrCreateArtist(trx, key, attributes),
    album: (trx, key, attributes) => this.getOrCreateAlbum(trx, key, attributes),
    track: (trx, key, attributes) => this.getOrCreateTrack(trx, key, attributes),
    playlist: (trx, key, attributes) => this.getOrCreatePlaylist(trx, key, attributes),
  };

  private readonly updateHandlers: UpdateHandlers = {
    artist: (trx, id, changes) => this.updateArtist(trx, id, changes),
    album: (trx, id, changes) => this.updateAlbum(trx, id, changes),
    track: (trx, id, changes) => this.updateTrack(trx, id, changes),
    playlist: (trx, id, changes) => this.updatePlaylist(trx, id, changes),
  };

  private readonly linkHandlers: LinkHandlers = {
    artist_track: (trx, artistId, trackId) => this.linkArtistTrack(trx, artistId, trackId),
    playlist_track: (trx, playlistId, trackId, attributes) =>
      this.linkPlaylistTrack(trx, playlistId, trackId, attributes.position),
  };

  constructor(
    readonly db: Executor,
    private readonly log: Logger
  ) {}

  /**
   * Run `fn` as one transaction. A uniqueness conflict rolls back and replays
   * the unit; any other storage failure rolls back and surfaces as
   * PersistenceError. Domain errors thrown by `fn` pass through unchanged.
   */
  async unit<T>(label: string, fn: (trx: Trx) => Promise<T>): Promise<T> {
    for (let attempt = 0; ; attempt++) {
      try {
        return await this.db.transaction().execute(fn);
      } catch (error) {
        if (error instanceof SyncError) {
          throw error;
        }
        if (isUniqueViolation(error) && attempt < CONFLICT_REPLAYS) {
          this.log.debug({ unit: label, attempt }, 'Uniqueness conflict, replaying unit');
          continue;
        }
        throw new PersistenceError(label, error);
      }
    }
  }

  getOrCreate<K extends EntityKind>(
    trx: Executor,
    kind: K,
    key: NaturalKeys[K],
    attributes: EntityAttributes[K]
  ): Promise<GetOrCreateResult<EntityRows[K]>> {
    const handler: GetOrCreateHandlers[K] = this.getOrCreateHandlers[kind];
    return handler(trx, key, attributes);
  }

  /** Apply changes that differ from the stored row. Returns whether a row changed. */
  update<K extends EntityKind>(trx: Executor, kind: K, id: string, changes: EntityChanges[K]): Promise<boolean> {
    const handler: UpdateHandlers[K] = this.updateHandlers[kind];
    return handler(trx, id, changes);
  }

  /** Create the association if absent. Returns false when the pair already existed. */
  link<K extends LinkKind>(trx: Executor, kind: K, a: string, b: string, attributes: LinkAttributes[K]): Promise<boolean> {
    const handler: LinkHandlers[K] = this.linkHandlers[kind];
    return handler(trx, a, b, attributes);
  }

  /** Overwrite a playlist entry's position when it differs. */
  async setPosition(trx: Executor, playlistId: string, trackId: string, position: number): Promise<boolean> {
    const result = await trx
      .updateTable('playlist_tracks')
      .set({ position, updated_at: timestamp() })
      .where('playlist_id', '=', playlistId)
      .where('track_id', '=', trackId)
      .where('position', '!=', position)
      .executeTakeFirst();
    return affected(result.numUpdatedRows) > 0;
  }

  /** Remove the track's artist links other than `keepArtistIds`. */
  async unlinkArtistsExcept(trx: Executor, trackId: string, keepArtistIds: readonly string[]): Promise<number> {
    const keep = new Set(keepArtistIds);
    const stale = (
      await trx.selectFrom('artist_tracks').select('artist_id').where('track_id', '=', trackId).execute()
    )
      .map((row) => row.artist_id)
      .filter((artistId) => !keep.has(artistId));

    let removed = 0;
    for (const batch of chunk(stale, ID_BATCH)) {
      const result = await trx
        .deleteFrom('artist_tracks')
        .where('track_id', '=', trackId)
        .where('artist_id', 'in', batch)
        .executeTakeFirst();
      removed += affected(result.numDeletedRows);
    }
    return removed;
  }

  /** Remove the playlist's track links other than `keepTrackIds`. */
  async unlinkPlaylistTracksExcept(trx: Executor, playlistId: string, keepTrackIds: ReadonlySet<string>): Promise<number> {
    const stale = (
      await trx.selectFrom('playlist_tracks').select('track_id').where('playlist_id', '=', playlistId).execute()
    )
      .map((row) => row.track_id)
      .filter((trackId) => !keepTrackIds.has(trackId));

    let removed = 0;
    for (const batch of chunk(stale, ID_BATCH)) {
      const result = await trx
        .deleteFrom('playlist_tracks')
        .where('playlist_id', '=', playlistId)
        .where('track_id', 'in', batch)
        .executeTakeFirst();
      removed += affected(result.numDeletedRows);
    }
    return removed;
  }

  /**
   * Delete rows nothing references any more:
   * - tracks with no link to a playlist other than the mirror that are not in
   *   `keepTrackIds` (their artist and playlist links go with them),
   * - unsaved artists with no track links,
   * - unsaved albums with no tracks,
   * - playlists with no links that are not in `keepPlaylistIds`.
   * The mirror playlist is never deleted. Saved albums keep their tracks only
   * through `keepTrackIds`, so a track the album no longer lists is swept.
   */
  async deleteUnreferenced(trx: Executor, options: SweepOptions = {}): Promise<RemovalCounts> {
    const counts: RemovalCounts = { tracks: 0, artists: 0, albums: 0, playlists: 0, links: 0 };
    const mirror = await this.findMirrorPlaylist(trx);

    const orphanTracks = await trx
      .selectFrom('tracks')
      .select('tracks.id')
      .where((eb) => {
        let membership = eb
          .selectFrom('playlist_tracks')
          .select('playlist_tracks.track_id')
          .whereRef('playlist_tracks.track_id', '=', 'tracks.id');
        if (mirror) {
          membership = membership.where('playlist_tracks.playlist_id', '!=', mirror.id);
        }
        return eb.not(eb.exists(membership));
      })
      .execute();
    const keepTracks = options.keepTrackIds ?? new Set<string>();
    const orphanTrackIds = orphanTracks.map((row) => row.id).filter((id) => !keepTracks.has(id));

    for (const batch of chunk(orphanTrackIds, ID_BATCH)) {
      const playlistLinks = await trx.deleteFrom('playlist_tracks').where('track_id', 'in', batch).executeTakeFirst();
      const artistLinks = await trx.deleteFrom('artist_tracks').where('track_id', 'in', batch).executeTakeFirst();
      const tracks = await trx.deleteFrom('tracks').where('id', 'in', batch).executeTakeFirst();
      counts.links += affected(playlistLinks.numDeletedRows) + affected(artistLinks.numDeletedRows);
      counts.tracks += affected(tracks.numDeletedRows);
    }

    const artists = await trx
      .deleteFrom('artists')
      .where('user_saved', '=', 0)
      .where((eb) =>
        eb.not(
          eb.exists(
            eb
              .selectFrom('artist_tracks')
              .select('artist_tracks.artist_id')
              .whereRef('artist_tracks.artist_id', '=', 'artists.id')
          )
        )
      )
      .executeTakeFirst();
    counts.artists = affected(artists.numDeletedRows);

    const albums = await trx
      .deleteFrom('albums')
      .where('user_saved', '=', 0)
      .where((eb) =>
        eb.not(eb.exists(eb.selectFrom('tracks').select('tracks.id').whereRef('tracks.album_id', '=', 'albums.id')))
      )
      .executeTakeFirst();
    counts.albums = affected(albums.numDeletedRows);

    const keep = options.keepPlaylistIds ?? new Set<string>();
    const emptyPlaylists = (
      await trx
        .selectFrom('playlists')
        .select('playlists.id')
        .where('playlists.title', '!=', MIRROR_PLAYLIST_TITLE)
        .where((eb) =>
          eb.not(
            eb.exists(
              eb
                .selectFrom('playlist_tracks')
                .select('playlist_tracks.playlist_id')
                .whereRef('playlist_tracks.playlist_id', '=', 'playlists.id')
            )
          )
        )
        .execute()
    )
      .map((row) => row.id)
      .filter((id) => !keep.has(id));

    for (const batch of chunk(emptyPlaylists, ID_BATCH)) {
      const result = await trx.deleteFrom('playlists').where('id', 'in', batch).executeTakeFirst();
      counts.playlists += affected(result.numDeletedRows);
    }

    return counts;
  }

  /** Clear `user_saved` on artists or albums that are no longer in `keepIds`. */
  async unsaveExcept(trx: Executor, kind: 'artist' | 'album', keepIds: ReadonlySet<string>): Promise<number> {
    const saved =
      kind === 'artist'
        ? await trx.selectFrom('artists').select('id').where('user_saved', '=', 1).execute()
        : await trx.selectFrom('albums').select('id').where('user_saved', '=', 1).execute();
    const stale = saved.map((row) => row.id).filter((id) => !keepIds.has(id));

    let updated = 0;
    for (const batch of chunk(stale, ID_BATCH)) {
      const changes = { user_saved: 0 as const, updated_at: timestamp() };
      const result =
        kind === 'artist'
          ? await trx.updateTable('artists').set(changes).where('id', 'in', batch).executeTakeFirst()
          : await trx.updateTable('albums').set(changes).where('id', 'in', batch).executeTakeFirst();
      updated += affected(result.numUpdatedRows);
    }
    return updated;
  }

  async findTrackIdsByExternalIds(trx: Executor, externalIds: readonly string[]): Promise<string[]> {
    const ids: string[] = [];
    for (const batch of chunk([...new Set(externalIds)], ID_BATCH)) {
      const rows = await trx.selectFrom('tracks').select('id').where('external_id', 'in', batch).execute();
      ids.push(...rows.map((row) => row.id));
    }
    return ids;
  }

  async findTrackByExternalId(trx: Executor, externalId: string): Promise<TrackRow | undefined> {
    return trx.selectFrom('tracks').selectAll().where('external_id', '=', externalId).executeTakeFirst();
  }

  async findPlaylistByExternalId(trx: Executor, externalId: string): Promise<PlaylistRow | undefined> {
    return trx.selectFrom('playlists').selectAll().where('external_id', '=', externalId).executeTakeFirst();
  }

  async findMirrorPlaylist(trx: Executor): Promise<PlaylistRow | undefined> {
    return trx
      .selectFrom('playlists')
      .selectAll()
      .where('title', '=', MIRROR_PLAYLIST_TITLE)
      .orderBy('created_at', 'asc')
      .orderBy('id', 'asc')
      .executeTakeFirst();
  }

  async listPlaylists(trx: Executor): Promise<PlaylistRow[]> {
    return trx.selectFrom('playlists').selectAll().orderBy('title', 'asc').orderBy('id', 'asc').execute();
  }

  /** Tracks in the store that are not on `playlistId`, oldest first. */
  async listTracksMissingFrom(trx: Executor, playlistId: string): Promise<TrackRow[]> {
    return trx
      .selectFrom('tracks')
      .selectAll()
      .where((eb) =>
        eb.not(
          eb.exists(
            eb
              .selectFrom('playlist_tracks')
              .select('playlist_tracks.track_id')
              .whereRef('playlist_tracks.track_id', '=', 'tracks.id')
              .where('playlist_tracks.playlist_id', '=', playlistId)
          )
        )
      )
      .orderBy('tracks.created_at', 'asc')
      .orderBy('tracks.id', 'asc')
      .execute();
  }

  async countLinks(trx: Executor, playlistId: string): Promise<number> {
    const row = await trx
      .selectFrom('playlist_tracks')
      .select((eb) => eb.fn.countAll().as('count'))
      .where('playlist_id', '=', playlistId)
      .executeTakeFirst();
    return Number(row?.count ?? 0);
  }

  /** Highest position on the playlist, or -1 when it is empty. */
  async maxPosition(trx: Executor, playlistId: string): Promise<number> {
    const row = await trx
      .selectFrom('playlist_tracks')
      .select((eb) => eb.fn.max('position').as('max_position'))
      .where('playlist_id', '=', playlistId)
      .executeTakeFirst();
    return row?.max_position === null || row?.max_position === undefined ? -1 : Number(row.max_position);
  }

  async counts(trx: Executor = this.db): Promise<StoreCounts> {
    const artists = await trx.selectFrom('artists').select((eb) => eb.fn.countAll().as('count')).executeTakeFirst();
    const albums = await trx.selectFrom('albums').select((eb) => eb.fn.countAll().as('count')).executeTakeFirst();
    const tracks = await trx.selectFrom('tracks').select((eb) => eb.fn.countAll().as('count')).executeTakeFirst();
    const playlists = await trx.selectFrom('playlists').select((eb) => eb.fn.countAll().as('count')).executeTakeFirst();
    const artistTracks = await trx
      .selectFrom('artist_tracks')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirst();
    const playlistTracks = await trx
      .selectFrom('playlist_tracks')
      .select((eb) => eb.fn.countAll().as('count'))
      .executeTakeFirst();

    return {
      artists: Number(artists?.count ?? 0),
      albums: Number(albums?.count ?? 0),
      tracks: Number(tracks?.count ?? 0),
      playlists: Number(playlists?.count ?? 0),
      artistTracks: Number(artistTracks?.count ?? 0),
      playlistTracks: Number(playlistTracks?.count ?? 0),
    };
  }

  private async getOrCreateArtist(
    trx: Executor,
    key: NamedKey,
    attributes: EntityAttributes['artist']
  ): Promise<GetOrCreateResult<ArtistRow>> {
    const find = () => {
      const query = trx.selectFrom('artists').selectAll();
      return 'externalId' in key
        ? query.where('external_id', '=', key.externalId).executeTakeFirst()
        : query.where('external_id', 'is', null).where('name', '=', key.name).orderBy('id', 'asc').executeTakeFirst();
    };

    const existing = await find();
    if (existing) {
      return { row: existing, created: false };
    }

    const now = timestamp();
    const values = {
      id: generateId(),
      external_id: 'externalId' in key ? key.externalId : null,
      name: attributes.name,
      user_saved: toFlag(attributes.userSaved),
      created_at: now,
      updated_at: now,
    };
    const inserted = await trx
      .insertInto('artists')
      .values(values)
      .onConflict((oc) => oc.column('external_id').doNothing())
      .returningAll()
      .executeTakeFirst();
    if (inserted) {
      return { row: inserted, created: true };
    }

    // Lost the insert to a concurrent writer of the same remote id
    const row = await find();
    if (!row) {
      throw new PersistenceError('artist lookup', new Error(`Artist vanished after conflict: ${values.name}`));
    }
    return { row, created: false };
  }

  private async getOrCreateAlbum(
    trx: Executor,
    key: NamedKey,
    attributes: EntityAttributes['album']
  ): Promise<GetOrCreateResult<AlbumRow>> {
    const find = () => {
      const query = trx.selectFrom('albums').selectAll();
      return 'externalId' in key
        ? query.where('external_id', '=', key.externalId).executeTakeFirst()
        : query.where('external_id', 'is', null).where('name', '=', key.name).orderBy('id', 'asc').executeTakeFirst();
    };

    const existing = await find();
    if (existing) {
      return { row: existing, created: false };
    }

    const now = timestamp();
    const values = {
      id: generateId(),
      external_id: 'externalId' in key ? key.externalId : null,
      name: attributes.name,
      user_saved: toFlag(attributes.userSaved),
      created_at: now,
      updated_at: now,
    };
    const inserted = await trx
      .insertInto('albums')
      .values(values)
      .onConflict((oc) => oc.column('external_id').doNothing())
      .returningAll()
      .executeTakeFirst();
    if (inserted) {
      return { row: inserted, created: true };
    }

    const row = await find();
    if (!row) {
      throw new PersistenceError('album lookup', new Error(`Album vanished after conflict: ${values.name}`));
    }
    return { row, created: false };
  }

  private async getOrCreateTrack(
    trx: Executor,
    key: { externalId: string },
    attributes: EntityAttributes['track']
  ): Promise<GetOrCreateResult<TrackRow>> {
    const find = () => trx.selectFrom('tracks').selectAll().where('external_id', '=', key.externalId).executeTakeFirst();

    const existing = await find();
    if (existing) {
      return { row: existing, created: false };
    }

    const now = timestamp();
    const inserted = await trx
      .insertInto('tracks')
      .values({
        id: generateId(),
        external_id: key.externalId,
        name: attributes.name,
        album_id: attributes.albumId,
        created_at: now,
        updated_at: now,
      })
      .onConflict((oc) => oc.column('external_id').doNothing())
      .returningAll()
      .executeTakeFirst();
    if (inserted) {
      return { row: inserted, created: true };
    }

    const row = await find();
    if (!row) {
      throw new PersistenceError('track lookup', new Error(`Track vanished after conflict: ${key.externalId}`));
    }
    return { row, created: false };
  }

  private async getOrCreatePlaylist(
    trx: Executor,
    key: NaturalKeys['playlist'],
    attributes: EntityAttributes['playlist']
  ): Promise<GetOrCreateResult<PlaylistRow>> {
    const find = () => {
      const query = trx.selectFrom('playlists').selectAll();
      return 'externalId' in key
        ? query.where('external_id', '=', key.externalId).executeTakeFirst()
        : query.where('title', '=', key.title).orderBy('created_at', 'asc').orderBy('id', 'asc').executeTakeFirst();
    };

    const existing = await find();
    if (existing) {
      return { row: existing, created: false };
    }

    const now = timestamp();
    const inserted = await trx
      .insertInto('playlists')
      .values({
        id: generateId(),
        external_id: 'externalId' in key ? key.externalId : (attributes.externalId ?? null),
        title: attributes.title,
        created_at: now,
        updated_at: now,
      })
      .onConflict((oc) => oc.column('external_id').doNothing())
      .returningAll()
      .executeTakeFirst();
    if (inserted) {
      return { row: inserted, created: true };
    }

    const row = await find();
    if (!row) {
      throw new PersistenceError('playlist lookup', new Error(`Playlist vanished after conflict: ${attributes.title}`));
    }
    return { row, created: false };
  }

  private async updateArtist(trx: Executor, id: string, changes: EntityChanges['artist']): Promise<boolean> {
    const current = await trx.selectFrom('artists').select(['name', 'user_saved']).where('id', '=', id).executeTakeFirst();
    if (!current) {
      return false;
    }
    const name = changes.name !== undefined && changes.name !== current.name ? changes.name : undefined;
    const userSaved =
      changes.userSaved !== undefined && toFlag(changes.userSaved) !== Number(current.user_saved)
        ? toFlag(changes.userSaved)
        : undefined;
    if (name === undefined && userSaved === undefined) {
      return false;
    }
    await trx
      .updateTable('artists')
      .set({ name, user_saved: userSaved, updated_at: timestamp() })
      .where('id', '=', id)
      .execute();
    return true;
  }

  private async updateAlbum(trx: Executor, id: string, changes: EntityChanges['album']): Promise<boolean> {
    const current = await trx.selectFrom('albums').select(['name', 'user_saved']).where('id', '=', id).executeTakeFirst();
    if (!current) {
      return false;
    }
    const name = changes.name !== undefined && changes.name !== current.name ? changes.name : undefined;
    const userSaved =
      changes.userSaved !== undefined && toFlag(changes.userSaved) !== Number(current.user_saved)
        ? toFlag(changes.userSaved)
        : undefined;
    if (name === undefined && userSaved === undefined) {
      return false;
    }
    await trx
      .updateTable('albums')
      .set({ name, user_saved: userSaved, updated_at: timestamp() })
      .where('id', '=', id)
      .execute();
    return true;
  }

  private async updateTrack(trx: Executor, id: string, changes: EntityChanges['track']): Promise<boolean> {
    const current = await trx.selectFrom('tracks').select(['name', 'album_id']).where('id', '=', id).executeTakeFirst();
    if (!current) {
      return false;
    }
    const name = changes.name !== undefined && changes.name !== current.name ? changes.name : undefined;
    const albumId = changes.albumId !== undefined && changes.albumId !== current.album_id ? changes.albumId : undefined;
    if (name === undefined && albumId === undefined) {
      return false;
    }
    await trx
      .updateTable('tracks')
      .set({ name, album_id: albumId, updated_at: timestamp() })
      .where('id', '=', id)
      .execute();
    return true;
  }

  private async updatePlaylist(trx: Executor, id: string, changes: EntityChanges['playlist']): Promise<boolean> {
    const current = await trx
      .selectFrom('playlists')
      .select(['title', 'external_id'])
      .where('id', '=', id)
      .executeTakeFirst();
    if (!current) {
      return false;
    }
    const title = changes.title !== undefined && changes.title !== current.title ? changes.title : undefined;
    const externalId =
      changes.externalId !== undefined && changes.externalId !== current.external_id ? changes.externalId : undefined;
    if (title === undefined && externalId === undefined) {
      return false;
    }
    await trx
      .updateTable('playlists')
      .set({ title, external_id: externalId, updated_at: timestamp() })
      .where('id', '=', id)
      .execute();
    return true;
  }

  private async linkArtistTrack(trx: Executor, artistId: string, trackId: string): Promise<boolean> {
    const result = await trx
      .insertInto('artist_tracks')
      .values({ artist_id: artistId, track_id: trackId, created_at: timestamp() })
      .onConflict((oc) => oc.columns(['artist_id', 'track_id']).doNothing())
      .executeTakeFirst();
    return affected(result.numInsertedOrUpdatedRows) > 0;
  }

  private async linkPlaylistTrack(trx: Executor, playlistId: string, trackId: string, position: number): Promise<boolean> {
    const now = timestamp();
    const result = await trx
      .insertInto('playlist_tracks')
      .values({ playlist_id: playlistId, track_id: trackId, position, created_at: now, updated_at: now })
      .onConflict((oc) => oc.columns(['playlist_id', 'track_id']).doNothing())
      .executeTakeFirst();
    return affected(result.numInsertedOrUpdatedRows) > 0;
  }
}
