import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { closeDatabase, type Db } from '../../db/index.js';
import { createTestDb, silentLogger, snapshot, track } from '../../test/helpers.js';
import { SyncCancelledError } from '../../utils/errors.js';
import { EntityStore, MIRROR_PLAYLIST_TITLE } from '../store/index.js';
import { Reconciler, UNKNOWN_ALBUM } from './reconciler.js';

describe('Reconciler', () => {
  let db: Db;
  let store: EntityStore;
  let reconciler: Reconciler;

  const p1 = { id: 'p1', title: 'P1' };
  const p2 = { id: 'p2', title: 'P2' };

  beforeEach(async () => {
    db = await createTestDb();
    store = new EntityStore(db, silentLogger);
    reconciler = new Reconciler(store, silentLogger);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  async function positions(playlistExternalId: string): Promise<Array<[string, number]>> {
    const rows = await db
      .selectFrom('playlist_tracks')
      .innerJoin('playlists', 'playlists.id', 'playlist_tracks.playlist_id')
      .innerJoin('tracks', 'tracks.id', 'playlist_tracks.track_id')
      .select(['tracks.external_id', 'playlist_tracks.position'])
      .where('playlists.external_id', '=', playlistExternalId)
      .orderBy('playlist_tracks.position', 'asc')
      .execute();
    return rows.map((row) => [row.external_id, Number(row.position)]);
  }

  test('creates the full graph for a new track, then converges', async () => {
    const first = await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'v1')] }]));

    expect(first).toEqual({ created: 6, updated: 0, removed: 0, errors: [] });
    expect(await store.counts()).toEqual({
      artists: 1,
      albums: 1,
      tracks: 1,
      playlists: 1,
      artistTracks: 1,
      playlistTracks: 1,
    });
    expect(await positions('p1')).toEqual([['t1', 0]]);

    const second = await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'v1')] }]));
    expect(second).toEqual({ created: 0, updated: 0, removed: 0, errors: [] });
  });

  test('removing the only reference prunes the track and everything under it', async () => {
    await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'v1')] }]));

    const report = await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [] }]));

    // one playlist link, then the track, its artist link, artist and album
    expect(report.removed).toBe(5);
    expect(await store.counts()).toEqual({
      artists: 0,
      albums: 0,
      tracks: 0,
      playlists: 1,
      artistTracks: 0,
      playlistTracks: 0,
    });
  });

  test('a track on two playlists is stored once', async () => {
    await reconciler.reconcile(
      snapshot([
        { playlist: p1, tracks: [track('t1', 'v1')] },
        { playlist: p2, tracks: [track('t1', 'v1')] },
      ])
    );

    const counts = await store.counts();
    expect(counts.tracks).toBe(1);
    expect(counts.playlistTracks).toBe(2);
    expect(counts.artistTracks).toBe(1);
  });

  test('a repeated entry keeps its first position', async () => {
    await reconciler.reconcile(
      snapshot([{ playlist: p1, tracks: [track('t1', 'one'), track('t2', 'two'), track('t1', 'one')] }])
    );

    expect(await positions('p1')).toEqual([
      ['t1', 0],
      ['t2', 1],
    ]);
  });

  test('reordering updates positions only', async () => {
    await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'one'), track('t2', 'two')] }]));

    const report = await reconciler.reconcile(
      snapshot([{ playlist: p1, tracks: [track('t2', 'two'), track('t1', 'one')] }])
    );

    expect(report).toEqual({ created: 0, updated: 2, removed: 0, errors: [] });
    expect(await positions('p1')).toEqual([
      ['t2', 0],
      ['t1', 1],
    ]);
  });

  test('title and album drift are applied', async () => {
    await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'v1')] }]));

    const renamed = await reconciler.reconcile(
      snapshot([{ playlist: { id: 'p1', title: 'Renamed' }, tracks: [track('t1', 'v1')] }])
    );
    expect(renamed).toEqual({ created: 0, updated: 1, removed: 0, errors: [] });

    const moved = await reconciler.reconcile(
      snapshot([{ playlist: { id: 'p1', title: 'Renamed' }, tracks: [track('t1', 'v2', 'Artist A', 'Album B')] }])
    );
    // new album created, track renamed and moved, old album swept
    expect(moved).toEqual({ created: 1, updated: 1, removed: 1, errors: [] });

    const row = await db
      .selectFrom('tracks')
      .innerJoin('albums', 'albums.id', 'tracks.album_id')
      .select(['tracks.name', 'albums.name as album'])
      .executeTakeFirstOrThrow();
    expect(row).toEqual({ name: 'v2', album: 'Album B' });
  });

  test('tracks without an album share the placeholder album', async () => {
    await reconciler.reconcile(
      snapshot([{ playlist: p1, tracks: [track('t1', 'one', 'A', null), track('t2', 'two', 'B', null)] }])
    );

    const albums = await db.selectFrom('albums').select(['name', 'external_id']).execute();
    expect(albums).toEqual([{ name: UNKNOWN_ALBUM, external_id: null }]);
    expect((await store.counts()).tracks).toBe(2);
  });

  test('malformed records are reported and skipped', async () => {
    const report = await reconciler.reconcile(
      snapshot([
        { playlist: p1, tracks: [{ id: 't-bad' }, track('t1', 'v1')] },
        { playlist: { id: 'p-untitled' }, tracks: [track('t2', 'two')] },
      ])
    );

    expect(report.errors).toEqual([
      { kind: 'track', ref: 't-bad', error: 'Malformed track record t-bad: title: Required' },
      { kind: 'playlist', ref: 'p-untitled', error: 'Malformed playlist record p-untitled: title: Required' },
    ]);
    expect(await positions('p1')).toEqual([['t1', 1]]);
    expect((await store.counts()).tracks).toBe(1);
  });

  test('a malformed read of a known track keeps its membership', async () => {
    await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'v1')] }]));

    const report = await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [{ id: 't1' }] }]));

    expect(report.created).toBe(0);
    expect(report.removed).toBe(0);
    expect(report.errors).toHaveLength(1);
    expect(await positions('p1')).toEqual([['t1', 0]]);
  });

  test('playlists gone from the remote lose their links and are swept', async () => {
    await reconciler.reconcile(
      snapshot([
        { playlist: p1, tracks: [track('t1', 'one')] },
        { playlist: p2, tracks: [track('t2', 'two')] },
      ])
    );

    const report = await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'one')] }]));

    // P2's link, then t2, its artist link and P2 itself
    expect(report.removed).toBe(4);
    expect((await store.listPlaylists(db)).map((row) => row.external_id)).toEqual(['p1']);
  });

  test('empty remote playlists are kept across runs', async () => {
    await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [] }]));
    const second = await reconciler.reconcile(snapshot([{ playlist: p1, tracks: [] }]));

    expect(second).toEqual({ created: 0, updated: 0, removed: 0, errors: [] });
    expect((await store.counts()).playlists).toBe(1);
  });

  test('saved artists and albums follow the library lists', async () => {
    const library = {
      artists: [{ id: 'ar-x', name: 'X' }],
      albums: [{ id: 'al-s', name: 'Saved', tracks: [{ id: 't9', title: 'Nine', artists: [{ id: 'ar-y', name: 'Y' }] }] }],
    };

    const first = await reconciler.reconcile(snapshot([], library));
    expect(first).toEqual({ created: 5, updated: 0, removed: 0, errors: [] });

    const stored = await db
      .selectFrom('tracks')
      .innerJoin('albums', 'albums.id', 'tracks.album_id')
      .select(['tracks.external_id', 'albums.external_id as album'])
      .executeTakeFirstOrThrow();
    expect(stored).toEqual({ external_id: 't9', album: 'al-s' });

    const second = await reconciler.reconcile(snapshot([]));
    // both unsaved, then t9, its artist link, X, Y and the album swept
    expect(second).toEqual({ created: 0, updated: 2, removed: 5, errors: [] });
    expect(await store.counts()).toEqual({
      artists: 0,
      albums: 0,
      tracks: 0,
      playlists: 0,
      artistTracks: 0,
      playlistTracks: 0,
    });
  });

  describe('saved albums', () => {
    const albumTrack = (id: string, title: string) => ({
      id,
      title,
      artists: [{ id: 'ar-Artist A', name: 'Artist A' }],
    });
    const savedAlbum = (...tracks: Array<{ id: string; title?: string }>) => ({ id: 'al-s', name: 'Saved', tracks });

    async function trackIds(): Promise<string[]> {
      const rows = await db.selectFrom('tracks').select('external_id').orderBy('external_id', 'asc').execute();
      return rows.map((row) => row.external_id);
    }

    test('a track dropped from a saved album is pruned', async () => {
      await reconciler.reconcile(
        snapshot([], { albums: [savedAlbum(albumTrack('t1', 'one'), albumTrack('t2', 'two'))] })
      );

      const report = await reconciler.reconcile(snapshot([], { albums: [savedAlbum(albumTrack('t1', 'one'))] }));

      // t2 and its artist link
      expect(report).toEqual({ created: 0, updated: 0, removed: 2, errors: [] });
      expect(await trackIds()).toEqual(['t1']);
      expect((await store.counts()).albums).toBe(1);
    });

    test('an unreadable entry of a saved album keeps the stored track', async () => {
      await reconciler.reconcile(snapshot([], { albums: [savedAlbum(albumTrack('t1', 'one'))] }));

      const report = await reconciler.reconcile(snapshot([], { albums: [savedAlbum({ id: 't1' })] }));

      expect(report.removed).toBe(0);
      expect(report.errors).toHaveLength(1);
      expect(await trackIds()).toEqual(['t1']);
    });

    test('a saved-album track also on a playlist without an album keeps its album', async () => {
      const library = { albums: [savedAlbum(albumTrack('t1', 'one'))] };
      const playlists = [{ playlist: p1, tracks: [track('t1', 'one', 'Artist A', null)] }];

      // album, track, artist and artist link, then the playlist and its link
      const first = await reconciler.reconcile(snapshot(playlists, library));
      expect(first).toEqual({ created: 6, updated: 0, removed: 0, errors: [] });

      const second = await reconciler.reconcile(snapshot(playlists, library));
      expect(second).toEqual({ created: 0, updated: 0, removed: 0, errors: [] });

      const albums = await db.selectFrom('albums').select(['name', 'external_id']).execute();
      expect(albums).toEqual([{ name: 'Saved', external_id: 'al-s' }]);
    });
  });

  test('the remote copy of the mirror playlist is ignored', async () => {
    await reconciler.reconcile(
      snapshot([{ playlist: { id: 'remote-1', title: MIRROR_PLAYLIST_TITLE }, tracks: [track('t1', 'v1')] }])
    );

    expect((await store.counts()).playlists).toBe(0);
    expect((await store.counts()).tracks).toBe(0);
  });

  test('a cancelled signal stops before any write', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      reconciler.reconcile(snapshot([{ playlist: p1, tracks: [track('t1', 'v1')] }]), { signal: controller.signal })
    ).rejects.toBeInstanceOf(SyncCancelledError);
    expect((await store.counts()).playlists).toBe(0);
  });
});
