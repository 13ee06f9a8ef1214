import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { closeDatabase, type Db } from '../../db/index.js';
import { createTestDb, silentLogger } from '../../test/helpers.js';
import { MalformedRecordError, PersistenceError } from '../../utils/errors.js';
import { EntityStore, MIRROR_PLAYLIST_TITLE } from './entity-store.js';

describe('EntityStore', () => {
  let db: Db;
  let store: EntityStore;

  beforeEach(async () => {
    db = await createTestDb();
    store = new EntityStore(db, silentLogger);
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  async function seedTrack(externalId: string, albumName = 'Album A') {
    return store.unit('seed', async (trx) => {
      const album = await store.getOrCreate(trx, 'album', { name: albumName }, { name: albumName });
      const track = await store.getOrCreate(trx, 'track', { externalId }, { name: externalId, albumId: album.row.id });
      return { albumId: album.row.id, trackId: track.row.id };
    });
  }

  test('getOrCreate resolves a repeated external id to the same row', async () => {
    const first = await store.unit('a', (trx) =>
      store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'First' })
    );
    const second = await store.unit('b', (trx) =>
      store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'Renamed' })
    );

    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.row.id).toBe(first.row.id);
    expect(second.row.name).toBe('First');
    expect((await store.counts()).artists).toBe(1);
  });

  test('name keys only match rows without a remote id', async () => {
    await store.unit('seed', (trx) => store.getOrCreate(trx, 'album', { externalId: 'al-1' }, { name: 'Shared' }));

    const byName = await store.unit('a', (trx) => store.getOrCreate(trx, 'album', { name: 'Shared' }, { name: 'Shared' }));
    const again = await store.unit('b', (trx) => store.getOrCreate(trx, 'album', { name: 'Shared' }, { name: 'Shared' }));

    expect(byName.created).toBe(true);
    expect(byName.row.external_id).toBeNull();
    expect(again.created).toBe(false);
    expect(again.row.id).toBe(byName.row.id);
    expect((await store.counts()).albums).toBe(2);
  });

  test('playlists can be keyed by title with an external id attached', async () => {
    const created = await store.unit('mirror', (trx) =>
      store.getOrCreate(trx, 'playlist', { title: MIRROR_PLAYLIST_TITLE }, { title: MIRROR_PLAYLIST_TITLE, externalId: 'remote-9' })
    );
    expect(created.row.external_id).toBe('remote-9');

    const found = await store.findPlaylistByExternalId(db, 'remote-9');
    expect(found?.id).toBe(created.row.id);
    expect((await store.findMirrorPlaylist(db))?.id).toBe(created.row.id);
  });

  test('link is a no-op for an existing pair', async () => {
    const { trackId } = await seedTrack('t-1');
    const artistId = await store.unit('artist', async (trx) => {
      const artist = await store.getOrCreate(trx, 'artist', { name: 'Solo' }, { name: 'Solo' });
      return artist.row.id;
    });

    const first = await store.unit('l1', (trx) => store.link(trx, 'artist_track', artistId, trackId, {}));
    const second = await store.unit('l2', (trx) => store.link(trx, 'artist_track', artistId, trackId, {}));

    expect(first).toBe(true);
    expect(second).toBe(false);
    expect((await store.counts()).artistTracks).toBe(1);
  });

  test('setPosition reports whether the position changed', async () => {
    const { trackId } = await seedTrack('t-1');
    const playlistId = await store.unit('p', async (trx) => {
      const playlist = await store.getOrCreate(trx, 'playlist', { externalId: 'p-1' }, { title: 'P1' });
      await store.link(trx, 'playlist_track', playlist.row.id, trackId, { position: 0 });
      return playlist.row.id;
    });

    expect(await store.setPosition(db, playlistId, trackId, 0)).toBe(false);
    expect(await store.setPosition(db, playlistId, trackId, 3)).toBe(true);
    expect(await store.maxPosition(db, playlistId)).toBe(3);
  });

  test('update only writes fields that differ', async () => {
    const artist = await store.unit('a', (trx) =>
      store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'Name', userSaved: true })
    );

    expect(await store.update(db, 'artist', artist.row.id, { name: 'Name', userSaved: true })).toBe(false);
    expect(await store.update(db, 'artist', artist.row.id, { userSaved: false })).toBe(true);
    expect(await store.update(db, 'artist', 'missing', { name: 'x' })).toBe(false);

    const row = await db.selectFrom('artists').selectAll().where('id', '=', artist.row.id).executeTakeFirstOrThrow();
    expect(Number(row.user_saved)).toBe(0);
    expect(row.name).toBe('Name');
  });

  test('unlinkPlaylistTracksExcept keeps the retained set', async () => {
    const one = await seedTrack('t-1');
    const two = await seedTrack('t-2');
    const playlistId = await store.unit('p', async (trx) => {
      const playlist = await store.getOrCreate(trx, 'playlist', { externalId: 'p-1' }, { title: 'P1' });
      await store.link(trx, 'playlist_track', playlist.row.id, one.trackId, { position: 0 });
      await store.link(trx, 'playlist_track', playlist.row.id, two.trackId, { position: 1 });
      return playlist.row.id;
    });

    const removed = await store.unit('u', (trx) => store.unlinkPlaylistTracksExcept(trx, playlistId, new Set([two.trackId])));

    expect(removed).toBe(1);
    expect(await store.countLinks(db, playlistId)).toBe(1);
  });

  test('unit rolls back and wraps storage failures', async () => {
    const failing = store.unit('broken', async (trx) => {
      await store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'Rolled back' });
      await trx
        .insertInto('tracks')
        .values({
          id: 'track-1',
          external_id: 't-1',
          name: 'Dangling',
          album_id: 'no-such-album',
          created_at: '2026-01-01T00:00:00.000Z',
          updated_at: '2026-01-01T00:00:00.000Z',
        })
        .execute();
    });

    await expect(failing).rejects.toBeInstanceOf(PersistenceError);
    expect((await store.counts()).artists).toBe(0);
  });

  test('unit passes domain errors through unchanged', async () => {
    const error = new MalformedRecordError('track', 't-1', ['title: Required']);
    await expect(
      store.unit('domain', async () => {
        throw error;
      })
    ).rejects.toBe(error);
  });

  test('unit replays once after a uniqueness conflict', async () => {
    await store.unit('seed', (trx) => store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'Existing' }));

    let attempts = 0;
    const result = await store.unit('racy', async (trx) => {
      attempts++;
      if (attempts === 1) {
        // Plain insert of a key that already exists, as a losing concurrent writer would see it
        await trx
          .insertInto('artists')
          .values({
            id: 'dup',
            external_id: 'ar-1',
            name: 'Duplicate',
            user_saved: 0,
            created_at: '2026-01-01T00:00:00.000Z',
            updated_at: '2026-01-01T00:00:00.000Z',
          })
          .execute();
      }
      const found = await store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'Ignored' });
      return found.row.name;
    });

    expect(attempts).toBe(2);
    expect(result).toBe('Existing');
  });

  test('a conflict that repeats surfaces as PersistenceError', async () => {
    await store.unit('seed', (trx) => store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'Existing' }));

    let attempts = 0;
    const failing = store.unit('always conflicting', async (trx) => {
      attempts++;
      await trx
        .insertInto('artists')
        .values({
          id: `dup-${attempts}`,
          external_id: 'ar-1',
          name: 'Duplicate',
          user_saved: 0,
          created_at: '2026-01-01T00:00:00.000Z',
          updated_at: '2026-01-01T00:00:00.000Z',
        })
        .execute();
    });

    await expect(failing).rejects.toBeInstanceOf(PersistenceError);
    expect(attempts).toBe(2);
  });

  describe('deleteUnreferenced', () => {
    test('removes unreachable rows and keeps reachable ones', async () => {
      const kept = await seedTrack('t-kept', 'Kept Album');
      const orphan = await seedTrack('t-orphan', 'Orphan Album');
      const saved = await seedTrack('t-saved', 'Saved Album');

      await store.unit('links', async (trx) => {
        const playlist = await store.getOrCreate(trx, 'playlist', { externalId: 'p-1' }, { title: 'P1' });
        await store.link(trx, 'playlist_track', playlist.row.id, kept.trackId, { position: 0 });
        await store.update(trx, 'album', saved.albumId, { userSaved: true });

        const artist = await store.getOrCreate(trx, 'artist', { name: 'Orphan Artist' }, { name: 'Orphan Artist' });
        await store.link(trx, 'artist_track', artist.row.id, orphan.trackId, {});
        await store.getOrCreate(trx, 'playlist', { externalId: 'p-empty' }, { title: 'Empty' });
      });

      const removed = await store.unit('sweep', (trx) =>
        store.deleteUnreferenced(trx, { keepTrackIds: new Set([saved.trackId]) })
      );

      expect(removed).toEqual({ tracks: 1, artists: 1, albums: 1, playlists: 1, links: 1 });
      expect(await store.counts()).toEqual({
        artists: 0,
        albums: 2,
        tracks: 2,
        playlists: 1,
        artistTracks: 0,
        playlistTracks: 1,
      });
    });

    test('tracks only on the mirror are not kept by it, and the mirror itself survives', async () => {
      const { trackId } = await seedTrack('t-1');
      await store.unit('mirror', async (trx) => {
        const mirror = await store.getOrCreate(
          trx,
          'playlist',
          { title: MIRROR_PLAYLIST_TITLE },
          { title: MIRROR_PLAYLIST_TITLE, externalId: 'remote-1' }
        );
        await store.link(trx, 'playlist_track', mirror.row.id, trackId, { position: 0 });
      });

      const removed = await store.unit('sweep', (trx) => store.deleteUnreferenced(trx));

      expect(removed).toEqual({ tracks: 1, artists: 0, albums: 1, playlists: 0, links: 1 });
      expect((await store.findMirrorPlaylist(db))?.external_id).toBe('remote-1');
    });

    test('a saved album does not keep tracks outside the kept set', async () => {
      const listed = await seedTrack('t-listed', 'Saved Album');
      await seedTrack('t-dropped', 'Saved Album');
      await store.unit('save', (trx) => store.update(trx, 'album', listed.albumId, { userSaved: true }));

      const removed = await store.unit('sweep', (trx) =>
        store.deleteUnreferenced(trx, { keepTrackIds: new Set([listed.trackId]) })
      );

      expect(removed).toEqual({ tracks: 1, artists: 0, albums: 0, playlists: 0, links: 0 });
      const remaining = await db.selectFrom('tracks').select('external_id').execute();
      expect(remaining).toEqual([{ external_id: 't-listed' }]);
    });

    test('keeps empty playlists that are listed as present', async () => {
      const playlistId = await store.unit('p', async (trx) => {
        const playlist = await store.getOrCreate(trx, 'playlist', { externalId: 'p-1' }, { title: 'Empty' });
        return playlist.row.id;
      });

      const removed = await store.unit('sweep', (trx) =>
        store.deleteUnreferenced(trx, { keepPlaylistIds: new Set([playlistId]) })
      );

      expect(removed.playlists).toBe(0);
      expect((await store.counts()).playlists).toBe(1);
    });
  });

  test('listTracksMissingFrom returns tracks not on the playlist', async () => {
    const one = await seedTrack('t-1');
    await seedTrack('t-2');
    const playlistId = await store.unit('p', async (trx) => {
      const playlist = await store.getOrCreate(trx, 'playlist', { externalId: 'p-1' }, { title: 'P1' });
      await store.link(trx, 'playlist_track', playlist.row.id, one.trackId, { position: 0 });
      return playlist.row.id;
    });

    const missing = await store.listTracksMissingFrom(db, playlistId);
    expect(missing.map((row) => row.external_id)).toEqual(['t-2']);
    expect(await store.maxPosition(db, 'no-such-playlist')).toBe(-1);
  });

  test('unsaveExcept clears flags outside the keep set', async () => {
    const ids = await store.unit('seed', async (trx) => {
      const a = await store.getOrCreate(trx, 'artist', { externalId: 'ar-1' }, { name: 'A', userSaved: true });
      const b = await store.getOrCreate(trx, 'artist', { externalId: 'ar-2' }, { name: 'B', userSaved: true });
      return [a.row.id, b.row.id];
    });

    const updated = await store.unit('unsave', (trx) => store.unsaveExcept(trx, 'artist', new Set([ids[0]])));

    expect(updated).toBe(1);
    const saved = await db.selectFrom('artists').select('name').where('user_saved', '=', 1).execute();
    expect(saved.map((row) => row.name)).toEqual(['A']);
  });
});
