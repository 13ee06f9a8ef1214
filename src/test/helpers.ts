import { createDatabase, initializeDatabase, type Db } from '../db/index.js';
import type { RawAlbum, RawArtist, RawPlaylist, RawTrack } from '../services/catalog/schema.js';
import type { CatalogClient, RemoteSnapshot } from '../services/catalog/types.js';
import { CatalogRequestError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

export const silentLogger = createLogger('silent');

export async function createTestDb(): Promise<Db> {
  const db = createDatabase(':memory:');
  await initializeDatabase(db);
  return db;
}

export function track(id: string, title: string, artist = 'Artist A', album: string | null = 'Album A'): RawTrack {
  return {
    id,
    title,
    album: album === null ? null : { id: `al-${album}`, name: album },
    artists: [{ id: `ar-${artist}`, name: artist }],
  };
}

export function snapshot(
  playlists: Array<{ playlist: RawPlaylist; tracks: RawTrack[] }>,
  library: { albums?: RawAlbum[]; artists?: RawArtist[] } = {}
): RemoteSnapshot {
  return {
    playlists,
    albums: library.albums ?? [],
    artists: library.artists ?? [],
    fetchedAt: '2026-01-01T00:00:00.000Z',
  };
}

interface FakePlaylist {
  playlist: RawPlaylist;
  tracks: RawTrack[];
}

/** In-memory remote catalog. Writes are recorded so tests can count them. */
export class FakeCatalog implements CatalogClient {
  playlists: FakePlaylist[] = [];
  albums: RawAlbum[] = [];
  artists: RawArtist[] = [];

  readonly created: string[] = [];
  readonly added: Array<{ playlistId: string; trackIds: string[] }> = [];
  failOn = new Map<string, Error>();

  private nextId = 1;

  async fetchPlaylists(): Promise<RawPlaylist[]> {
    this.maybeFail('fetchPlaylists');
    return this.playlists.map((entry) => ({ ...entry.playlist }));
  }

  async fetchPlaylistTracks(playlistId: string): Promise<RawTrack[]> {
    this.maybeFail('fetchPlaylistTracks');
    const entry = this.playlists.find((candidate) => candidate.playlist.id === playlistId);
    return entry ? [...entry.tracks] : [];
  }

  async fetchAlbums(): Promise<RawAlbum[]> {
    this.maybeFail('fetchAlbums');
    return [...this.albums];
  }

  async fetchArtists(): Promise<RawArtist[]> {
    this.maybeFail('fetchArtists');
    return [...this.artists];
  }

  async createPlaylist(title: string): Promise<string> {
    this.maybeFail('createPlaylist');
    const id = `remote-${this.nextId++}`;
    this.created.push(title);
    this.playlists.push({ playlist: { id, title }, tracks: [] });
    return id;
  }

  async addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void> {
    this.maybeFail('addTracksToPlaylist');
    const entry = this.playlists.find((candidate) => candidate.playlist.id === playlistId);
    if (!entry) {
      throw new CatalogRequestError('addTracksToPlaylist', 'HTTP 404', { status: 404, transient: false });
    }
    this.added.push({ playlistId, trackIds: [...trackIds] });
    entry.tracks.push(...trackIds.map((id) => ({ id })));
  }

  get addedTrackIds(): string[] {
    return this.added.flatMap((call) => call.trackIds);
  }

  private maybeFail(operation: string): void {
    const error = this.failOn.get(operation);
    if (error) {
      throw error;
    }
  }
}
