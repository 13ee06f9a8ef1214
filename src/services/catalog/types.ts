import type { RawAlbum, RawArtist, RawPlaylist, RawTrack } from './schema.js';

/**
 * Read side of the remote catalog. Implementations enforce their own request
 * timeouts and reject with CatalogRequestError.
 */
export interface CatalogReader {
  fetchPlaylists(): Promise<RawPlaylist[]>;
  fetchPlaylistTracks(playlistId: string): Promise<RawTrack[]>;
  /** Albums saved in the user's library, each with its track list. */
  fetchAlbums(): Promise<RawAlbum[]>;
  /** Artists saved (subscribed) in the user's library. */
  fetchArtists(): Promise<RawArtist[]>;
}

/**
 * Write side of the remote catalog. Only the mirror playlist builder calls it.
 */
export interface CatalogWriter {
  createPlaylist(title: string): Promise<string>;
  addTracksToPlaylist(playlistId: string, trackIds: string[]): Promise<void>;
}

export interface CatalogClient extends CatalogReader, CatalogWriter {}

export interface PlaylistSnapshot {
  playlist: RawPlaylist;
  tracks: RawTrack[];
}

/** A complete read of the remote library, taken before any local write. */
export interface RemoteSnapshot {
  playlists: PlaylistSnapshot[];
  albums: RawAlbum[];
  artists: RawArtist[];
  fetchedAt: string;
}
