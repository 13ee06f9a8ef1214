export {
  EntityStore,
  MIRROR_PLAYLIST_TITLE,
  type AlbumRow,
  type ArtistRow,
  type EntityKind,
  type Executor,
  type GetOrCreateResult,
  type LinkKind,
  type NamedKey,
  type PlaylistRow,
  type RemovalCounts,
  type StoreCounts,
  type SweepOptions,
  type TrackRow,
  type Trx,
} from './entity-store.js';
