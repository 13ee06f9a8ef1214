import type { Kysely } from 'kysely';

export interface Database {
  artists: ArtistTable;
  albums: AlbumTable;
  tracks: TrackTable;
  playlists: PlaylistTable;
  artist_tracks: ArtistTrackTable;
  playlist_tracks: PlaylistTrackTable;
  sync_runs: SyncRunTable;
}

// Booleans are stored as 0/1 and timestamps as ISO strings so the same
// schema runs unchanged on PostgreSQL and SQLite.
export type Flag = 0 | 1;

export interface ArtistTable {
  id: string;
  external_id: string | null;
  name: string;
  user_saved: Flag;
  created_at: string;
  updated_at: string;
}

export interface AlbumTable {
  id: string;
  external_id: string | null;
  name: string;
  user_saved: Flag;
  created_at: string;
  updated_at: string;
}

export interface TrackTable {
  id: string;
  external_id: string;
  name: string;
  album_id: string;
  created_at: string;
  updated_at: string;
}

export interface PlaylistTable {
  id: string;
  external_id: string | null;
  title: string;
  created_at: string;
  updated_at: string;
}

export interface ArtistTrackTable {
  artist_id: string;
  track_id: string;
  created_at: string;
}

export interface PlaylistTrackTable {
  playlist_id: string;
  track_id: string;
  position: number;
  created_at: string;
  updated_at: string;
}

export type SyncRunStatus = 'running' | 'done' | 'failed';

export interface SyncRunTable {
  id: string;
  status: SyncRunStatus;
  mirror_enabled: Flag;
  started_at: string;
  finished_at: string | null;
  created: number;
  updated: number;
  removed: number;
  error_count: number;
  mirror_added: number | null;
  mirror_already_present: number | null;
  error_message: string | null;
}

export async function createSchema(db: Kysely<Database>): Promise<void> {
  await db.schema
    .createTable('artists')
    .ifNotExists()
    .addColumn('id', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('external_id', 'varchar(255)', (col) => col.unique())
    .addColumn('name', 'varchar(500)', (col) => col.notNull())
    .addColumn('user_saved', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('created_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('albums')
    .ifNotExists()
    .addColumn('id', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('external_id', 'varchar(255)', (col) => col.unique())
    .addColumn('name', 'varchar(500)', (col) => col.notNull())
    .addColumn('user_saved', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('created_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('tracks')
    .ifNotExists()
    .addColumn('id', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('external_id', 'varchar(255)', (col) => col.notNull().unique())
    .addColumn('name', 'varchar(500)', (col) => col.notNull())
    .addColumn('album_id', 'varchar(255)', (col) => col.notNull())
    .addColumn('created_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .addForeignKeyConstraint('tracks_album_id_fk', ['album_id'], 'albums', ['id'])
    .execute();

  await db.schema
    .createTable('playlists')
    .ifNotExists()
    .addColumn('id', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('external_id', 'varchar(255)', (col) => col.unique())
    .addColumn('title', 'varchar(500)', (col) => col.notNull())
    .addColumn('created_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .execute();

  await db.schema
    .createTable('artist_tracks')
    .ifNotExists()
    .addColumn('artist_id', 'varchar(255)', (col) => col.notNull())
    .addColumn('track_id', 'varchar(255)', (col) => col.notNull())
    .addColumn('created_at', 'varchar(40)', (col) => col.notNull())
    .addPrimaryKeyConstraint('artist_tracks_pk', ['artist_id', 'track_id'])
    .addForeignKeyConstraint('artist_tracks_artist_id_fk', ['artist_id'], 'artists', ['id'])
    .addForeignKeyConstraint('artist_tracks_track_id_fk', ['track_id'], 'tracks', ['id'])
    .execute();

  await db.schema
    .createTable('playlist_tracks')
    .ifNotExists()
    .addColumn('playlist_id', 'varchar(255)', (col) => col.notNull())
    .addColumn('track_id', 'varchar(255)', (col) => col.notNull())
    .addColumn('position', 'integer', (col) => col.notNull())
    .addColumn('created_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('updated_at', 'varchar(40)', (col) => col.notNull())
    .addPrimaryKeyConstraint('playlist_tracks_pk', ['playlist_id', 'track_id'])
    .addForeignKeyConstraint('playlist_tracks_playlist_id_fk', ['playlist_id'], 'playlists', ['id'])
    .addForeignKeyConstraint('playlist_tracks_track_id_fk', ['track_id'], 'tracks', ['id'])
    .execute();

  await db.schema
    .createTable('sync_runs')
    .ifNotExists()
    .addColumn('id', 'varchar(255)', (col) => col.primaryKey())
    .addColumn('status', 'varchar(20)', (col) => col.notNull())
    .addColumn('mirror_enabled', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('started_at', 'varchar(40)', (col) => col.notNull())
    .addColumn('finished_at', 'varchar(40)')
    .addColumn('created', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('updated', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('removed', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('error_count', 'integer', (col) => col.defaultTo(0).notNull())
    .addColumn('mirror_added', 'integer')
    .addColumn('mirror_already_present', 'integer')
    .addColumn('error_message', 'text')
    .execute();

  await db.schema
    .createIndex('idx_tracks_album_id')
    .ifNotExists()
    .on('tracks')
    .column('album_id')
    .execute();

  await db.schema
    .createIndex('idx_artist_tracks_track_id')
    .ifNotExists()
    .on('artist_tracks')
    .column('track_id')
    .execute();

  await db.schema
    .createIndex('idx_playlist_tracks_track_id')
    .ifNotExists()
    .on('playlist_tracks')
    .column('track_id')
    .execute();

  await db.schema
    .createIndex('idx_playlists_title')
    .ifNotExists()
    .on('playlists')
    .column('title')
    .execute();

  await db.schema
    .createIndex('idx_sync_runs_started_at')
    .ifNotExists()
    .on('sync_runs')
    .column('started_at')
    .execute();
}
