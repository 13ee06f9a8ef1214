import { z } from 'zod';
import { MalformedRecordError, type RecordKind } from '../../utils/errors.js';

// Loose shapes: what the remote may hand back. Every field is optional so a
// partially broken record still reaches the reconciler, which reports it.
// Unknown keys are stripped.

const rawRefSchema = z.object({
  id: z.string().nullish(),
  name: z.string().nullish(),
});

export const rawTrackSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
  album: rawRefSchema.nullish(),
  artists: z.array(rawRefSchema).nullish(),
});

export const rawPlaylistSchema = z.object({
  id: z.string().nullish(),
  title: z.string().nullish(),
});

export const rawAlbumSchema = rawRefSchema.extend({
  tracks: z
    .array(z.unknown())
    .nullish()
    .transform((items) => items?.map(coerceTrack)),
});

export const rawArtistSchema = rawRefSchema;

export type RawTrack = z.infer<typeof rawTrackSchema>;
export type RawPlaylist = z.infer<typeof rawPlaylistSchema>;
export type RawAlbum = z.infer<typeof rawAlbumSchema>;
export type RawArtist = z.infer<typeof rawArtistSchema>;

// Strict shapes: what the store accepts.

const requiredText = z.string().trim().min(1);

const refSchema = z.object({
  id: requiredText.nullish().transform((value) => value ?? null),
  name: requiredText,
});

export const trackSchema = z.object({
  id: requiredText,
  title: requiredText,
  album: refSchema.nullish().transform((value) => value ?? null),
  artists: z
    .array(refSchema)
    .nullish()
    .transform((value) => value ?? []),
});

export const playlistSchema = z.object({
  id: requiredText,
  title: requiredText,
});

export const albumSchema = refSchema;
export const artistSchema = refSchema;

export type TrackRecord = z.infer<typeof trackSchema>;
export type PlaylistRecord = z.infer<typeof playlistSchema>;
export type EntityRef = z.infer<typeof refSchema>;

function describeRef(raw: { id?: string | null; title?: string | null; name?: string | null }): string {
  return raw.id || raw.title || raw.name || '<unknown>';
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  kind: RecordKind,
  raw: { id?: string | null; title?: string | null; name?: string | null }
): z.infer<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new MalformedRecordError(kind, describeRef(raw), issues);
  }
  return result.data;
}

export function parseTrack(raw: RawTrack): TrackRecord {
  return validate(trackSchema, 'track', raw);
}

export function parsePlaylist(raw: RawPlaylist): PlaylistRecord {
  return validate(playlistSchema, 'playlist', raw);
}

export function parseAlbum(raw: RawAlbum): EntityRef {
  return validate(albumSchema, 'album', raw);
}

export function parseArtist(raw: RawArtist): EntityRef {
  return validate(artistSchema, 'artist', raw);
}

// Coerce one item of a remote list into its loose shape; anything that is not
// even an object becomes an empty record and is reported downstream.

export function coerceTrack(item: unknown): RawTrack {
  const result = rawTrackSchema.safeParse(item);
  return result.success ? result.data : {};
}

export function coercePlaylist(item: unknown): RawPlaylist {
  const result = rawPlaylistSchema.safeParse(item);
  return result.success ? result.data : {};
}

export function coerceAlbum(item: unknown): RawAlbum {
  const result = rawAlbumSchema.safeParse(item);
  return result.success ? result.data : {};
}

export function coerceArtist(item: unknown): RawArtist {
  const result = rawArtistSchema.safeParse(item);
  return result.success ? result.data : {};
}
