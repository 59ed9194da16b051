/**
 * Catalog data model
 */

/** A single song as stored in the backing file */
export interface Song {
  title: string;
  number: string;
}

/**
 * A song together with its process-local identity.
 * Ids are assigned on load/insert and never written to disk.
 */
export interface CatalogEntry {
  id: number;
  song: Song;
}

/** Raw form or command input before validation */
export interface SongInput {
  title?: string;
  number?: string;
}

export type SaveResult =
  | { ok: true; count: number }
  | { ok: false; error: string };

export interface SongStorage {
  readonly filePath: string;
  load(): Song[];
  save(songs: readonly Song[]): SaveResult;
}
