/**
 * Catalog editor
 * Owns the in-memory catalog, the active search query and the filtered view.
 * Every mutation recomputes the view and rewrites the backing file.
 */

import { logger } from '../logger.js';
import { parseImportText } from './import-parser.js';
import { filterEntries } from './search.js';
import type { CatalogEntry, SaveResult, Song, SongInput, SongStorage } from './types.js';

export const EMPTY_TITLE_MESSAGE = 'Title cannot be empty';

export type ValidationResult =
  | { ok: true; song: Song }
  | { ok: false; message: string };

export type MutationResult =
  | { status: 'ok'; entry: CatalogEntry; saved: SaveResult }
  | { status: 'invalid'; message: string }
  | { status: 'not-found' };

export interface ImportResult {
  imported: number;
  saved: SaveResult | null;
}

export interface CatalogEditor {
  readonly filePath: string;
  query(): string;
  entries(): CatalogEntry[];
  view(): CatalogEntry[];
  count(): number;
  get(id: number): CatalogEntry | undefined;
  search(query: string): CatalogEntry[];
  add(input: SongInput): MutationResult;
  edit(id: number, input: SongInput): MutationResult;
  remove(id: number): MutationResult;
  importText(text: string): ImportResult;
  save(): SaveResult;
}

/**
 * Trim both fields and reject an empty title
 */
export function validateSongInput(input: SongInput): ValidationResult {
  const title = (input.title ?? '').trim();
  const number = (input.number ?? '').trim();

  if (!title) {
    return { ok: false, message: EMPTY_TITLE_MESSAGE };
  }

  return { ok: true, song: { title, number } };
}

export function createCatalogEditor(storage: SongStorage): CatalogEditor {
  let nextId = 1;
  const assignId = (song: Song): CatalogEntry => ({ id: nextId++, song });

  const catalog: CatalogEntry[] = storage.load().map(assignId);
  let activeQuery = '';
  let filtered: CatalogEntry[] = filterEntries(catalog, activeQuery);

  const refresh = () => {
    filtered = filterEntries(catalog, activeQuery);
  };

  const persist = (): SaveResult => storage.save(catalog.map(entry => entry.song));

  const indexOf = (id: number) => catalog.findIndex(entry => entry.id === id);

  logger.info({ path: storage.filePath, count: catalog.length }, 'catalog editor ready');

  return {
    filePath: storage.filePath,

    query: () => activeQuery,
    entries: () => [...catalog],
    view: () => [...filtered],
    count: () => catalog.length,
    get: id => catalog.find(entry => entry.id === id),

    search(query) {
      activeQuery = query;
      refresh();
      return [...filtered];
    },

    add(input) {
      const validation = validateSongInput(input);
      if (!validation.ok) {
        return { status: 'invalid', message: validation.message };
      }

      const entry = assignId(validation.song);
      catalog.push(entry);
      refresh();
      logger.info({ id: entry.id, title: entry.song.title }, 'song added');
      return { status: 'ok', entry, saved: persist() };
    },

    edit(id, input) {
      const index = indexOf(id);
      if (index === -1) {
        return { status: 'not-found' };
      }

      const validation = validateSongInput(input);
      if (!validation.ok) {
        return { status: 'invalid', message: validation.message };
      }

      const entry: CatalogEntry = { id, song: validation.song };
      catalog[index] = entry;
      refresh();
      logger.info({ id, title: entry.song.title }, 'song updated');
      return { status: 'ok', entry, saved: persist() };
    },

    remove(id) {
      const index = indexOf(id);
      if (index === -1) {
        return { status: 'not-found' };
      }

      const [entry] = catalog.splice(index, 1);
      refresh();
      logger.info({ id, title: entry.song.title }, 'song removed');
      return { status: 'ok', entry, saved: persist() };
    },

    importText(text) {
      const songs = parseImportText(text);
      if (songs.length === 0) {
        return { imported: 0, saved: null };
      }

      catalog.push(...songs.map(assignId));
      refresh();
      logger.info({ imported: songs.length }, 'songs imported');
      return { imported: songs.length, saved: persist() };
    },

    save() {
      return persist();
    }
  };
}
