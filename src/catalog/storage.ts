/**
 * JSON file storage for the song catalog
 *
 * Accepted file shapes:
 *
 * Current format
 * [
 *   { "title": "Amazing Grace", "number": "12" }
 * ]
 *
 * Legacy field names
 * [
 *   { "name": "Amazing Grace", "num": 12 }
 * ]
 *
 * Plain titles
 * [
 *   "Rock of Ages"
 * ]
 *
 * Mixed arrays are accepted; entries that are neither objects nor strings are dropped.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { logger } from '../logger.js';
import { describeFileError } from '../utils/error-formatter.js';
import type { SaveResult, Song, SongStorage } from './types.js';

export interface SongStorageOptions {
  filePath: string;
  /** Called with a user-facing message whenever a load or save fails */
  onError?: (message: string) => void;
}

const toText = (value: unknown): string => {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null) return JSON.stringify(value);
  return String(value);
};

// Falsy values and empty arrays or objects count as absent
const isPresent = (value: unknown): boolean => {
  if (Array.isArray(value)) return value.length > 0;
  if (typeof value === 'object' && value !== null) return Object.keys(value).length > 0;
  return Boolean(value);
};

// First present field wins, so "" or [] under `title` falls through to `name`
const pickField = (record: Record<string, unknown>, primary: string, legacy: string): string => {
  const value = isPresent(record[primary]) ? record[primary] : record[legacy];
  return isPresent(value) ? toText(value) : '';
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const normalizeSong = (item: unknown): Song | null => {
  if (isRecord(item)) {
    return {
      title: pickField(item, 'title', 'name'),
      number: pickField(item, 'number', 'num')
    };
  }

  if (typeof item === 'string') {
    return { title: item, number: '' };
  }

  return null;
};

/**
 * Normalize parsed file content to a list of songs
 * Anything other than a top-level array yields an empty catalog
 */
export const normalizeSongs = (data: unknown): Song[] => {
  if (!Array.isArray(data)) {
    return [];
  }

  const songs: Song[] = [];
  for (const item of data) {
    const song = normalizeSong(item);
    if (song) {
      songs.push(song);
    }
  }
  return songs;
};

const serialize = (songs: readonly Song[]): string =>
  JSON.stringify(
    songs.map(song => ({ title: song.title, number: song.number })),
    null,
    2
  );

export function createSongStorage({ filePath, onError }: SongStorageOptions): SongStorage {
  const report = (message: string, error: unknown) => {
    logger.error({ err: error, path: filePath }, message);
    onError?.(message);
  };

  const writeFile = (songs: readonly Song[]) => {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(filePath, serialize(songs), 'utf-8');
  };

  return {
    filePath,

    load() {
      try {
        if (!existsSync(filePath)) {
          writeFile([]);
          logger.info({ path: filePath }, 'created empty song catalog');
          return [];
        }

        const content = readFileSync(filePath, 'utf-8');
        const data: unknown = JSON.parse(content);
        const songs = normalizeSongs(data);

        if (!Array.isArray(data)) {
          logger.warn({ path: filePath }, 'catalog file is not a JSON array, starting empty');
        } else if (songs.length < data.length) {
          logger.warn(
            { path: filePath, dropped: data.length - songs.length },
            'skipped catalog entries that are neither objects nor strings'
          );
        }

        logger.debug({ path: filePath, count: songs.length }, 'loaded song catalog');
        return songs;
      } catch (error) {
        report(`Failed to load ${filePath}: ${describeFileError(error)}`, error);
        return [];
      }
    },

    save(songs) {
      try {
        writeFile(songs);
        logger.debug({ path: filePath, count: songs.length }, 'saved song catalog');
        return { ok: true, count: songs.length } satisfies SaveResult;
      } catch (error) {
        const message = `Failed to save ${filePath}: ${describeFileError(error)}`;
        report(message, error);
        return { ok: false, error: message } satisfies SaveResult;
      }
    }
  };
}
