/**
 * Pasted-text import
 *
 * One song per line, optionally "Title - Number":
 *   Holy Holy Holy - 100
 *   Just As I Am
 */

import type { Song } from './types.js';

export const IMPORT_SEPARATOR = ' - ';

export function parseImportLine(rawLine: string): Song | null {
  const line = rawLine.trim();
  if (!line) {
    return null;
  }

  const separatorAt = line.indexOf(IMPORT_SEPARATOR);
  if (separatorAt === -1) {
    return { title: line, number: '' };
  }

  return {
    title: line.slice(0, separatorAt).trim(),
    number: line.slice(separatorAt + IMPORT_SEPARATOR.length).trim()
  };
}

export function parseImportText(text: string): Song[] {
  const songs: Song[] = [];
  for (const line of text.split(/\r\n|\r|\n/)) {
    const song = parseImportLine(line);
    if (song) {
      songs.push(song);
    }
  }
  return songs;
}
