/**
 * Batch (non-interactive) interface
 * One command per invocation: load a fresh snapshot, run, persist once if mutated.
 */

import { logger } from '../logger.js';
import { validateSongInput } from '../catalog/editor.js';
import type { Song, SongStorage } from '../catalog/types.js';

export type BatchOutcome = 'usage' | 'listed' | 'added' | 'removed' | 'rejected' | 'unknown';

export interface BatchDeps {
  storage: SongStorage;
  print?: (line: string) => void;
}

export const BATCH_USAGE = `Song Catalog - batch mode

Usage:
  --list                    list songs with their indexes
  --add "Title" [Number]    add a song
  --remove N                remove by index (use --list to see indexes)`;

/** `index: title` or `index: title - number` */
export function formatListLine(index: number, song: Song): string {
  return song.number ? `${index}: ${song.title} - ${song.number}` : `${index}: ${song.title}`;
}

/**
 * Parse a base-10 integer, allowing surrounding whitespace and a sign.
 * Returns null for anything else ("1.5", "abc", "").
 */
export function parseIndex(value: string): number | null {
  const trimmed = value.trim();
  if (!/^[+-]?\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
}

const commandName = (arg: string) => arg.replace(/^--?/, '');

export function runBatch(args: readonly string[], { storage, print = console.log }: BatchDeps): BatchOutcome {
  if (args.length === 0) {
    print(BATCH_USAGE);
    return 'usage';
  }

  const [rawCommand, ...rest] = args;
  const command = commandName(rawCommand);
  logger.debug({ command, args: rest.length }, 'running batch command');

  switch (command) {
    case 'list': {
      const songs = storage.load();
      if (songs.length === 0) {
        print('No songs');
      }
      songs.forEach((song, index) => print(formatListLine(index, song)));
      return 'listed';
    }

    case 'add': {
      if (rest.length === 0) {
        print('Usage: add "<title>" [number]');
        return 'rejected';
      }

      const validation = validateSongInput({ title: rest[0], number: rest[1] });
      if (!validation.ok) {
        print(validation.message);
        return 'rejected';
      }

      const songs = storage.load();
      songs.push(validation.song);
      const saved = storage.save(songs);
      // storage has already reported the failure through onError
      if (!saved.ok) {
        return 'rejected';
      }

      print(`Added: ${validation.song.title}`);
      return 'added';
    }

    case 'remove': {
      if (rest.length !== 1) {
        print('Usage: remove <index>');
        return 'rejected';
      }

      const index = parseIndex(rest[0]);
      if (index === null) {
        print('Invalid index');
        return 'rejected';
      }

      const songs = storage.load();
      if (index < 0 || index >= songs.length) {
        print('Index out of range');
        return 'rejected';
      }

      const [removed] = songs.splice(index, 1);
      const saved = storage.save(songs);
      // storage has already reported the failure through onError
      if (!saved.ok) {
        return 'rejected';
      }

      print(`Removed: ${removed.title}`);
      return 'removed';
    }

    default:
      print(`Unknown command: ${rawCommand}`);
      return 'unknown';
  }
}
