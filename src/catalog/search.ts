import type { CatalogEntry } from './types.js';

/**
 * Case-insensitive substring match on title or number.
 * A blank query matches everything.
 */
export function filterEntries(entries: readonly CatalogEntry[], query: string): CatalogEntry[] {
  const q = query.trim().toLowerCase();
  if (!q) {
    return [...entries];
  }

  return entries.filter(({ song }) =>
    song.title.toLowerCase().includes(q) || song.number.toLowerCase().includes(q)
  );
}
