/**
 * Song list fragment
 * Swapped on every search keystroke and after every mutation
 */

import type { CatalogEntry } from '../../../catalog/types.js';

export interface SongListProps {
  entries: CatalogEntry[];
  total: number;
  query: string;
  /** Also clear the add/edit panel (out-of-band swap) */
  clearPanel?: boolean;
}

export function SongList({ entries, total, query, clearPanel }: SongListProps): JSX.Element {
  const filtering = query.trim().length > 0;

  return (
    <>
      <div id="song-list">
        {entries.length === 0 ? (
          <p style="color: var(--pico-muted-color);">
            {filtering ? 'No songs match your search.' : 'No songs yet. Add one or import a list.'}
          </p>
        ) : (
          <table class="striped">
            <thead>
              <tr>
                <th scope="col" style="width: 2rem;"></th>
                <th scope="col">Title</th>
                <th scope="col" style="width: 8rem;">Number</th>
              </tr>
            </thead>
            <tbody>
              {entries.map(({ id, song }) => (
                <tr
                  id={`song-${id}`}
                  hx-get={`/songs/${id}/edit`}
                  hx-trigger="dblclick"
                  hx-target="#editor-panel"
                >
                  <td>
                    <input type="radio" name="selected" value={String(id)} aria-label={`Select song ${id}`} />
                  </td>
                  <td safe>{song.title}</td>
                  <td safe>{song.number}</td>
                </tr>
              ))}
            </tbody>
          </table>
        )}

        <p id="song-total">
          Total: <strong>{String(entries.length)}</strong>
          {filtering ? ` of ${total}` : ''}
        </p>
      </div>
      {clearPanel ? <div id="editor-panel" hx-swap-oob="true"></div> : ''}
    </>
  );
}
