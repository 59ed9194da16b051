/**
 * Song catalog editor page
 * Search box with live filter, Add/Edit/Delete, list, total, Save and Import
 */

import { Layout } from '../layout.js';
import { SongList, type SongListProps } from './song-list.js';

export interface SongsPageProps extends SongListProps {
  filePath: string;
  /** Problems to show once, e.g. a catalog file that failed to load */
  notices?: string[];
}

const SELECTED_ROW = '#song-list input[name=selected]:checked';

export function SongsPage({ entries, total, query, filePath, notices = [] }: SongsPageProps): JSX.Element {
  return (
    <Layout title="Songs">
      <header style="margin-bottom: 1rem;">
        <h1 style="margin-bottom: 0.25rem;">Song Catalog</h1>
        <small style="color: var(--pico-muted-color);" safe>{filePath}</small>
      </header>

      {notices.map(message => (
        <p class="form-error" role="alert" safe>{message}</p>
      ))}

      {/* Search + actions */}
      <div style="display: flex; gap: 0.5rem; align-items: center;">
        <input
          type="search"
          name="q"
          value={query}
          placeholder="Search by title or number"
          aria-label="Search"
          autofocus
          hx-get="/songs"
          hx-trigger="input changed delay:150ms, search"
          hx-target="#song-list"
          hx-swap="outerHTML"
          style="flex: 1; margin-bottom: 0;"
        />
        <button hx-get="/songs/new" hx-target="#editor-panel">Add</button>
        <button class="secondary" hx-get="/songs/edit" hx-include={SELECTED_ROW} hx-target="#editor-panel">
          Edit
        </button>
        <button class="secondary" hx-get="/songs/delete" hx-include={SELECTED_ROW} hx-target="#editor-panel">
          Delete
        </button>
      </div>

      <div id="editor-panel" style="margin-top: 1rem;"></div>

      <SongList entries={entries} total={total} query={query} />

      {/* Save + import */}
      <footer style="display: flex; gap: 1rem; align-items: flex-start; margin-top: 1rem;">
        <details style="flex: 1;">
          <summary>Import from text...</summary>
          <form
            hx-post="/songs/import"
            hx-target="#song-list"
            hx-swap="outerHTML"
            hx-on--after-request="if (event.detail.successful) this.reset()"
          >
            <label>
              Paste songs, one per line. Optionally use 'Title - Number' format.
              <textarea name="text" rows="6"></textarea>
            </label>
            <button type="submit">Import</button>
          </form>
        </details>
        <button hx-post="/songs/save" hx-swap="none">Save</button>
      </footer>
    </Layout>
  );
}
