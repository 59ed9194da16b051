import type { CatalogEntry } from '../../../catalog/types.js';

export function DeleteConfirm({ entry }: { entry: CatalogEntry }): JSX.Element {
  return (
    <article id="delete-confirm">
      <p>
        Delete '<strong safe>{entry.song.title}</strong>'?
      </p>
      <div style="display: flex; gap: 0.5rem;">
        <button
          class="contrast"
          hx-delete={`/songs/${entry.id}`}
          hx-target="#song-list"
          hx-swap="outerHTML"
        >
          Yes
        </button>
        <button type="button" class="secondary" onclick="clearEditorPanel()">No</button>
      </div>
    </article>
  );
}
