/**
 * Add/Edit song form
 * Title and Number fields with a Submit button, rendered into #editor-panel
 */

import type { SongInput } from '../../../catalog/types.js';

export interface SongFormProps {
  /** Entry id when editing, omitted when adding */
  id?: number;
  values: SongInput;
  error?: string;
}

export function SongForm({ id, values, error }: SongFormProps): JSX.Element {
  const editing = id !== undefined;
  const action = editing ? { 'hx-put': `/songs/${id}` } : { 'hx-post': '/songs' };

  return (
    <article id="song-form">
      <h3 style="margin-bottom: 1rem;">{editing ? 'Edit Song' : 'Add Song'}</h3>
      <form {...action} hx-target="#song-list" hx-swap="outerHTML">
        {error ? <p class="form-error" role="alert" safe>{error}</p> : ''}
        <label>
          Title:
          <input type="text" name="title" value={values.title ?? ''} required autofocus />
        </label>
        <label>
          Number (optional):
          <input type="text" name="number" value={values.number ?? ''} style="max-width: 12rem;" />
        </label>
        <div style="display: flex; gap: 0.5rem;">
          <button type="submit">Submit</button>
          <button type="button" class="secondary" onclick="clearEditorPanel()">Cancel</button>
        </div>
      </form>
    </article>
  );
}
