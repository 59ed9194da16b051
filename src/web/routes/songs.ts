/**
 * Song catalog routes
 * Search, add, edit, delete, import and save through the catalog editor
 */

import { Router, type Response } from 'express';
import { logger } from '../../logger.js';
import type { CatalogEditor, MutationResult } from '../../catalog/editor.js';
import type { CatalogEntry, SaveResult, SongInput } from '../../catalog/types.js';
import { formatUserError } from '../../utils/error-formatter.js';
import { isHtmxRequest, sendHtml, setToast } from '../middleware/htmx.js';
import { SongsPage } from '../views/songs/index.js';
import { SongList } from '../views/songs/song-list.js';
import { SongForm } from '../views/songs/song-form.js';
import { DeleteConfirm } from '../views/songs/delete-confirm.js';

export const EDIT_NOTICE = 'Select a song to edit (double-click or select + Edit)';
export const DELETE_NOTICE = 'Select a song to delete';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

function readString(source: unknown, key: string): string | undefined {
  if (!isRecord(source)) return undefined;
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

function readSongInput(body: unknown): SongInput {
  return {
    title: readString(body, 'title') ?? '',
    number: readString(body, 'number') ?? ''
  };
}

/**
 * Parse an entry id from a path or query value ("12"), null when absent or malformed
 */
export function parseEntryId(value: unknown): number | null {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    return null;
  }
  return Number.parseInt(value, 10);
}

export interface SongsRouterOptions {
  /** Messages shown on the next full page render, then cleared */
  notices?: string[];
}

export function createSongsRouter(editor: CatalogEditor, { notices = [] }: SongsRouterOptions = {}): Router {
  const router = Router();

  const renderList = (clearPanel = false) =>
    SongList({ entries: editor.view(), total: editor.count(), query: editor.query(), clearPanel });

  const renderPage = () =>
    SongsPage({
      entries: editor.view(),
      total: editor.count(),
      query: editor.query(),
      filePath: editor.filePath,
      notices: notices.splice(0)
    });

  const lookup = (value: unknown): CatalogEntry | undefined => {
    const id = parseEntryId(value);
    return id === null ? undefined : editor.get(id);
  };

  function fail(res: Response, error: unknown, context: string) {
    logger.error({ err: error }, `failed ${context}`);
    setToast(res, formatUserError(error, context), 'error');
    res.status(500).send('Internal server error');
  }

  function notice(res: Response, message: string) {
    setToast(res, message, 'info');
    res.status(404).send(message);
  }

  function reportSaved(res: Response, saved: SaveResult | null, successMessage: string) {
    if (saved && !saved.ok) {
      setToast(res, `Changes kept in memory but not saved: ${saved.error}`, 'warning');
      return;
    }
    setToast(res, successMessage, 'success');
  }

  /**
   * Shared response for add/edit/delete:
   * invalid input re-renders the form in the editor panel, success swaps the list
   */
  async function respond(
    res: Response,
    result: MutationResult,
    options: { id?: number; values?: SongInput; notFound: string; success: (entry: CatalogEntry) => string }
  ) {
    switch (result.status) {
      case 'not-found':
        return notice(res, options.notFound);
      case 'invalid':
        res.setHeader('HX-Retarget', '#editor-panel');
        res.setHeader('HX-Reswap', 'innerHTML');
        setToast(res, result.message, 'warning');
        return sendHtml(res, SongForm({ id: options.id, values: options.values ?? {}, error: result.message }), 422);
      case 'ok':
        reportSaved(res, result.saved, options.success(result.entry));
        return sendHtml(res, renderList(true));
    }
  }

  /**
   * Editor page
   */
  router.get('/', async (req, res) => {
    try {
      const q = readString(req.query, 'q');
      if (q !== undefined) {
        editor.search(q);
      }
      await sendHtml(res, renderPage());
    } catch (error) {
      fail(res, error, 'rendering the song list');
    }
  });

  /**
   * Live search (recomputed on every keystroke)
   */
  router.get('/songs', async (req, res) => {
    try {
      editor.search(readString(req.query, 'q') ?? '');
      await sendHtml(res, isHtmxRequest(req) ? renderList() : renderPage());
    } catch (error) {
      fail(res, error, 'searching songs');
    }
  });

  router.get('/songs/new', async (req, res) => {
    try {
      await sendHtml(res, SongForm({ values: { title: '', number: '' } }));
    } catch (error) {
      fail(res, error, 'opening the song form');
    }
  });

  /**
   * Edit form for the selected row
   * IMPORTANT: fixed paths must come BEFORE /songs/:id routes
   */
  router.get('/songs/edit', async (req, res) => {
    try {
      const entry = lookup(readString(req.query, 'selected'));
      if (!entry) {
        return notice(res, EDIT_NOTICE);
      }
      await sendHtml(res, SongForm({ id: entry.id, values: entry.song }));
    } catch (error) {
      fail(res, error, 'opening the song form');
    }
  });

  router.get('/songs/delete', async (req, res) => {
    try {
      const entry = lookup(readString(req.query, 'selected'));
      if (!entry) {
        return notice(res, DELETE_NOTICE);
      }
      await sendHtml(res, DeleteConfirm({ entry }));
    } catch (error) {
      fail(res, error, 'confirming a delete');
    }
  });

  router.post('/songs/import', async (req, res) => {
    try {
      const result = editor.importText(readString(req.body, 'text') ?? '');
      reportSaved(res, result.saved, `Imported ${result.imported} songs`);
      await sendHtml(res, renderList());
    } catch (error) {
      fail(res, error, 'importing songs');
    }
  });

  /**
   * Manual save: persist unconditionally and report the count
   */
  router.post('/songs/save', (req, res) => {
    const saved = editor.save();
    if (!saved.ok) {
      setToast(res, saved.error, 'error');
      res.status(500).json({ error: saved.error });
      return;
    }
    setToast(res, `Saved ${saved.count} songs to ${editor.filePath}`, 'success');
    res.json({ saved: saved.count, file: editor.filePath });
  });

  router.post('/songs', async (req, res) => {
    try {
      const values = readSongInput(req.body);
      await respond(res, editor.add(values), {
        values,
        notFound: EDIT_NOTICE,
        success: entry => `Added '${entry.song.title}'`
      });
    } catch (error) {
      fail(res, error, 'adding a song');
    }
  });

  router.get('/songs/:id/edit', async (req, res) => {
    try {
      const entry = lookup(req.params.id);
      if (!entry) {
        return notice(res, EDIT_NOTICE);
      }
      await sendHtml(res, SongForm({ id: entry.id, values: entry.song }));
    } catch (error) {
      fail(res, error, 'opening the song form');
    }
  });

  router.put('/songs/:id', async (req, res) => {
    try {
      const id = parseEntryId(req.params.id);
      if (id === null) {
        return notice(res, EDIT_NOTICE);
      }
      const values = readSongInput(req.body);
      await respond(res, editor.edit(id, values), {
        id,
        values,
        notFound: EDIT_NOTICE,
        success: entry => `Updated '${entry.song.title}'`
      });
    } catch (error) {
      fail(res, error, 'updating a song');
    }
  });

  router.delete('/songs/:id', async (req, res) => {
    try {
      const id = parseEntryId(req.params.id);
      if (id === null) {
        return notice(res, DELETE_NOTICE);
      }
      await respond(res, editor.remove(id), {
        notFound: DELETE_NOTICE,
        success: entry => `Deleted '${entry.song.title}'`
      });
    } catch (error) {
      fail(res, error, 'deleting a song');
    }
  });

  return router;
}
