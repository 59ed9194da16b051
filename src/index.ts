import 'dotenv/config';
import { APP_ENV } from './config.js';
import { logger } from './logger.js';
import { createSongStorage } from './catalog/storage.js';
import { createCatalogEditor, type CatalogEditor } from './catalog/editor.js';
import { createWebServer, type WebServer } from './web/server.js';

export { createSongStorage, normalizeSongs } from './catalog/storage.js';
export { createCatalogEditor, validateSongInput } from './catalog/editor.js';
export type { CatalogEditor, MutationResult, ImportResult } from './catalog/editor.js';
export { filterEntries } from './catalog/search.js';
export { parseImportText } from './catalog/import-parser.js';
export { runBatch } from './batch/batch-runner.js';
export type { BatchOutcome } from './batch/batch-runner.js';
export type { Song, CatalogEntry, SongInput, SaveResult, SongStorage } from './catalog/types.js';

export interface AppOptions {
  songsFile?: string;
  port?: number;
  host?: string;
}

export interface App {
  editor: CatalogEditor;
  /** Express app behind the web editor */
  server: WebServer['app'];
  start(): Promise<void>;
  stop(): Promise<void>;
}

export const createApp = (options: AppOptions = {}): App => {
  // Load failures are kept and shown on the first page render;
  // later save failures reach the user as toasts instead
  const notices: string[] = [];
  let loading = true;
  const storage = createSongStorage({
    filePath: options.songsFile ?? APP_ENV.SONGS_FILE,
    onError: message => {
      if (loading) notices.push(message);
    }
  });
  const editor = createCatalogEditor(storage);
  loading = false;

  const webServer = createWebServer(
    {
      port: options.port ?? APP_ENV.WEB_UI_PORT,
      host: options.host ?? APP_ENV.WEB_UI_HOST,
      enabled: APP_ENV.WEB_UI_ENABLED,
      notices
    },
    editor
  );

  return {
    editor,
    server: webServer.app,
    async start() {
      await webServer.start();
    },
    async stop() {
      await webServer.stop();
      logger.info('web editor stopped');
    }
  };
};
