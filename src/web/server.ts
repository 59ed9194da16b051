/**
 * Web editor server
 * Express server rendering @kitajs/html views, driven by HTMX
 */

import express from 'express';
import type { Server } from 'node:http';
import { logger } from '../logger.js';
import type { CatalogEditor } from '../catalog/editor.js';
import { formatUserError } from '../utils/error-formatter.js';
import { createSongsRouter } from './routes/songs.js';

export interface WebServerConfig {
  port: number;
  host: string;
  enabled: boolean;
  /** Startup problems to show on the editor page */
  notices?: string[];
}

export interface WebServer {
  app: express.Express;
  start(): Promise<void>;
  stop(): Promise<void>;
}

export function createWebServer(config: WebServerConfig, editor: CatalogEditor): WebServer {
  const app = express();
  let server: Server | undefined;

  // Middleware
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Routes
  app.use('/', createSongsRouter(editor, { notices: config.notices }));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', songs: editor.count() });
  });

  function start(): Promise<void> {
    if (!config.enabled) {
      logger.info('web UI disabled');
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const listening = app.listen(config.port, config.host, () => {
        server = listening;
        logger.info({ host: config.host, port: config.port }, 'web editor started');
        resolve();
      });

      listening.once('error', error => {
        logger.error({ err: error }, formatUserError(error, 'starting the web editor'));
        reject(error);
      });
    });
  }

  function stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!server) {
        resolve();
        return;
      }
      server.close(error => (error ? reject(error) : resolve()));
      server = undefined;
    });
  }

  return { app, start, stop };
}
