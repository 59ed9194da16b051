#!/usr/bin/env node
/**
 * Song Catalog CLI
 * Starts the web editor by default; batch commands cover quick adds and listing
 */

import 'dotenv/config';
import { APP_ENV } from './config.js';
import { createApp } from './index.js';
import { logger } from './logger.js';
import { parseCliArgs } from './cli-args.js';
import { runBatch } from './batch/batch-runner.js';
import { createSongStorage } from './catalog/storage.js';

const usage = `Song Catalog - keep a song list in a JSON file

Usage:
  song-catalog [editor]                 Start the web editor (default)
  song-catalog --list                   List songs with their indexes
  song-catalog --add "Title" [Number]   Add a song
  song-catalog --remove N               Remove a song by index
  song-catalog --cli <command...>       Same batch commands, e.g. --cli --list
  song-catalog --help                   Show this help

Options:
  --file <path>   Catalog file (default: SONGS_FILE or songs.json)

Web editor:
  Opens on http://${APP_ENV.WEB_UI_HOST}:${APP_ENV.WEB_UI_PORT} (WEB_UI_HOST / WEB_UI_PORT)`;

async function main(): Promise<void> {
  const { command, songsFile } = parseCliArgs(process.argv.slice(2));

  switch (command.kind) {
    case 'help':
      console.log(usage);
      return;

    case 'invalid':
      console.error(`Error: ${command.message}`);
      process.exit(1);

    case 'batch': {
      const storage = createSongStorage({
        filePath: songsFile ?? APP_ENV.SONGS_FILE,
        onError: message => console.log(`Error: ${message}`)
      });
      runBatch(command.args, { storage });
      return;
    }

    case 'editor': {
      const app = createApp({ songsFile });

      const shutdown = (signal: string) => {
        logger.info({ signal }, 'received shutdown signal');
        app.stop().then(
          () => process.exit(0),
          error => {
            logger.error({ err: error }, 'failed to stop web editor');
            process.exit(1);
          }
        );
      };

      process.on('SIGTERM', () => shutdown('SIGTERM'));
      process.on('SIGINT', () => shutdown('SIGINT'));

      await app.start();
      if (APP_ENV.WEB_UI_ENABLED) {
        console.log(`\nSong Catalog: http://${APP_ENV.WEB_UI_HOST}:${APP_ENV.WEB_UI_PORT}\n`);
        logger.info('press Ctrl+C to exit');
      }
      return;
    }

    case 'unknown':
      console.error(`Error: Unknown command '${command.command}'`);
      console.log('\n' + usage);
      process.exit(1);
  }
}

main().catch(error => {
  logger.error({ err: error }, 'CLI execution failed');
  process.exit(1);
});
