import { cleanEnv, num, str, bool } from 'envalid';

export const APP_ENV = cleanEnv(process.env, {
  // Storage
  SONGS_FILE: str({ default: 'songs.json', desc: 'JSON file holding the song catalog (created as [] when missing)' }),
  // Web editor
  WEB_UI_ENABLED: bool({ default: true, desc: 'Serve the web editor' }),
  WEB_UI_HOST: str({ default: '127.0.0.1', desc: 'Address the web editor binds to (local only by default)' }),
  WEB_UI_PORT: num({ default: 8690, desc: 'Port for the web editor' }),
  // Logging
  LOG_LEVEL: str({
    default: 'info',
    choices: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
    desc: 'pino log level'
  })
});

export type AppEnv = typeof APP_ENV;
