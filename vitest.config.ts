import { defineConfig } from 'vitest/config';

export default defineConfig({
  esbuild: {
    jsx: 'automatic',
    jsxImportSource: '@kitajs/html',
  },
  test: {
    globals: true,
    environment: 'node',
    setupFiles: ['./src/__tests__/setup.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    env: {
      LOG_LEVEL: 'silent',
      SONGS_FILE: 'songs.test.json',
      WEB_UI_ENABLED: 'false',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],
      include: ['src/**/*.ts', 'src/**/*.tsx'],
      exclude: [
        '**/__tests__/**',
        'src/cli.ts',           // CLI entry point
        'src/web/views/**',     // TSX views (covered through route tests)
        'src/**/types.ts',      // Type definition files
      ],
    },
  },
});
