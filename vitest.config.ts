import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    testTimeout: 10000,
    hookTimeout: 15000,

    include: ['packages/**/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],

    setupFiles: ['./test-setup.ts'],

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['coverage/**', 'dist/**', 'packages/**/dist/**', '**/*.config.*', '**/test-setup.ts'],
    },
  },

  // Workspace packages resolve to their TypeScript sources
  resolve: {
    alias: {
      '@tutorbot/shared': fromRoot('./packages/shared/src/index.ts'),
      '@tutorbot/tutor': fromRoot('./packages/tutor/src/index.ts'),
      '@tutorbot/telegram': fromRoot('./packages/telegram/src/app.ts'),
    },
  },
});
