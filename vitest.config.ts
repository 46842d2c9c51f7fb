import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [{ find: /^@\//, replacement: fileURLToPath(new URL('./', import.meta.url)) }],
  },
  test: {
    include: ['src/**/*.test.ts'],
    env: {
      LOG_LEVEL: 'silent',
      OSM_USER_AGENT: '',
      OSM_EMAIL: '',
    },
  },
});
