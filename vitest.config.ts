import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['tools/logger', 'packages/*'],
  },
});
