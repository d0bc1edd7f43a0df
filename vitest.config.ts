import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    setupFiles: ['./src/setupTests.ts'],
    server: {
      deps: {
        // schema builder and executor must share one copy of graphql
        inline: [/@graphql-tools\//],
      },
    },
  },
});
