import { defineConfig } from 'vitest/config';
import tsconfigPaths from 'vite-tsconfig-paths';

export default defineConfig({
  plugins: [tsconfigPaths()],
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // Keep pino off and the console wrapper quiet during tests
    env: {
      USE_PINO: 'false',
      LOG_LEVEL: 'error',
    },
  },
});
