import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.test.ts'],
    clearMocks: true,
    unstubEnvs: true,
    unstubGlobals: true,
    testTimeout: 20000,
  },
});
