import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['test/**/*.test.ts'],
    // Fixture files are read from disk; keep timeouts generous on slow CI runners
    testTimeout: process.platform === 'win32' ? 30000 : 5000,
    isolate: true,
    exclude: ['node_modules/**', 'dist/**'],
  },
  resolve: {
    extensions: ['.js', '.ts', '.json'],
  },
});
