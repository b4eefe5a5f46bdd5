import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['src/**/*.{test,spec,prop.test}.ts'],
    exclude: ['node_modules/', 'dist/'],
    testTimeout: 60000, // property tests over 256-bit scalars
  },
});
