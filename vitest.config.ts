import path from 'path';
import { defineConfig } from 'vitest/config';

const pkg = (name: string) => path.resolve(__dirname, 'packages', name, 'src');

export default defineConfig({
  resolve: {
    alias: {
      '@occupancy-meter/types': pkg('types'),
      '@occupancy-meter/core': pkg('core'),
      '@occupancy-meter/sdk': pkg('sdk'),
      '@occupancy-meter/provider-mongo': pkg('provider-mongo'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
