import * as path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      'tokentrail-shared': path.resolve(__dirname, 'tokentrail-shared/src/index.ts'),
    },
  },
  test: {
    include: [
      'tokentrail-shared/src/**/*.test.ts',
      'tokentrail-cli/src/**/*.test.ts',
    ],
    environment: 'node',
  },
});
