import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

import { defineConfig } from 'vitest/config';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'service',
    environment: 'node'
  },
  resolve: {
    alias: {
      '@ngo-contacts/core': resolve(__dirname, '../../packages/core/src/index.ts'),
      '@ngo-contacts/fixtures': resolve(__dirname, '../../packages/fixtures/src/index.ts'),
      '@ngo-contacts/config-store': resolve(__dirname, '../../packages/config-store/src/index.ts')
    }
  }
});
