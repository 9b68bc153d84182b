import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const workspace = (path: string) => fileURLToPath(new URL(path, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@quarry/schemas': workspace('./packages/schemas/src/index.ts'),
      '@quarry/utils': workspace('./packages/utils/src/index.ts'),
      '@quarry/gateway-client': workspace('./packages/gateway-client/src/index.ts'),
      '@quarry/fetch-core': workspace('./packages/fetch-core/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/src/**/*.test.ts'],
    environment: 'node',
  },
});
