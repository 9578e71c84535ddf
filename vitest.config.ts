import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const fromRoot = (p: string) => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@commwire/transport-mem': fromRoot('./packages/transport-mem/src/index.ts'),
      '@commwire/transport': fromRoot('./packages/transport/src/index.ts'),
      '@commwire/codec': fromRoot('./packages/codec/src/index.ts'),
      '@commwire/comms': fromRoot('./packages/comms/src/index.ts'),
    },
  },
  test: {
    environment: 'node',
    include: ['packages/*/tests/**/*.test.ts'],
    globals: true,
  },
});
