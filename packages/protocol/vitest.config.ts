import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('..', import.meta.url));
const coreSrc = resolve(rootDir, 'core', 'src');

export default defineConfig({
  test: {
    environment: 'node',
    include: ['test/**/*.test.ts'],
  },
  resolve: {
    alias: [{ find: /^@vaultgov\/core$/, replacement: resolve(coreSrc, 'index.ts') }],
  },
});
