import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const resolvePackageRoot = (pkg: string) => path.resolve(currentDir, `packages/${pkg}/src`);

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.{test,spec}.ts', 'apps/api/src/**/*.{test,spec}.ts'],
    setupFiles: [path.resolve(currentDir, 'apps/api/test/bootstrap.ts')],
  },
  resolve: {
    alias: [
      { find: '@salesdesk/core', replacement: path.join(resolvePackageRoot('core'), 'index.ts') },
      { find: '@salesdesk/storage', replacement: path.join(resolvePackageRoot('storage'), 'index.ts') },
    ],
  },
});
