import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const rootDir = fileURLToPath(new URL('.', import.meta.url));
const workspaceDirs = ['sdk', 'engine'].flatMap((pkg) => [path.join(rootDir, pkg, 'src'), path.join(rootDir, pkg, 'test')]);

function isWorkspaceSource(importer: string | undefined): boolean {
  if (!importer) return false;
  return workspaceDirs.some((dir) => importer.startsWith(dir));
}

export default defineConfig({
  resolve: {
    // Tests run the sdk from source; its package export points at the build.
    alias: { '@accrue/sdk': path.join(rootDir, 'sdk', 'src', 'index.ts') },
  },
  plugins: [
    {
      name: 'accrue-resolve-js-to-ts',
      enforce: 'pre',
      async resolveId(source: string, importer: string | undefined) {
        // Only rewrite our own NodeNext-style relative imports; dependencies ship real `.js` files.
        if (!isWorkspaceSource(importer)) return null;
        if (!source.endsWith('.js')) return null;
        if (!source.startsWith('./') && !source.startsWith('../')) return null;

        const tsSource = `${source.slice(0, -3)}.ts`;
        const resolved = await this.resolve(tsSource, importer, { skipSelf: true });
        return resolved?.id ?? null;
      },
    },
  ],
  test: {
    environment: 'node',
    include: ['sdk/test/**/*.test.ts', 'engine/test/**/*.test.ts'],
    testTimeout: 10_000,
  },
});
