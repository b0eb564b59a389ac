import { defineConfig } from 'vitest/config';

export default defineConfig({
  plugins: [
    {
      name: 'resolve-js-to-ts',
      resolveId(source, importer) {
        // Resolve .js imports to .ts/.tsx source files (bundler-style)
        if (source.endsWith('.js') && importer && source.startsWith('.') && !importer.includes('node_modules')) {
          return this.resolve(source.replace(/\.js$/, '.ts'), importer, { skipSelf: true })
            .then(resolved => resolved ?? this.resolve(source.replace(/\.js$/, '.tsx'), importer, { skipSelf: true }));
        }
      },
    },
  ],
  esbuild: {
    jsx: 'automatic',
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.{ts,tsx}'],
    setupFiles: ['tests/setup.ts'],
    testTimeout: 15000,
    hookTimeout: 20000,
  },
});
