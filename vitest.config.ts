import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const fromRoot = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@duesledger/types': fromRoot('./packages/types/src/index.ts'),
      '@duesledger/statement-parser': fromRoot('./packages/statement-parser/src/index.ts'),
      '@duesledger/store': fromRoot('./packages/store/src/index.ts'),
      '@duesledger/reconciler': fromRoot('./packages/reconciler/src/index.ts'),
      '@duesledger/cli/commands': fromRoot('./apps/cli/src/commands.ts'),
      '@duesledger/cli/config': fromRoot('./apps/cli/src/config.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
