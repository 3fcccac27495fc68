import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const root = (relativePath: string): string => fileURLToPath(new URL(relativePath, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    setupFiles: ['./packages/__tests__/setup.ts'],
    include: [
      'packages/__tests__/**/*.test.ts',
      'packages/@yolo-bridge/**/__tests__/**/*.test.ts',
    ],
    exclude: ['node_modules', 'dist', '.git'],
    globals: true,
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,
    testTimeout: 20000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@yolo-bridge/core': root('./packages/@yolo-bridge/core/src/index.ts'),
      '@yolo-bridge/tasks': root('./packages/@yolo-bridge/tasks/src/index.ts'),
      '@yolo-bridge/mcp-server': root('./packages/@yolo-bridge/mcp-server/src/index.ts'),
      '@yolo-bridge/cli': root('./packages/@yolo-bridge/cli/src/index.ts'),
    },
  },
});
