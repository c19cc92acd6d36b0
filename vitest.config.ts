import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string, entry = 'index.ts') =>
  fileURLToPath(new URL(`./packages/${name}/src/${entry}`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: [
      { find: '@conclave/agent-core/testing', replacement: pkg('agent-core', 'testing.ts') },
      { find: '@conclave/agent-contracts', replacement: pkg('agent-contracts') },
      { find: '@conclave/agent-core', replacement: pkg('agent-core') },
      { find: '@conclave/agent-tools', replacement: pkg('agent-tools') },
      { find: '@conclave/agent-mcp', replacement: pkg('agent-mcp') },
    ],
  },
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    env: {
      LOG_LEVEL: 'silent',
    },
  },
});
