import { defineConfig } from 'tsup';
import type { Options } from 'tsup';

// The core workspace package resolves to TypeScript sources, so it is
// bundled into the binary; its own npm dependencies stay external.
export const cliBundle = {
  entry: ['src/index.ts'],
  format: ['esm'],
  sourcemap: true,
  clean: true,
  target: 'node20',
  noExternal: ['@stageflow/core'],
  banner: { js: '#!/usr/bin/env node' },
} satisfies Options;

export default defineConfig(cliBundle);
