import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/index.ts'],
    format: ['esm'],
    target: 'node20',
    noExternal: ['@index-mirror/core', '@index-mirror/shared'],
    clean: true,
    banner: { js: '#!/usr/bin/env node' },
});
