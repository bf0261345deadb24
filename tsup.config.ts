// tsup.config.ts
import {defineConfig} from 'tsup';

export default defineConfig([
    {
        entry: ['src/index.ts'],
        outDir: 'dist',
        format: ['esm', 'cjs'],
        dts: true,
        sourcemap: true,
        clean: true,
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        outExtension({format}) {
            return {
                // ESM → .mjs, CJS → .cjs
                js: format === 'esm' ? '.mjs' : '.cjs',
            };
        },
    },

    // CLI build (treegen command)
    {
        entry: {
            cli: 'src/cli/main.ts',
        },
        outDir: 'dist',
        format: ['esm'],
        dts: false,
        sourcemap: true,
        clean: false, // don't blow away the lib build
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        outExtension() {
            return {js: '.mjs'};
        },
        banner: {
            js: '#!/usr/bin/env node',
        },
    },
]);
