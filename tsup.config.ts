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
                js: format === 'esm' ? '.mjs' : '.cjs',
            };
        },
    },

    // CLI build (endpointgen command)
    {
        entry: {
            cli: 'src/cli/main.ts',
        },
        outDir: 'dist',
        format: ['cjs'],
        dts: false,
        sourcemap: true,
        clean: false, // keep the lib build
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        // the entry's own hashbang is kept by esbuild
        outExtension() {
            return {js: '.cjs'};
        },
    },

    // Template parser + annotation reader on their own (endpointgen/ast)
    {
        entry: {
            ast: 'src/ast/index.ts',
        },
        outDir: 'dist',
        format: ['esm', 'cjs'],
        dts: true,
        sourcemap: true,
        clean: false,
        target: 'node20',
        platform: 'node',
        treeshake: true,
        splitting: false,
        outExtension({format}) {
            return {
                js: format === 'esm' ? '.mjs' : '.cjs',
            };
        },
    },
]);
