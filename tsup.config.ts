import { defineConfig } from 'tsup'

/**
 * tsup configuration for the beamsmith library
 *
 * - splitting: shared code goes to chunks used by every entry
 * - Sub-path entries mirror the root namespaces
 */
export default defineConfig({
    name: 'beamsmith',

    entry: {
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/backend': 'src/backend/index.ts',
        'src/workflow': 'src/workflow/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2020',
    platform: 'neutral',
})
