import { defineConfig } from 'tsup'

/**
 * tsup configuration for the l1-pursuit library
 *
 * - splitting: shared code goes to chunks instead of being duplicated per entry
 * - dual cjs/esm output with declarations
 */
export default defineConfig({
    name: 'l1-pursuit',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/numeric': 'src/models/numeric/index.ts',
        'src/tasks': 'src/tasks/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2022',

    platform: 'neutral',
})
