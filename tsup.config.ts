import { defineConfig } from 'tsup'

/**
 * tsup configuration for nanobot-delivery
 *
 * - splitting: shared code goes to chunk files instead of being duplicated
 * - Unified build: all entries share common chunks
 */
export default defineConfig({
    name: 'nanobot-delivery',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/design': 'src/design/index.ts',
        'src/delivery': 'src/delivery/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2020',

    // Pure computation, no runtime-specific modules
    platform: 'neutral',
})
