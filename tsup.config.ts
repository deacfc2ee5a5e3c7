import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['lib/index.ts', 'lib/main.ts'],

    format: ['cjs', 'esm'],
    dts: true,
    minify: false,
    outDir: 'out/bundle/',
    clean: true,
    sourcemap: true,
    bundle: true,
    splitting: false,
    treeshake: false,
    target: 'es2022',
    platform: 'node',
    tsconfig: './tsconfig.build.json',
    cjsInterop: true,
    keepNames: true,
    outExtension(ctx) {
        return {
            dts: '.d.ts',
            js: ctx.format === 'cjs' ? '.cjs' : '.mjs',
        };
    },
});
