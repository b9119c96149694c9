import { defineConfig } from 'tsdown';

export default defineConfig({
	entry: ['src/index.ts'],
	outDir: 'dist',
	format: 'esm',
	clean: true,
	sourcemap: false,
	minify: 'dce-only',
	treeshake: true,
	dts: false,
	fixedExtension: false,
	nodeProtocol: true,
	define: {
		'import.meta.vitest': 'undefined',
	},
});
