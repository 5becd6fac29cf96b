import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.ts'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		globals: true,
		setupFiles: ['source/test-setup.ts'],
		// Grammar loading and LanceDB commits dominate test time
		testTimeout: 60_000,
		hookTimeout: 60_000,
		// LanceDB's native bindings are loaded per process
		pool: 'forks',
	},
});
