import {defineConfig} from 'vitest/config';

export default defineConfig({
	test: {
		include: ['source/**/*.test.{ts,tsx}'],
		exclude: ['**/node_modules/**', '**/dist/**'],
		environment: 'node',
		setupFiles: ['source/test-setup.ts'],
		testTimeout: 30_000,
		hookTimeout: 30_000,
	},
});
