import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		watch: false,
		globals: true,
		include: ['apps/*/src/**/*.test.ts'],
		includeSource: ['apps/*/src/**/*.ts'],
	},
});
