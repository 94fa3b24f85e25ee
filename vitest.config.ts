import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		environment: 'node',
		include: [
			'packages/*/src/**/*.spec.ts',
			'packages/*/tests/**/*.test.ts'
		],
		testTimeout: 10000,
		restoreMocks: true
	}
});
