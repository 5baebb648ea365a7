import { defineConfig } from 'vitest/config';

export default defineConfig({
	test: {
		include: ['packages/*/tests/**/*.test.ts'],
		environment: 'node',
		// process.env.TZ only takes effect on a process's main thread
		pool: 'forks',
		env: {
			TZ: 'UTC',
		},
	},
});
