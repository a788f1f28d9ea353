import { defineConfig } from 'vitest/config'
import { fileURLToPath } from 'node:url'

export default defineConfig({
	resolve: {
		alias: {
			'@': fileURLToPath(new URL('./packages/client/src', import.meta.url)),
		},
	},
	test: {
		include: ['packages/*/tests/unit/**/*.test.ts'],
		testTimeout: 10_000,
	},
})
