// biome-ignore lint/correctness/noUndeclaredDependencies: vitest is hoisted from root workspace
import { defineConfig } from 'vitest/config'

export default defineConfig({
	test: {
		projects: [
			// Unit tests: {package}:unit (e.g., input:unit, orchestrator:unit)
			'packages/*/vitest.unit.config.ts',
		],
	},
})
