// CHANGE: Vitest configuration for CORE and SHELL specs
// WHY: Native ESM execution of the NodeNext sources without a build step
// PURITY: SHELL (configuration only)
// INVARIANT: ∀ test: runs in isolation, no shared mocks between tests

import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		globals: false, // explicit imports from "vitest"
		environment: "node",

		include: ["test/**/*.{test,spec}.ts"],
		exclude: ["node_modules", "dist"],

		// CHANGE: CORE stays fully covered; SHELL only needs a floor
		// INVARIANT: ∀ f ∈ src/core/**/*.ts: all_metrics(f) = 100%
		coverage: {
			provider: "v8",
			reporter: ["text", "json", "html"],
			include: ["src/**/*.ts"],
			exclude: ["src/bin/**"],
			thresholds: {
				"src/core/**/*.ts": {
					branches: 100,
					functions: 100,
					lines: 100,
					statements: 100,
				},
				global: {
					branches: 10,
					functions: 10,
					lines: 10,
					statements: 10,
				},
			},
		},

		clearMocks: true,
		mockReset: true,
		restoreMocks: true,
	},
});
