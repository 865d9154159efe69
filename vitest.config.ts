import path from "node:path";
import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
	resolve: {
		alias: {
			"@pratidhvani/core": path.join(root, "packages/core/src/index.ts"),
			"@pratidhvani/server": path.join(root, "packages/server/src/index.ts"),
		},
	},
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		setupFiles: ["./vitest.setup.ts"],
		environment: "node",
		testTimeout: 10_000,
	},
});
