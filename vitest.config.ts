import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	resolve: {
		alias: {
			"@vertical-farm/common": path.resolve(__dirname, "packages/common/src/index.ts")
		}
	},
	test: {
		include: ["packages/*/src/**/*.test.ts", "host/src/**/*.test.ts", "device/src/**/*.test.ts"],
		environment: "node",
		pool: "forks"
	}
});
