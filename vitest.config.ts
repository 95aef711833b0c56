import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

const src = (path: string) => fileURLToPath(new URL(`./packages/${path}`, import.meta.url));

export default defineConfig({
	test: {
		globals: true,
		environment: "node",
		include: ["packages/*/src/**/*.test.ts"],
	},
	resolve: {
		alias: [
			{ find: "@instalo/core/db", replacement: src("core/src/db/index.ts") },
			{ find: "@instalo/core/error", replacement: src("core/src/error/index.ts") },
			{ find: "@instalo/core/logger", replacement: src("core/src/logger/index.ts") },
			{ find: "@instalo/core/utils", replacement: src("core/src/utils/index.ts") },
			{ find: /^@instalo\/core$/, replacement: src("core/src/index.ts") },
			{ find: /^@instalo\/engine$/, replacement: src("engine/src/index.ts") },
			{ find: /^@instalo\/memory-adapter$/, replacement: src("memory-adapter/src/index.ts") },
			{ find: /^@instalo\/drizzle-adapter$/, replacement: src("drizzle-adapter/src/index.ts") },
			{ find: /^@instalo\/test-utils$/, replacement: src("test-utils/src/index.ts") },
		],
	},
});
