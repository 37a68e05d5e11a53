import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["midimacro/tests/**/*.test.ts"],
		env: {
			LOG_LEVEL: "silent",
		},
	},
});
