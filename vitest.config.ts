import * as os from "node:os";
import * as path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		include: ["packages/*/test/**/*.test.ts"],
		environment: "node",
		env: {
			LEETTERM_CONFIG_DIR: path.join(os.tmpdir(), "leetterm-test"),
		},
	},
});
