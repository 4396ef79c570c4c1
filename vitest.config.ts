import { defineConfig } from "vitest/config";

export default defineConfig({
	test: {
		projects: [
			// Node environment for every package and the CLI
			{
				test: {
					name: "node",
					environment: "node",
					include: ["./{packages,apps}/**/test/**/*.{test,spec}.ts"],
					exclude: ["**/node_modules/**", "dist/**"],
				},
			},
		],
	},
});
