import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    name: "proxy",
    environment: "node",
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules", "dist"],
    testTimeout: 10_000,
    coverage: {
      provider: "v8",
      reporter: ["text", "json", "html"],
      exclude: [
        "node_modules/",
        "dist/",
        "**/*.d.ts",
        "**/*.config.*",
        "src/cli.ts",
      ],
    },
  },
});
