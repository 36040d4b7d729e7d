import { defineConfig } from "tsup";

export default defineConfig([
  {
    entry: {
      index: "src/index.ts",
      cli: "src/cli.ts",
    },
    format: ["cjs", "esm"],
    dts: { entry: { index: "src/index.ts" } },
    sourcemap: true,
    target: "es2022",
    platform: "node",
    clean: true,
    external: ["fastify", "@fastify/cors"],
    // The core package ships TypeScript sources; bundle it.
    noExternal: ["@native-tool-adapter/core"],
  },
]);
