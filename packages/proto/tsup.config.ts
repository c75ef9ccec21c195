import { defineConfig } from "tsup";

export default defineConfig({
  entry: {
    index: "src/index.ts",
    node: "src/node.ts",
    "default-schema": "src/default-schema.ts",
    "default-schema.browser": "src/default-schema.browser.ts",
  },
  format: ["esm"],
  dts: true,
  sourcemap: true,
  clean: true,
  target: "es2022",
  platform: "neutral",
  external: ["protobufjs", "zod", "node:path", "node:url"],
});
