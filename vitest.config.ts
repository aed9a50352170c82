import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@wirecall/core": fileURLToPath(new URL("./libs/core/src/index.ts", import.meta.url)),
    },
  },
  test: {
    environment: "node",
    include: ["libs/*/test/**/*.test.ts", "apps/*/test/**/*.test.ts"],
  },
});
