import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "@vmforge/core": path.resolve(__dirname, "packages/core/src/index.ts"),
      "@vmforge/cloud-providers": path.resolve(__dirname, "packages/cloud-providers/src/index.ts"),
    },
  },
  test: {
    include: ["packages/*/src/**/*.test.ts"],
    environment: "node",
    env: {
      VMFORGE_LOG_LEVEL: "silent",
    },
  },
});
