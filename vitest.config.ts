import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    coverage: {
      provider: "v8",
      include: ["src/agent/**/*.ts", "src/memory/**/*.ts", "src/tools/**/*.ts"],
    },
  },
});
