import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["config-tools/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
