import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["sdk/__tests__/**/*.test.ts"],
    environment: "node",
  },
});
