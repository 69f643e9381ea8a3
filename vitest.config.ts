import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["test/**/*.test.ts", "services/**/*.test.ts", "schemas/**/*.test.ts"],
    testTimeout: 10000,
  },
});
