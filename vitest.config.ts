import { defineConfig } from "vitest/config";

// Runtime code never touches the DOM, so the suite runs in the plain node environment.
export default defineConfig({
  test: {
    environment: "node",
    setupFiles: ["./tests/vitest.setup.ts"],
    testTimeout: 15000,
    hookTimeout: 15000,
    include: [
      "tests/unit/**/*.test.ts",
      "src/lib/**/__tests__/**/*.test.ts",
    ],
  },
});
