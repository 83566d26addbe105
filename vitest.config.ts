import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    globals: true,
    environment: "node",
    env: { NODE_ENV: "test" },
    include: ["**/*.test.ts"],
    coverage: {
      provider: "v8",
      include: ["lib/**/*.ts", "shared/**/*.ts"],
      exclude: ["lib/index.ts"],
    },
  },
});
