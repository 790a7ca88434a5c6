import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["packages/*/test/**/*.test.ts"],
    environment: "node",
    env: {
      DISABLE_LOGGING: "1",
    },
  },
});
