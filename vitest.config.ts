import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    exclude: ["node_modules/**", "dist/**"],
    env: {
      LOG_LEVEL: "error",
      REDIS_ENABLED: "false",
    },
  },
});
