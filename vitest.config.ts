import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["test/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      LOG_LEVEL: "silent",
      DATABASE_PATH: ":memory:",
      JWT_SECRET_KEY: "test-secret",
      JWT_ACCESS_TOKEN_EXPIRES: "3600",
    },
  },
});
