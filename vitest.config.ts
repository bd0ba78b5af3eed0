import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    env: {
      NODE_ENV: "test",
      SESSION_SECRET: "test-secret",
      DATABASE_PATH: ":memory:",
      BCRYPT_ROUNDS: "4"
    }
  }
});
