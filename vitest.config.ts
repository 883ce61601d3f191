import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      REELSCOPE_ENV_FILE: "tests/fixtures/test.env",
    },
  },
});
