import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["telemetry/tests/**/*.test.ts"],
    env: {
      LOG_LEVEL: "silent",
    },
  },
});
