// vitest.config.ts
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    include: ["src/**/*.test.ts"],
    environment: "node",
    env: {
      // keep pino quiet while tests run
      LOG_LEVEL: "silent",
    },
  },
});
