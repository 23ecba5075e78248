import { fileURLToPath } from "node:url";
import { defineConfig } from "vitest/config";

export default defineConfig({
  resolve: {
    alias: {
      "#": fileURLToPath(new URL("./src", import.meta.url)),
    },
  },
  test: {
    include: ["tests/**/*.test.ts"],
    environment: "node",
    env: {
      NODE_ENV: "test",
      JWT_SECRET: "test-secret-for-session-tokens",
      LOG_LEVEL: "silent",
      LOG_PRETTY: "false",
      BCRYPT_ROUNDS: "4",
    },
  },
});
