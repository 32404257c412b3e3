import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      IMAP_HOST: "127.0.0.1",
      IMAP_USER: "sieve",
      IMAP_PASSWORD: "test-secret",
      SMTP_HOST: "127.0.0.1",
      SMTP_PORT: "9927",
      SMTP_SECURE: "false",
      PROFILE_PATH: "./config/profile.json",
      CACHE_DIR: "./data/test-cache",
      LOG_LEVEL: "error",
      NODE_ENV: "test",
    },
    testTimeout: 30000,
    include: ["tests/**/*.test.ts"],
    pool: "forks",
    fileParallelism: false,
  },
});
