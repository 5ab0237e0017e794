import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    env: {
      OLLAMA_HOST: "http://127.0.0.1:11434",
      OLLAMA_MODEL: "gemma2:27b",
      LOG_LEVEL: "silent",
      NODE_ENV: "test",
    },
    testTimeout: 10000,
    include: ["tests/**/*.test.ts"],
  },
});
