import { defineConfig } from "vitest/config"

export default defineConfig({
  test: {
    environment: "node",
    include: ["tests/**/*.test.ts"],
    // Tests spawn child processes and register process signal listeners.
    pool: "forks",
  },
})
